import { promises as fsPromises } from 'fs';
import type { ExitPolicy, FallbackSpec } from '../types/index.js';
import { FatalError, errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

export const EXIT_NODES_KEYWORD = 'ExitNodes';
export const STRICT_NODES_KEYWORD = 'StrictNodes';
export const POLICY_MARKER = '# --- relay-rotator exit policy ---';

/** Checked in order when no explicit config path is given */
export const DEFAULT_CONFIG_CANDIDATES: readonly string[] = [
  '/etc/tor/torrc',
  '/etc/tor/torrc.default',
  '/usr/local/etc/tor/torrc',
  '/etc/torrc',
];

export const ANY_EXIT_POLICY: ExitPolicy = { countries: [], strict: false };

/**
 * Strict policy pinned to a single country
 */
export function strictCountryPolicy(country: string): ExitPolicy {
  return { countries: [country.trim().toLowerCase()], strict: true };
}

/**
 * Parse a fallback list such as "de,nl" or "any".
 * An empty value, or a list with no usable entries, means any exit.
 */
export function parseFallbackSpec(raw: string): FallbackSpec {
  const value = raw.trim().toLowerCase();
  if (value === 'any') {
    return { kind: 'any' };
  }

  const countries = value
    .split(',')
    .map((c) => c.trim())
    .filter((c) => c.length > 0);

  return countries.length > 0 ? { kind: 'countries', countries } : { kind: 'any' };
}

/**
 * Fallback policies are never strict
 */
export function fallbackPolicy(spec: FallbackSpec): ExitPolicy {
  return spec.kind === 'any' ? { ...ANY_EXIT_POLICY } : { countries: [...spec.countries], strict: false };
}

/**
 * ["ru", "de"] -> "{ru},{de}"
 */
export function formatExitNodes(countries: string[]): string {
  return countries.map((c) => `{${c}}`).join(',');
}

function isManagedLine(line: string): boolean {
  const trimmed = line.trim();
  return (
    trimmed.startsWith(EXIT_NODES_KEYWORD) ||
    trimmed.startsWith(STRICT_NODES_KEYWORD) ||
    trimmed === POLICY_MARKER
  );
}

/**
 * Replace the exit policy in config text, leaving every other line untouched.
 * The file's line ending is kept. Applying the same policy twice yields
 * identical text.
 */
export function renderPolicy(content: string, policy: ExitPolicy): string {
  const eol = content.includes('\r\n') ? '\r\n' : '\n';
  const body = content.replace(/\r?\n$/, '');
  const lines = content === '' ? [] : body.split(/\r?\n/).filter((line) => !isManagedLine(line));

  // Separate the policy block unless the file already ends in a blank line
  if (lines.length > 0 && lines[lines.length - 1].trim() !== '') {
    lines.push('');
  }
  lines.push(POLICY_MARKER);
  if (policy.countries.length > 0) {
    lines.push(`${EXIT_NODES_KEYWORD} ${formatExitNodes(policy.countries)}`);
  }
  lines.push(`${STRICT_NODES_KEYWORD} ${policy.strict ? '1' : '0'}`);

  return `${lines.join(eol)}${eol}`;
}

/**
 * Reads and rewrites the relay configuration file
 */
export class ExitPolicyEditor {
  constructor(
    private readonly logger: Logger,
    private readonly candidates: readonly string[] = DEFAULT_CONFIG_CANDIDATES,
  ) {}

  /**
   * The explicit path if it is an existing file, else the first existing
   * default location
   */
  async locateConfigPath(explicitPath?: string): Promise<string | undefined> {
    if (explicitPath && (await this.isFile(explicitPath))) {
      return explicitPath;
    }
    if (explicitPath) {
      this.logger.warn(`Config file ${explicitPath} not found, trying default locations`);
    }

    for (const candidate of this.candidates) {
      if (await this.isFile(candidate)) {
        return candidate;
      }
    }
    return undefined;
  }

  async writePolicy(configPath: string, policy: ExitPolicy): Promise<void> {
    let content: string;
    try {
      content = await fsPromises.readFile(configPath, 'utf8');
    } catch (error) {
      throw new FatalError('config-read', `Failed to read ${configPath}: ${errorMessage(error)}`, { cause: error });
    }

    try {
      await fsPromises.writeFile(configPath, renderPolicy(content, policy), 'utf8');
    } catch (error) {
      throw new FatalError('config-write', `Failed to write ${configPath}: ${errorMessage(error)}`, { cause: error });
    }

    this.logger.debug(
      `Wrote exit policy to ${configPath}: ${formatExitNodes(policy.countries) || 'any'} (strict=${policy.strict})`,
    );
  }

  private async isFile(target: string): Promise<boolean> {
    try {
      return (await fsPromises.stat(target)).isFile();
    } catch {
      return false;
    }
  }
}
