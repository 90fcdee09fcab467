#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import inquirer from 'inquirer';
import ora from 'ora';
import type { AppConfig, LogLevel } from './types/index.js';
import { createRuntime, runRotation, showCurrentIp, TOOL_NAME } from './session.js';
import type { Runtime } from './session.js';
import { parseInterval } from './routing/rotationScheduler.js';
import { parseFallbackSpec } from './routing/exitPolicyEditor.js';
import runner from './utils/exec.js';
import ipEchoClient from './api/ipEchoClient.js';
import { getConfig, getConfigPath, resetConfig, updateConfig } from './utils/config.js';
import { ExitCode, errorMessage, isFatalError } from './utils/errors.js';
import logger from './utils/logger.js';

const VERSION = '0.1.0';

interface RotateCliOptions {
  interval: string;
  count: number;
  prefer?: string | boolean;
  preferRu?: boolean;
  fallbackExits: string;
  torrc: string;
}

function parseCount(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Count must be a non-negative integer.');
  }
  return parseInt(value, 10);
}

function parseCountry(value: string): string {
  const country = value.trim().toLowerCase();
  if (!/^[a-z]{2}$/.test(country)) {
    throw new InvalidArgumentError('Country must be a two-letter code, e.g. "ru".');
  }
  return country;
}

/**
 * `--prefer <country>` wins over `--prefer-ru`; a bare `--prefer` uses the
 * configured preferred country
 */
function resolvePreferredCountry(options: RotateCliOptions): string | undefined {
  if (typeof options.prefer === 'string') return options.prefer;
  if (options.preferRu) return 'ru';
  if (options.prefer === true) return getConfig().preferredCountry;
  return undefined;
}

/**
 * Build the runtime, run `task`, and turn failures into exit codes
 */
async function withRuntime(task: (runtime: Runtime) => Promise<void>): Promise<void> {
  const config = getConfig();
  logger.setLevel(config.logLevel);

  let runtime: Runtime | undefined;
  try {
    runtime = await createRuntime(config, {
      runner,
      client: ipEchoClient,
      logger,
      spinner: (text) => ora(text).start(),
    });
    runtime.lifecycle.install();
    await task(runtime);
  } catch (error) {
    // Once shutdown has begun it owns the exit
    if (runtime?.lifecycle.shutdownRequested) {
      logger.debug(`Ignoring error during shutdown: ${errorMessage(error)}`);
      return;
    }
    if (isFatalError(error)) {
      logger.error(error.message);
      process.exit(error.exitCode);
    }
    logger.error(`Error: ${errorMessage(error)}`);
    process.exit(ExitCode.GENERAL);
  }
}

// Create CLI program
const program = new Command();
const defaults = getConfig();

program
  .name(TOOL_NAME)
  .description('Rotate your public IP through a local relay service')
  .version(VERSION);

// Rotate command - the default; changes the IP repeatedly
program
  .command('rotate', { isDefault: true })
  .description('Change the relay IP repeatedly')
  .option('-i, --interval <seconds>', 'Seconds between IP changes, or a range like "30-120"', defaults.interval)
  .option('-c, --count <number>', 'Number of IP changes; 0 changes indefinitely', parseCount, defaults.count)
  .option('--prefer [country]', 'Try exit nodes in this country first, then fall back', parseCountry)
  .option('--prefer-ru', 'Shorthand for --prefer ru')
  .option('--fallback-exits <list>', 'Comma-separated fallback countries, or "any"', defaults.fallbackExits)
  .option('--torrc <path>', 'Path to the relay config (default: auto-detect)', defaults.torrcPath)
  .action(async (options: RotateCliOptions) => {
    await withRuntime(async (runtime) => {
      const records = await runRotation(runtime, {
        interval: options.interval,
        count: options.count,
        prefer: resolvePreferredCountry(options),
        fallbackExits: options.fallbackExits,
        torrc: options.torrc,
      });
      const completed = records.length > 0 ? records[records.length - 1].iteration : 0;
      logger.info(`Completed ${completed} rotations.`);
    });
  });

// IP command - shows the current public IP
program
  .command('ip')
  .description('Display the current IP address and exit')
  .action(async () => {
    await withRuntime(async (runtime) => {
      await showCurrentIp(runtime);
    });
  });

// Stop command - stops the relay and other instances of this tool
program
  .command('stop')
  .description(`Stop the relay service and all ${TOOL_NAME} processes`)
  .action(async () => {
    await withRuntime(async (runtime) => {
      await runtime.lifecycle.stopEverything();
    });
  });

// Configure command - configure the application settings
program
  .command('configure')
  .description('Configure the default settings')
  .option('--reset', 'Restore the default settings')
  .action(async (options: { reset?: boolean }) => {
    try {
      if (options.reset) {
        resetConfig();
        console.log('Configuration reset to defaults');
        return;
      }

      const config = getConfig();

      const answers = await inquirer.prompt<Partial<AppConfig>>([
        {
          type: 'input',
          name: 'interval',
          message: 'Seconds between IP changes (number or range like 30-120):',
          default: config.interval,
          validate: (input: string) => {
            try {
              parseInterval(input);
              return true;
            } catch (error) {
              return errorMessage(error);
            }
          },
        },
        {
          type: 'number',
          name: 'count',
          message: 'Number of IP changes (0 = indefinitely):',
          default: config.count,
          validate: (input: number) =>
            (Number.isInteger(input) && input >= 0) || 'Count must be a non-negative integer.',
        },
        {
          type: 'input',
          name: 'preferredCountry',
          message: 'Preferred exit country:',
          default: config.preferredCountry,
          filter: (input: string) => input.trim().toLowerCase(),
        },
        {
          type: 'input',
          name: 'fallbackExits',
          message: 'Fallback exit countries (comma-separated, or "any"):',
          default: config.fallbackExits,
          filter: (input: string) => {
            const spec = parseFallbackSpec(input);
            return spec.kind === 'any' ? 'any' : spec.countries.join(',');
          },
        },
        {
          type: 'input',
          name: 'torrcPath',
          message: 'Relay config path (empty = auto-detect):',
          default: config.torrcPath,
        },
        {
          type: 'list',
          name: 'logLevel',
          message: 'Log level:',
          choices: ['debug', 'info', 'warn', 'error'] satisfies LogLevel[],
          default: config.logLevel,
        },
      ]);

      updateConfig(answers);
      console.log(`Configuration updated successfully (${getConfigPath()})`);
    } catch (error) {
      console.error(`Error: ${errorMessage(error)}`);
      process.exit(ExitCode.GENERAL);
    }
  });

await program.parseAsync(process.argv);
