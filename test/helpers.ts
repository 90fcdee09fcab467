/**
 * Shared fakes for unit tests
 */

import type { CommandOutcome, CommandSpec } from '../src/types/index.js';
import type { CommandRunner } from '../src/utils/exec.js';
import type { Logger } from '../src/utils/logger.js';
import type { FetchTextOptions, IpEchoClient } from '../src/api/ipEchoClient.js';
import type { ProcessFinder } from '../src/relay/processFinder.js';
import type { Sleeper } from '../src/utils/sleep.js';

export interface LogEntry {
  level: keyof Logger;
  message: string;
}

export interface MemoryLogger extends Logger {
  entries: LogEntry[];
  messages(level: keyof Logger): string[];
}

export function createMemoryLogger(): MemoryLogger {
  const entries: LogEntry[] = [];
  const record = (level: keyof Logger) => (message: string): void => {
    entries.push({ level, message });
  };
  return {
    entries,
    messages: (level) => entries.filter((e) => e.level === level).map((e) => e.message),
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
    success: record('success'),
  };
}

/**
 * Records commands; answers from a handler, exit 0 with no output by default
 */
export class FakeRunner implements CommandRunner {
  readonly commands: CommandSpec[] = [];
  readonly installed: Set<string>;

  constructor(
    installed: string[] = [],
    private readonly handler: (command: CommandSpec) => Partial<CommandOutcome> = () => ({}),
  ) {
    this.installed = new Set(installed);
  }

  async run(command: CommandSpec): Promise<CommandOutcome> {
    this.commands.push(command);
    return { exitCode: 0, stdout: '', stderr: '', ...this.handler(command) };
  }

  async exists(program: string): Promise<boolean> {
    return this.installed.has(program);
  }

  /** Commands as flat strings, for compact assertions */
  lines(): string[] {
    return this.commands.map((c) => [c.program, ...c.args].join(' '));
  }
}

export interface FetchCall {
  url: string;
  options: FetchTextOptions;
}

/**
 * IpEchoClient answering from a queue; an Error entry rejects
 */
export class FakeIpEchoClient implements IpEchoClient {
  readonly calls: FetchCall[] = [];
  /** Runs before each answer, e.g. to simulate an interrupt mid-request */
  onFetch?: (url: string) => Promise<void>;

  constructor(private readonly responses: Array<string | Error> = []) {}

  push(...responses: Array<string | Error>): void {
    this.responses.push(...responses);
  }

  async fetchText(url: string, options: FetchTextOptions): Promise<string> {
    this.calls.push({ url, options });
    await this.onFetch?.(url);
    const next = this.responses.shift();
    if (next === undefined) {
      throw new Error('connect ECONNREFUSED');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

export class FakeProcessFinder implements ProcessFinder {
  constructor(
    public byName: Record<string, number[]> = {},
    public byCommandLine: Record<string, number[]> = {},
  ) {}

  async findByName(name: string): Promise<number[]> {
    return this.byName[name] ?? [];
  }

  async findByCommandLine(pattern: string): Promise<number[]> {
    return this.byCommandLine[pattern] ?? [];
  }
}

/**
 * Sleeper that returns at once and records requested delays
 */
export function createInstantSleep(): Sleeper & { delays: number[] } {
  const delays: number[] = [];
  const fn = async (ms: number, signal?: AbortSignal): Promise<boolean> => {
    delays.push(ms);
    return !signal?.aborted;
  };
  return Object.assign(fn, { delays });
}
