import { promises as fsPromises } from 'fs';
import path from 'path';
import type { CommandRunner } from '../utils/exec.js';

/**
 * Looks up running processes
 */
export interface ProcessFinder {
  /** Pids whose command name is exactly `name` */
  findByName(name: string): Promise<number[]>;
  /** Pids whose full command line contains `pattern` */
  findByCommandLine(pattern: string): Promise<number[]>;
}

function parsePids(output: string): number[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => /^\d+$/.test(line))
    .map((line) => parseInt(line, 10));
}

/**
 * ProcessFinder using pgrep
 */
export class PgrepProcessFinder implements ProcessFinder {
  constructor(private readonly runner: CommandRunner) {}

  async findByName(name: string): Promise<number[]> {
    // pgrep exits 1 when nothing matches, which parses to no pids
    const { stdout } = await this.runner.run({ program: 'pgrep', args: ['-x', name] });
    return parsePids(stdout);
  }

  async findByCommandLine(pattern: string): Promise<number[]> {
    const { stdout } = await this.runner.run({ program: 'pgrep', args: ['-f', pattern] });
    return parsePids(stdout);
  }
}

/**
 * ProcessFinder scanning the /proc pseudo-filesystem directly
 */
export class ProcFsProcessFinder implements ProcessFinder {
  constructor(private readonly procRoot: string = '/proc') {}

  async findByName(name: string): Promise<number[]> {
    return this.scan('comm', (content) => content.trim() === name);
  }

  async findByCommandLine(pattern: string): Promise<number[]> {
    // Arguments in cmdline are NUL separated
    return this.scan('cmdline', (content) => content.split('\0').join(' ').includes(pattern));
  }

  private async scan(file: 'comm' | 'cmdline', matches: (content: string) => boolean): Promise<number[]> {
    let entries: string[];
    try {
      entries = await fsPromises.readdir(this.procRoot);
    } catch {
      return [];
    }

    const pids: number[] = [];
    for (const entry of entries) {
      if (!/^\d+$/.test(entry)) continue;

      let content: string;
      try {
        content = await fsPromises.readFile(path.join(this.procRoot, entry, file), 'utf8');
      } catch {
        // Process exited between readdir and readFile
        continue;
      }

      if (matches(content)) {
        pids.push(parseInt(entry, 10));
      }
    }
    return pids;
  }
}

/**
 * Pick pgrep when it is installed, the /proc scan otherwise
 */
export async function createProcessFinder(runner: CommandRunner): Promise<ProcessFinder> {
  if (await runner.exists('pgrep')) {
    return new PgrepProcessFinder(runner);
  }
  return new ProcFsProcessFinder();
}
