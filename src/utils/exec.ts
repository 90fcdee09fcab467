import { spawn } from 'child_process';
import type { CommandOutcome, CommandSpec } from '../types/index.js';

/**
 * Runs external programs. Commands are always a program plus an argument
 * list; nothing goes through a shell.
 */
export interface CommandRunner {
  run(command: CommandSpec): Promise<CommandOutcome>;
  /** True if `program` resolves on PATH */
  exists(program: string): Promise<boolean>;
}

// Exit status reported when the program could not be spawned at all
export const SPAWN_FAILURE_EXIT_CODE = 127;

export function formatCommand(command: CommandSpec): string {
  return [command.program, ...command.args].join(' ');
}

/**
 * CommandRunner backed by child_process.spawn
 */
export class ChildProcessRunner implements CommandRunner {
  run(command: CommandSpec): Promise<CommandOutcome> {
    return new Promise((resolve) => {
      let stdout = '';
      let stderr = '';
      let settled = false;

      const finish = (outcome: CommandOutcome): void => {
        if (!settled) {
          settled = true;
          resolve(outcome);
        }
      };

      const child = spawn(command.program, command.args, {
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.on('error', (error) => {
        finish({
          exitCode: SPAWN_FAILURE_EXIT_CODE,
          stdout,
          stderr: stderr || error.message,
        });
      });

      child.on('close', (code, signal) => {
        finish({
          exitCode: code ?? (signal ? 128 : 1),
          stdout,
          stderr,
        });
      });
    });
  }

  async exists(program: string): Promise<boolean> {
    const { exitCode } = await this.run({ program: 'which', args: [program] });
    return exitCode === 0;
  }
}

export default new ChildProcessRunner();
