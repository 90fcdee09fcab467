import { describe, it, expect } from 'vitest';
import { ChildProcessRunner, SPAWN_FAILURE_EXIT_CODE, formatCommand } from '../../src/utils/exec.js';

describe('formatCommand', () => {
  it('joins program and arguments', (): void => {
    expect(formatCommand({ program: 'systemctl', args: ['reload', 'tor'] })).toBe('systemctl reload tor');
  });
});

describe('ChildProcessRunner', () => {
  it('reports a program that cannot be spawned instead of throwing', async (): Promise<void> => {
    const outcome = await new ChildProcessRunner().run({ program: 'relay-rotator-missing-binary', args: [] });

    expect(outcome.exitCode).toBe(SPAWN_FAILURE_EXIT_CODE);
    expect(outcome.stderr).toContain('ENOENT');
  });
});
