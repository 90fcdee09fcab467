import type { ServiceController } from '../relay/serviceController.js';
import type { ProcessFinder } from '../relay/processFinder.js';
import type { Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

export const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGQUIT'];

/**
 * Process-level hooks, injectable for tests
 */
export interface LifecycleDeps {
  registerSignal: (signal: NodeJS.Signals, handler: () => void) => void;
  exit: (code: number) => void;
  kill: (pid: number, signal: NodeJS.Signals) => void;
  pid: number;
}

const defaultDeps: LifecycleDeps = {
  registerSignal: (signal, handler) => {
    process.on(signal, handler);
  },
  exit: (code) => {
    process.exit(code);
  },
  kill: (pid, signal) => {
    process.kill(pid, signal);
  },
  pid: process.pid,
};

/**
 * Owns the shutdown token and the interrupt path
 */
export class LifecycleManager {
  private readonly controller = new AbortController();
  private readonly deps: LifecycleDeps;
  private shuttingDown: Promise<void> | null = null;

  constructor(
    private readonly service: ServiceController,
    private readonly processFinder: ProcessFinder,
    private readonly logger: Logger,
    private readonly toolName: string,
    deps: Partial<LifecycleDeps> = {},
  ) {
    this.deps = { ...defaultDeps, ...deps };
  }

  /** Aborted once shutdown starts */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get shutdownRequested(): boolean {
    return this.controller.signal.aborted;
  }

  install(): void {
    for (const signal of SHUTDOWN_SIGNALS) {
      this.deps.registerSignal(signal, () => {
        this.shutdown().catch((error: unknown) => {
          this.logger.error(`Shutdown failed: ${errorMessage(error)}`);
          this.deps.exit(1);
        });
      });
    }
  }

  /**
   * Stop the relay and sibling processes, then exit 0.
   * Repeated calls share the first shutdown.
   */
  shutdown(): Promise<void> {
    if (!this.shuttingDown) {
      this.controller.abort();
      this.shuttingDown = this.stopBestEffort().then(() => {
        this.logger.warn('Program terminated by user.');
        this.deps.exit(0);
      });
    }
    return this.shuttingDown;
  }

  /**
   * Stop the relay service and every other process of this tool.
   * A missing service manager or missing privileges reject with their FatalError.
   */
  async stopEverything(): Promise<void> {
    await this.service.stop();
    await this.terminateSiblings();
    this.logger.success(`${this.service.getServiceName()} services and ${this.toolName} processes stopped.`);
  }

  // Interrupt path: a failed stop must not keep the process alive
  private async stopBestEffort(): Promise<void> {
    try {
      await this.service.stop();
    } catch (error) {
      this.logger.warn(`Could not stop ${this.service.getServiceName()}: ${errorMessage(error)}`);
    }
    await this.terminateSiblings();
  }

  /**
   * SIGTERM every other process whose command line carries the tool name
   */
  async terminateSiblings(): Promise<number[]> {
    let pids: number[];
    try {
      pids = await this.processFinder.findByCommandLine(this.toolName);
    } catch (error) {
      this.logger.debug(`Could not list ${this.toolName} processes: ${errorMessage(error)}`);
      return [];
    }

    const terminated: number[] = [];
    for (const pid of pids) {
      if (pid === this.deps.pid) continue;
      try {
        this.deps.kill(pid, 'SIGTERM');
        terminated.push(pid);
      } catch (error) {
        // Usually ESRCH: it exited on its own
        this.logger.debug(`Could not terminate ${pid}: ${errorMessage(error)}`);
      }
    }
    return terminated;
  }
}
