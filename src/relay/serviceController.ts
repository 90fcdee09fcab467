import fs from 'fs';
import type { CommandOutcome, CommandSpec, ServiceAction, ServiceManagerKind } from '../types/index.js';
import type { CommandRunner } from '../utils/exec.js';
import { formatCommand } from '../utils/exec.js';
import { FatalError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

// Present only when systemd is the running init
export const SYSTEMD_RUNTIME_MARKER = '/run/systemd/system';

export interface ServiceControllerOptions {
  serviceName: string;
  isRoot?: () => boolean;
  pathExists?: (target: string) => boolean;
}

/**
 * Drives the relay service through systemd or SysV init
 */
export class ServiceController {
  private readonly serviceName: string;
  private readonly isRoot: () => boolean;
  private readonly pathExists: (target: string) => boolean;
  private detected: Promise<ServiceManagerKind> | null = null;

  constructor(
    private readonly runner: CommandRunner,
    private readonly logger: Logger,
    options: ServiceControllerOptions,
  ) {
    this.serviceName = options.serviceName;
    this.isRoot = options.isRoot ?? (() => process.geteuid?.() === 0);
    this.pathExists = options.pathExists ?? fs.existsSync;
  }

  /**
   * Detect the service manager. The first answer is kept for the lifetime of
   * this controller.
   */
  detectManager(): Promise<ServiceManagerKind> {
    if (!this.detected) {
      this.detected = this.probeManager();
    }
    return this.detected;
  }

  private async probeManager(): Promise<ServiceManagerKind> {
    if ((await this.runner.exists('systemctl')) && this.pathExists(SYSTEMD_RUNTIME_MARKER)) {
      return 'systemd';
    }
    if (await this.runner.exists('service')) {
      return 'sysv';
    }
    return 'none';
  }

  /**
   * Build the command for an action, elevated with sudo when needed
   */
  async buildCommand(action: ServiceAction): Promise<CommandSpec> {
    const command = this.managerCommand(await this.detectManager(), action);

    if (this.isRoot()) {
      return command;
    }
    if (!(await this.runner.exists('sudo'))) {
      throw new FatalError(
        'privilege-required',
        'Root privileges required but sudo not available. Run as root or install sudo.',
      );
    }
    return { program: 'sudo', args: [command.program, ...command.args] };
  }

  private managerCommand(manager: ServiceManagerKind, action: ServiceAction): CommandSpec {
    switch (manager) {
      case 'systemd':
        return { program: 'systemctl', args: [action, this.serviceName] };
      case 'sysv':
        return { program: 'service', args: [this.serviceName, action] };
      case 'none':
        throw new FatalError('no-service-manager', 'No supported service manager found (systemctl or service)');
    }
  }

  /**
   * Run a service action. A non-zero exit is logged and returned, never thrown.
   */
  async performAction(action: ServiceAction): Promise<CommandOutcome> {
    const command = await this.buildCommand(action);
    this.logger.debug(`Running: ${formatCommand(command)}`);

    const outcome = await this.runner.run(command);
    if (outcome.exitCode !== 0) {
      this.logger.warn(`Failed to ${action} ${this.serviceName} service: ${outcome.stderr.trim()}`);
    }
    return outcome;
  }

  start(): Promise<CommandOutcome> {
    return this.performAction('start');
  }

  stop(): Promise<CommandOutcome> {
    return this.performAction('stop');
  }

  reload(): Promise<CommandOutcome> {
    return this.performAction('reload');
  }

  restart(): Promise<CommandOutcome> {
    return this.performAction('restart');
  }

  getServiceName(): string {
    return this.serviceName;
  }
}
