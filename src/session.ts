import type { AppConfig, PolicyOutcome, RotationRecord } from './types/index.js';
import type { CommandRunner } from './utils/exec.js';
import type { Logger } from './utils/logger.js';
import type { IpEchoClient } from './api/ipEchoClient.js';
import type { ProcessFinder } from './relay/processFinder.js';
import { createProcessFinder } from './relay/processFinder.js';
import { ServiceController } from './relay/serviceController.js';
import { ConnectivityProbe } from './api/connectivityProbe.js';
import { ExitPolicyEditor, parseFallbackSpec, strictCountryPolicy } from './routing/exitPolicyEditor.js';
import { PolicyApplier } from './routing/policyApplier.js';
import { RotationScheduler, parseInterval } from './routing/rotationScheduler.js';
import { LifecycleManager } from './lifecycle/lifecycleManager.js';
import { FatalError } from './utils/errors.js';
import type { Sleeper } from './utils/sleep.js';
import { sleep as defaultSleep } from './utils/sleep.js';

export const TOOL_NAME = 'relay-rotator';

// Wait after starting the relay before the first rotation
export const STARTUP_BOOTSTRAP_MS = 5_000;

export interface Spinner {
  succeed(text?: string): unknown;
  fail(text?: string): unknown;
}

export type SpinnerFactory = (text: string) => Spinner;

export interface Runtime {
  settings: AppConfig;
  logger: Logger;
  runner: CommandRunner;
  processFinder: ProcessFinder;
  service: ServiceController;
  probe: ConnectivityProbe;
  editor: ExitPolicyEditor;
  lifecycle: LifecycleManager;
  sleep: Sleeper;
  spinner: SpinnerFactory;
}

export interface RuntimeDeps {
  runner: CommandRunner;
  client: IpEchoClient;
  logger: Logger;
  spinner: SpinnerFactory;
  processFinder?: ProcessFinder;
  service?: ServiceController;
  editor?: ExitPolicyEditor;
  lifecycle?: LifecycleManager;
  sleep?: Sleeper;
}

/**
 * Wire the components for one invocation
 */
export async function createRuntime(settings: AppConfig, deps: RuntimeDeps): Promise<Runtime> {
  const { runner, client, logger } = deps;
  const processFinder = deps.processFinder ?? (await createProcessFinder(runner));
  const service = deps.service ?? new ServiceController(runner, logger, { serviceName: settings.serviceName });
  const probe = new ConnectivityProbe(client, processFinder, logger, {
    probeUrl: settings.probeUrl,
    connectivityUrl: settings.connectivityUrl,
    socks: { host: settings.socksHost, port: settings.socksPort },
    processName: settings.processName,
  });

  return {
    settings,
    logger,
    runner,
    processFinder,
    service,
    probe,
    editor: deps.editor ?? new ExitPolicyEditor(logger),
    lifecycle: deps.lifecycle ?? new LifecycleManager(service, processFinder, logger, TOOL_NAME),
    sleep: deps.sleep ?? defaultSleep,
    spinner: deps.spinner,
  };
}

export interface RotateOptions {
  interval: string;
  count: number;
  /** Preferred exit country; exit preference is left alone when unset */
  prefer?: string;
  fallbackExits: string;
  torrc?: string;
}

/**
 * Fail unless the relay binary and the internet are both available
 */
export async function checkPrerequisites(runtime: Runtime): Promise<void> {
  const { runner, probe, settings, lifecycle } = runtime;

  if (!(await runner.exists(settings.processName))) {
    throw new FatalError('relay-not-installed', `${settings.processName} is not installed. Install it and try again.`);
  }

  const spinner = runtime.spinner('Checking internet connection...');
  if (!(await probe.hasBaselineConnectivity(lifecycle.signal))) {
    // A cancelled check says nothing about connectivity
    if (lifecycle.shutdownRequested) {
      spinner.fail('Interrupted');
      return;
    }
    spinner.fail('No internet connection');
    throw new FatalError('no-connectivity', 'Internet connection required but not available.');
  }
  spinner.succeed('Internet connection available');
}

/**
 * Pin the relay to the preferred exit country, falling back once
 */
export async function applyExitPreference(runtime: Runtime, options: RotateOptions): Promise<PolicyOutcome | undefined> {
  if (!options.prefer) return undefined;

  const { editor, logger, lifecycle } = runtime;
  const configPath = await editor.locateConfigPath(options.torrc || undefined);
  if (!configPath) {
    throw new FatalError('config-not-found', 'Relay config file not found. Use --torrc /path/to/torrc');
  }
  logger.info(`Using relay config: ${configPath}`);

  const applier = new PolicyApplier({
    editor,
    service: runtime.service,
    probe: runtime.probe,
    logger,
    sleep: runtime.sleep,
  });
  return applier.apply(
    configPath,
    strictCountryPolicy(options.prefer),
    parseFallbackSpec(options.fallbackExits),
    lifecycle.signal,
  );
}

/**
 * Start the relay and wait for it to bootstrap
 */
export async function initializeEnvironment(runtime: Runtime): Promise<boolean> {
  const { service, logger, settings, lifecycle } = runtime;

  await service.start();
  logger.info(`${settings.serviceName} service started. Please wait for it to establish a connection.`);
  logger.info(`Configure your browser to use the SOCKS proxy (${settings.socksHost}:${settings.socksPort}) for anonymity.`);

  const spinner = runtime.spinner('Waiting for the relay to bootstrap...');
  const completed = await runtime.sleep(STARTUP_BOOTSTRAP_MS, lifecycle.signal);
  if (completed) {
    spinner.succeed('Relay bootstrap period elapsed');
  } else {
    spinner.fail('Interrupted');
  }
  return completed;
}

/**
 * Full rotation session: checks, exit preference, relay start, rotation loop
 */
export async function runRotation(runtime: Runtime, options: RotateOptions): Promise<RotationRecord[]> {
  // Validate before touching the system
  const interval = parseInterval(options.interval);

  await checkPrerequisites(runtime);
  if (runtime.lifecycle.shutdownRequested) return [];
  await applyExitPreference(runtime, options);
  if (runtime.lifecycle.shutdownRequested) return [];

  if (!(await initializeEnvironment(runtime))) return [];

  const scheduler = new RotationScheduler({
    service: runtime.service,
    probe: runtime.probe,
    logger: runtime.logger,
    sleep: runtime.sleep,
  });
  return scheduler.run({ interval, count: options.count }, runtime.lifecycle.signal);
}

/**
 * Print the current public IP once
 */
export async function showCurrentIp(runtime: Runtime): Promise<string | undefined> {
  const ip = await runtime.probe.getCurrentIp(runtime.lifecycle.signal);
  if (ip) {
    runtime.logger.success(`Your IP address is: ${ip}`);
  }
  return ip;
}
