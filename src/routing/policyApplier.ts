import type { ExitPolicy, FallbackSpec, PolicyApplierState, PolicyOutcome } from '../types/index.js';
import type { ExitPolicyEditor } from './exitPolicyEditor.js';
import { fallbackPolicy, formatExitNodes } from './exitPolicyEditor.js';
import type { ServiceController } from '../relay/serviceController.js';
import type { ConnectivityProbe } from '../api/connectivityProbe.js';
import type { Logger } from '../utils/logger.js';
import type { Sleeper } from '../utils/sleep.js';
import { sleep as defaultSleep } from '../utils/sleep.js';

// Fixed wait after a restart; the relay is not polled for readiness
export const BOOTSTRAP_GRACE_MS = 6_000;

export interface PolicyApplierDeps {
  editor: ExitPolicyEditor;
  service: ServiceController;
  probe: ConnectivityProbe;
  logger: Logger;
  sleep?: Sleeper;
  bootstrapGraceMs?: number;
}

function describePolicy(policy: ExitPolicy): string {
  const exits = policy.countries.length > 0 ? formatExitNodes(policy.countries) : 'any';
  return `ExitNodes ${exits}, StrictNodes ${policy.strict ? 1 : 0}`;
}

/**
 * Applies a preferred exit policy, verifies it through the proxy and falls
 * back once to a looser policy when the relay does not come up.
 *
 *   idle -> try-preferred -> verify-preferred -> done
 *                                  |
 *                                  v
 *                            try-fallback -> verify-fallback -> done
 *
 * Best effort: a failed fallback is reported, never thrown.
 */
export class PolicyApplier {
  private readonly editor: ExitPolicyEditor;
  private readonly service: ServiceController;
  private readonly probe: ConnectivityProbe;
  private readonly logger: Logger;
  private readonly sleep: Sleeper;
  private readonly bootstrapGraceMs: number;

  private state: PolicyApplierState = 'idle';
  private history: PolicyApplierState[] = ['idle'];

  constructor(deps: PolicyApplierDeps) {
    this.editor = deps.editor;
    this.service = deps.service;
    this.probe = deps.probe;
    this.logger = deps.logger;
    this.sleep = deps.sleep ?? defaultSleep;
    this.bootstrapGraceMs = deps.bootstrapGraceMs ?? BOOTSTRAP_GRACE_MS;
  }

  getState(): PolicyApplierState {
    return this.state;
  }

  private transition(next: PolicyApplierState): void {
    this.logger.debug(`Policy applier: ${this.state} -> ${next}`);
    this.state = next;
    this.history.push(next);
  }

  private finish(
    stage: PolicyOutcome['stage'],
    policy: ExitPolicy,
    ip: string | undefined,
    interrupted = false,
  ): PolicyOutcome {
    this.transition('done');
    return {
      stage,
      policy,
      ip,
      verified: ip !== undefined,
      interrupted,
      states: [...this.history],
    };
  }

  /**
   * Write the policy, restart the relay and wait out the bootstrap period.
   * Resolves false when interrupted during the wait.
   */
  private async enforce(configPath: string, policy: ExitPolicy, signal?: AbortSignal): Promise<boolean> {
    await this.editor.writePolicy(configPath, policy);
    await this.service.restart();
    return this.sleep(this.bootstrapGraceMs, signal);
  }

  async apply(
    configPath: string,
    preferred: ExitPolicy,
    fallback: FallbackSpec,
    signal?: AbortSignal,
  ): Promise<PolicyOutcome> {
    if (this.state !== 'idle') {
      throw new Error(`Policy applier already ran (state: ${this.state})`);
    }

    this.transition('try-preferred');
    this.logger.info(`Trying preferred exit policy (${describePolicy(preferred)})...`);
    if (!(await this.enforce(configPath, preferred, signal))) {
      return this.finish('preferred', preferred, undefined, true);
    }

    this.transition('verify-preferred');
    const ip = await this.probe.getIpViaProxy(signal);
    if (ip) {
      this.logger.success(`Relay is up with the preferred exit policy. Current relay IP: ${ip}`);
      return this.finish('preferred', preferred, ip);
    }
    if (signal?.aborted) {
      return this.finish('preferred', preferred, undefined, true);
    }

    this.transition('try-fallback');
    const looser = fallbackPolicy(fallback);
    this.logger.warn(`Preferred exits not available (relay did not come up). Falling back to ${describePolicy(looser)}...`);
    if (!(await this.enforce(configPath, looser, signal))) {
      return this.finish('fallback', looser, undefined, true);
    }

    this.transition('verify-fallback');
    const fallbackIp = await this.probe.getIpViaProxy(signal);
    if (fallbackIp) {
      this.logger.success(`Relay is up after fallback. Current relay IP: ${fallbackIp}`);
    } else {
      this.logger.warn('Fallback also failed to establish relay connectivity (the relay network may be blocked).');
    }
    return this.finish('fallback', looser, fallbackIp, signal?.aborted ?? false);
  }
}
