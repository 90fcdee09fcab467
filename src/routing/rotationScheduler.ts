import { v4 as uuidv4 } from 'uuid';
import type { IntervalSpec, RotationConfig, RotationRecord } from '../types/index.js';
import type { ServiceController } from '../relay/serviceController.js';
import type { ConnectivityProbe } from '../api/connectivityProbe.js';
import { FatalError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import type { Sleeper } from '../utils/sleep.js';
import { sleep as defaultSleep } from '../utils/sleep.js';

// Time for the relay to build a new circuit after a reload
export const CIRCUIT_SETTLE_MS = 2_000;

// Runs without a count keep only this many of the latest records
export const RETAINED_RECORD_LIMIT = 100;

const INTERVAL_PATTERN = /^\s*(\d+)\s*(?:-\s*(\d+)\s*)?$/;

/**
 * Parse "60" or "30-120" (seconds, inclusive)
 */
export function parseInterval(raw: string): IntervalSpec {
  const match = INTERVAL_PATTERN.exec(raw);
  if (!match) {
    throw new FatalError('invalid-interval', "Invalid interval format. Use number or range (e.g., '60' or '30-120')");
  }

  const min = parseInt(match[1], 10);
  if (match[2] === undefined) {
    return { kind: 'fixed', seconds: min };
  }

  const max = parseInt(match[2], 10);
  if (min > max) {
    throw new FatalError('invalid-interval', `Invalid interval range ${min}-${max}: lower bound exceeds upper bound`);
  }
  return { kind: 'range', min, max };
}

/**
 * Seconds to wait before the next rotation, drawn uniformly from a range so
 * rotations don't follow a fixed cadence
 */
export function sampleInterval(spec: IntervalSpec, random: () => number = Math.random): number {
  if (spec.kind === 'fixed') {
    return spec.seconds;
  }
  return spec.min + Math.floor(random() * (spec.max - spec.min + 1));
}

export function describeInterval(spec: IntervalSpec): string {
  return spec.kind === 'fixed' ? `${spec.seconds}s` : `${spec.min}-${spec.max}s`;
}

export interface RotationSchedulerDeps {
  service: ServiceController;
  probe: ConnectivityProbe;
  logger: Logger;
  sleep?: Sleeper;
  random?: () => number;
  settleMs?: number;
}

/**
 * Periodically asks the relay for a new circuit and reports the resulting IP
 */
export class RotationScheduler {
  private readonly service: ServiceController;
  private readonly probe: ConnectivityProbe;
  private readonly logger: Logger;
  private readonly sleep: Sleeper;
  private readonly random: () => number;
  private readonly settleMs: number;

  constructor(deps: RotationSchedulerDeps) {
    this.service = deps.service;
    this.probe = deps.probe;
    this.logger = deps.logger;
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
    this.settleMs = deps.settleMs ?? CIRCUIT_SETTLE_MS;
  }

  /**
   * Reload the relay and probe the new IP
   */
  async rotate(signal?: AbortSignal): Promise<string | undefined> {
    await this.service.reload();
    if (!(await this.sleep(this.settleMs, signal))) {
      return undefined;
    }
    return this.probe.getCurrentIp(signal);
  }

  /**
   * Rotate `config.count` times (forever when 0). Returns once the count is
   * reached or `signal` aborts. A run without a count returns only the most
   * recent RETAINED_RECORD_LIMIT records.
   */
  async run(config: RotationConfig, signal?: AbortSignal): Promise<RotationRecord[]> {
    const records: RotationRecord[] = [];
    const bounded = config.count > 0;

    this.logger.info(
      `Rotating every ${describeInterval(config.interval)}, ${bounded ? `${config.count} times` : 'until interrupted'}`,
    );

    for (let iteration = 1; !bounded || iteration <= config.count; iteration++) {
      if (signal?.aborted) break;

      const waitedSeconds = sampleInterval(config.interval, this.random);
      this.logger.debug(`Rotation ${iteration}: waiting ${waitedSeconds}s`);
      if (!(await this.sleep(waitedSeconds * 1000, signal))) break;

      const ip = await this.rotate(signal);
      if (signal?.aborted) break;

      if (ip) {
        this.logger.success(`Your IP address is: ${ip}`);
      }
      records.push({ id: uuidv4(), iteration, waitedSeconds, ip, at: new Date() });
      if (!bounded && records.length > RETAINED_RECORD_LIMIT) {
        records.shift();
      }
    }

    return records;
  }
}
