import { isIP } from 'net';
import type { ProbeResult, SocksEndpoint } from '../types/index.js';
import type { IpEchoClient } from './ipEchoClient.js';
import type { ProcessFinder } from '../relay/processFinder.js';
import type { Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

export const DIRECT_TIMEOUT_MS = 10_000;
// Longer than the direct probe to leave room for circuit negotiation
export const PROXY_TIMEOUT_MS = 15_000;
export const CONNECTIVITY_TIMEOUT_MS = 5_000;

export interface ConnectivityProbeOptions {
  probeUrl: string;
  connectivityUrl: string;
  socks: SocksEndpoint;
  /** Command name of the relay process */
  processName: string;
}

/**
 * Finds out the current public IP, directly or through the relay's SOCKS port
 */
export class ConnectivityProbe {
  constructor(
    private readonly client: IpEchoClient,
    private readonly processFinder: ProcessFinder,
    private readonly logger: Logger,
    private readonly options: ConnectivityProbeOptions,
  ) {}

  /**
   * Query the IP-echo endpoint once. Never rejects.
   */
  async probe(viaProxy: boolean, signal?: AbortSignal): Promise<ProbeResult> {
    const route = viaProxy ? `${this.options.socks.host}:${this.options.socks.port}` : 'direct';
    try {
      const body = await this.client.fetchText(this.options.probeUrl, {
        timeoutMs: viaProxy ? PROXY_TIMEOUT_MS : DIRECT_TIMEOUT_MS,
        socks: viaProxy ? this.options.socks : undefined,
        signal,
      });

      const ip = body.trim();
      if (isIP(ip) === 0) {
        this.logger.debug(`Invalid IP from ${this.options.probeUrl} (${route}): ${ip}`);
        return { succeeded: false };
      }
      return { ip, succeeded: true };
    } catch (error) {
      this.logger.debug(`IP probe failed (${route}): ${errorMessage(error)}`);
      return { succeeded: false };
    }
  }

  async getIpDirect(signal?: AbortSignal): Promise<string | undefined> {
    const result = await this.probe(false, signal);
    if (!result.succeeded && !signal?.aborted) {
      this.logger.warn('Having trouble fetching IP address. Please check your internet connection.');
    }
    return result.ip;
  }

  async getIpViaProxy(signal?: AbortSignal): Promise<string | undefined> {
    const result = await this.probe(true, signal);
    if (!result.succeeded && !signal?.aborted) {
      this.logger.warn('Having trouble connecting to the relay network. Please wait a moment.');
    }
    return result.ip;
  }

  /**
   * Probe through the proxy while the relay process is up, directly otherwise.
   * The process table is consulted rather than the service manager, which can
   * report the unit enabled while no process runs (or the reverse mid-restart).
   */
  async getCurrentIp(signal?: AbortSignal): Promise<string | undefined> {
    if (await this.isManagedProcessRunning()) {
      return this.getIpViaProxy(signal);
    }
    return this.getIpDirect(signal);
  }

  async isManagedProcessRunning(): Promise<boolean> {
    const pids = await this.processFinder.findByName(this.options.processName);
    return pids.length > 0;
  }

  /**
   * Check that the internet is reachable at all, bypassing the relay
   */
  async hasBaselineConnectivity(signal?: AbortSignal): Promise<boolean> {
    try {
      await this.client.fetchText(this.options.connectivityUrl, {
        timeoutMs: CONNECTIVITY_TIMEOUT_MS,
        signal,
      });
      return true;
    } catch (error) {
      this.logger.debug(`Connectivity check failed: ${errorMessage(error)}`);
      return false;
    }
  }
}
