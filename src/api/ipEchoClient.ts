import axios from 'axios';
import { SocksProxyAgent } from 'socks-proxy-agent';
import type { SocksEndpoint } from '../types/index.js';

export interface FetchTextOptions {
  timeoutMs: number;
  /** Route the request through this SOCKS proxy */
  socks?: SocksEndpoint;
  signal?: AbortSignal;
}

/**
 * Minimal HTTP client used by the connectivity probe
 */
export interface IpEchoClient {
  /** Resolves with the body of a 2xx response, rejects otherwise */
  fetchText(url: string, options: FetchTextOptions): Promise<string>;
}

/**
 * IpEchoClient backed by axios
 */
export class AxiosIpEchoClient implements IpEchoClient {
  private agents: Map<string, SocksProxyAgent> = new Map();

  private getAgent(socks: SocksEndpoint): SocksProxyAgent {
    // socks5h resolves hostnames on the proxy side
    const uri = `socks5h://${socks.host}:${socks.port}`;
    let agent = this.agents.get(uri);
    if (!agent) {
      agent = new SocksProxyAgent(uri);
      this.agents.set(uri, agent);
    }
    return agent;
  }

  async fetchText(url: string, options: FetchTextOptions): Promise<string> {
    const agent = options.socks ? this.getAgent(options.socks) : undefined;

    const response = await axios.get<string>(url, {
      timeout: options.timeoutMs,
      responseType: 'text',
      signal: options.signal,
      // Let the agent handle proxying; ignore HTTP(S)_PROXY from the environment
      proxy: agent ? false : undefined,
      httpAgent: agent,
      httpsAgent: agent,
    });

    return String(response.data);
  }
}

export default new AxiosIpEchoClient();
