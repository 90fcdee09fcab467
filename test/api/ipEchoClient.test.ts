import { describe, it, expect, vi, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import http from 'http';
import axios, { AxiosHeaders } from 'axios';
import { SocksProxyAgent } from 'socks-proxy-agent';
import { AxiosIpEchoClient } from '../../src/api/ipEchoClient.js';

// -----------------------------------------------------------------------------
// Direct requests against a local server
// -----------------------------------------------------------------------------

describe('AxiosIpEchoClient direct', () => {
  let server: http.Server;
  let baseUrl: string;

  beforeAll(async (): Promise<void> => {
    server = http.createServer((req, res) => {
      if (req.url === '/down') {
        res.writeHead(503, { 'Content-Type': 'text/plain' });
        res.end('unavailable');
        return;
      }
      res.writeHead(200, { 'Content-Type': 'text/plain' });
      res.end('198.51.100.7\n');
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('test server is not listening on TCP');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async (): Promise<void> => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  beforeEach((): void => {
    // Keep any proxy from the environment out of the way
    vi.stubEnv('NO_PROXY', '*');
    vi.stubEnv('no_proxy', '*');
    vi.stubEnv('npm_config_no_proxy', '*');
  });

  afterEach((): void => {
    vi.unstubAllEnvs();
  });

  it('returns the response body as text', async (): Promise<void> => {
    const client = new AxiosIpEchoClient();
    expect(await client.fetchText(`${baseUrl}/ip`, { timeoutMs: 2_000 })).toBe('198.51.100.7\n');
  });

  it('rejects a non-2xx response', async (): Promise<void> => {
    const client = new AxiosIpEchoClient();
    await expect(client.fetchText(`${baseUrl}/down`, { timeoutMs: 2_000 })).rejects.toThrow('503');
  });
});

// -----------------------------------------------------------------------------
// Request options (axios.get observed)
// -----------------------------------------------------------------------------

describe('AxiosIpEchoClient request options', () => {
  const ok = {
    data: '203.0.113.9',
    status: 200,
    statusText: 'OK',
    headers: {},
    config: { headers: new AxiosHeaders() },
  };

  it('sends direct requests without an agent', async (): Promise<void> => {
    const get = vi.spyOn(axios, 'get').mockResolvedValue(ok);
    const controller = new AbortController();

    expect(await new AxiosIpEchoClient().fetchText('https://ip.test', { timeoutMs: 10_000, signal: controller.signal })).toBe(
      '203.0.113.9',
    );
    expect(get).toHaveBeenCalledWith('https://ip.test', {
      timeout: 10_000,
      responseType: 'text',
      signal: controller.signal,
      proxy: undefined,
      httpAgent: undefined,
      httpsAgent: undefined,
    });
  });

  it('routes through one socks5h agent per endpoint, reused across calls', async (): Promise<void> => {
    const get = vi.spyOn(axios, 'get').mockResolvedValue(ok);
    const client = new AxiosIpEchoClient();
    const socks = { host: '127.0.0.1', port: 9050 };

    await client.fetchText('https://ip.test', { timeoutMs: 15_000, socks });
    await client.fetchText('http://ip.test', { timeoutMs: 15_000, socks });
    await client.fetchText('https://ip.test', { timeoutMs: 15_000, socks: { host: '127.0.0.1', port: 9150 } });

    const configs = get.mock.calls.map(([, config]) => config);
    const first = configs[0]?.httpAgent;

    expect(first).toBeInstanceOf(SocksProxyAgent);
    expect(configs[0]?.httpsAgent).toBe(first);
    expect(configs[0]?.proxy).toBe(false);
    expect(configs[1]?.httpAgent).toBe(first);
    expect(configs[2]?.httpAgent).toBeInstanceOf(SocksProxyAgent);
    expect(configs[2]?.httpAgent).not.toBe(first);

    expect(first).toMatchObject({ shouldLookup: false, proxy: { host: '127.0.0.1', port: 9050, type: 5 } });
    expect(configs[2]?.httpAgent).toMatchObject({ proxy: { port: 9150 } });
  });
});
