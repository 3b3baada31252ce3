import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { AddressPool } from '../src/address-pool.js';
import { closeApiServer, createApp, startApiServer } from '../src/api.js';
import { DNSServer } from '../src/dns-server.js';
import { logger } from '../src/logger.js';
import { createDNSQuery } from './dns-query-helper.js';

describe('Status API', () => {
  let dnsServer: DNSServer;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    dnsServer = new DNSServer({ pool: AddressPool.fromCIDR('10.0.0.0/24'), bindAddress: '127.0.0.1', port: 0 });
    app = createApp(dnsServer);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await dnsServer.stop();
  });

  describe('GET /health', () => {
    it('should return 503 while the DNS server is not listening', async () => {
      const res = await app.request('/health');

      expect(res.status).toBe(503);
      expect(await res.json()).toMatchObject({ status: 'unhealthy', listening: false });
    });

    it('should return 200 once the DNS server is listening', async () => {
      await dnsServer.start();

      const res = await app.request('/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ status: 'healthy', listening: true });
    });
  });

  describe('GET /api/health', () => {
    it('should always return 200', async () => {
      const res = await app.request('/api/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ status: 'unhealthy' });
    });
  });

  describe('GET /api/stats', () => {
    it('should return counters and the pool', async () => {
      dnsServer.handleDNSQuery(createDNSQuery('example.com', 1), '192.0.2.1');

      const res = await app.request('/api/stats');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        totalQueries: 1,
        answeredQueries: 1,
        droppedQueries: 0,
        queryTypeBreakdown: [{ type: 'A', count: 1 }],
        pool: { cidr: '10.0.0.0/24', usableAddresses: 254 },
      });
    });

    it('should answer 500 when a handler throws', async () => {
      vi.spyOn(dnsServer, 'getStats').mockImplementation(() => {
        throw new Error('stats unavailable');
      });
      const errorSpy = vi.spyOn(logger, 'error').mockImplementation(() => {});

      const res = await app.request('/api/stats');

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ error: 'stats unavailable' });
      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(errorSpy.mock.calls[0][0]).toBe('Request error');
    });
  });

  describe('GET /api/queries', () => {
    beforeEach(() => {
      dnsServer.handleDNSQuery(createDNSQuery('one.example', 1), '192.0.2.1');
      dnsServer.handleDNSQuery(createDNSQuery('two.example', 1), '192.0.2.1');
      dnsServer.handleDNSQuery(createDNSQuery('three.example', 28), '192.0.2.1');
    });

    it('should return the newest queries first', async () => {
      const res = await app.request('/api/queries?limit=2');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject([
        { domain: 'three.example.', type: 'AAAA' },
        { domain: 'two.example.', type: 'A' },
      ]);
    });

    it('should raise a zero limit to one', async () => {
      const res = await app.request('/api/queries?limit=0');

      expect(await res.json()).toHaveLength(1);
    });

    it('should reject a non-numeric limit', async () => {
      const res = await app.request('/api/queries?limit=all');

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'limit must be a positive integer' });
    });
  });

  describe('startApiServer', () => {
    it('should serve the API on a real port', async () => {
      const { server, port } = await startApiServer(dnsServer, 0);

      try {
        const res = await fetch(`http://127.0.0.1:${port}/api/health`);
        expect(res.status).toBe(200);
        expect(await res.json()).toMatchObject({ status: 'unhealthy', listening: false });
      } finally {
        await closeApiServer(server);
      }
    });

    it('should reject when the port is already in use', async () => {
      const first = await startApiServer(dnsServer, 0);

      try {
        await expect(startApiServer(dnsServer, first.port)).rejects.toMatchObject({ code: 'EADDRINUSE' });
      } finally {
        await closeApiServer(first.server);
      }
    });
  });

  it('should answer unknown routes with 404', async () => {
    const res = await app.request('/api/zones');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });
});
