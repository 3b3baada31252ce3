import { describe, it, expect } from 'vitest';
import {
  DEFAULT_API_PORT,
  DEFAULT_OTLP_ENDPOINT,
  DEFAULT_PROMETHEUS_PORT,
  loadConfig,
  parseListenAddress,
} from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('loadConfig', () => {
  it('should apply defaults around the CIDR flag', () => {
    expect(loadConfig(['--cidr', '10.0.0.0/8'], {})).toEqual({
      cidr: '10.0.0.0/8',
      listen: { address: '0.0.0.0', port: 5353 },
      apiPort: DEFAULT_API_PORT,
      otel: {
        enabled: false,
        exporterType: 'otlp',
        endpoint: DEFAULT_OTLP_ENDPOINT,
        prometheusPort: DEFAULT_PROMETHEUS_PORT,
      },
    });
  });

  it('should accept short flags', () => {
    const config = loadConfig(['-c', '192.167.0.0/16', '-l', '127.0.0.1:53'], {});

    expect(config.cidr).toBe('192.167.0.0/16');
    expect(config.listen).toEqual({ address: '127.0.0.1', port: 53 });
  });

  it('should fall back to environment variables', () => {
    const config = loadConfig([], { DNS_CIDR: '172.16.0.0/12', DNS_LISTEN: '[::1]:5300', API_PORT: '0' });

    expect(config.cidr).toBe('172.16.0.0/12');
    expect(config.listen).toEqual({ address: '::1', port: 5300 });
    expect(config.apiPort).toBeNull();
  });

  it('should let flags override environment variables', () => {
    const config = loadConfig(['--cidr', '10.0.0.0/8', '--listen', '0.0.0.0:53', '--api-port', '8080'], {
      DNS_CIDR: '172.16.0.0/12',
      DNS_LISTEN: '127.0.0.1:5300',
      API_PORT: '9090',
    });

    expect(config.cidr).toBe('10.0.0.0/8');
    expect(config.listen).toEqual({ address: '0.0.0.0', port: 53 });
    expect(config.apiPort).toBe(8080);
  });

  it('should require a CIDR block', () => {
    expect(() => loadConfig([], {})).toThrow(ConfigError);
    expect(() => loadConfig([], {})).toThrow('Missing CIDR block: pass --cidr or set DNS_CIDR');
  });

  it('should reject unknown flags and missing values', () => {
    expect(() => loadConfig(['--cidr', '10.0.0.0/8', '--verbose'], {})).toThrow(ConfigError);
    expect(() => loadConfig(['--cidr'], {})).toThrow(ConfigError);
    expect(() => loadConfig(['10.0.0.0/8'], {})).toThrow(ConfigError);
  });

  it('should reject a bad API port', () => {
    expect(() => loadConfig(['--cidr', '10.0.0.0/8', '--api-port', 'http'], {})).toThrow(
      'Invalid API port "http": expected an integer between 0 and 65535',
    );
  });

  it('should read metrics settings', () => {
    const config = loadConfig(['--cidr', '10.0.0.0/8'], {
      OTEL_ENABLED: 'true',
      OTEL_EXPORTER_TYPE: 'prometheus',
      OTEL_ENDPOINT: 'http://collector.test/v1/metrics',
      OTEL_PROMETHEUS_PORT: '9999',
      OTEL_HEADERS: '{"Authorization":"test-secret"}',
    });

    expect(config.otel).toEqual({
      enabled: true,
      exporterType: 'prometheus',
      endpoint: 'http://collector.test/v1/metrics',
      prometheusPort: 9999,
      headers: { Authorization: 'test-secret' },
    });
  });

  it.each([
    [{ OTEL_EXPORTER_TYPE: 'zipkin' }, 'Invalid OTEL_EXPORTER_TYPE "zipkin": expected otlp or prometheus'],
    [{ OTEL_HEADERS: '[1]' }, 'Invalid OTEL_HEADERS: expected a JSON object'],
    [{ OTEL_HEADERS: '{"x-count":1}' }, 'Invalid OTEL_HEADERS: header "x-count" must be a string'],
    [{ OTEL_PROMETHEUS_PORT: '99999' }, 'Invalid OTEL_PROMETHEUS_PORT "99999": expected an integer between 0 and 65535'],
  ])('should reject metrics settings %j', (env, message) => {
    expect(() => loadConfig(['--cidr', '10.0.0.0/8'], env)).toThrow(message);
  });

  it('should reject headers that are not JSON', () => {
    expect(() => loadConfig(['--cidr', '10.0.0.0/8'], { OTEL_HEADERS: 'not json' })).toThrow(/^Invalid OTEL_HEADERS: /);
  });
});

describe('parseListenAddress', () => {
  it('should parse IPv4, hostname and bracketed IPv6 addresses', () => {
    expect(parseListenAddress('0.0.0.0:53')).toEqual({ address: '0.0.0.0', port: 53 });
    expect(parseListenAddress('localhost:5353')).toEqual({ address: 'localhost', port: 5353 });
    expect(parseListenAddress('[::]:53')).toEqual({ address: '::', port: 53 });
  });

  it.each([
    ['localhost', 'Invalid listen address "localhost": expected host:port'],
    [':53', 'Invalid listen address ":53": missing host'],
    ['::1:53', 'Invalid listen address "::1:53": wrap IPv6 hosts in brackets'],
    ['[::1]53', 'Invalid listen address "[::1]53": expected [ipv6]:port'],
    ['[]:53', 'Invalid listen address "[]:53": missing host'],
    ['127.0.0.1:70000', 'Invalid listen port "70000": expected an integer between 0 and 65535'],
    ['127.0.0.1:dns', 'Invalid listen port "dns": expected an integer between 0 and 65535'],
  ])('should reject %s', (value, message) => {
    expect(() => parseListenAddress(value)).toThrow(message);
  });
});
