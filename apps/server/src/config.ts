import { parseArgs } from 'util';
import { ConfigError, toError } from './errors.js';
import type { OtelConfig } from './otel-metrics.js';

export interface ListenAddress {
  address: string;
  port: number;
}

export interface AppConfig {
  cidr: string;
  listen: ListenAddress;
  /** null when the status API is disabled */
  apiPort: number | null;
  otel: OtelConfig;
}

export const DEFAULT_LISTEN = '0.0.0.0:5353';
export const DEFAULT_API_PORT = 3001;
export const DEFAULT_OTLP_ENDPOINT = 'http://localhost:4318/v1/metrics';
export const DEFAULT_PROMETHEUS_PORT = 9464;

export const USAGE = `Usage: sinkhole-dns --cidr <network/prefix> [--listen <host:port>] [--api-port <port>]

  -c, --cidr      IPv4 block to answer from, e.g. 10.0.0.0/8 (env DNS_CIDR)
  -l, --listen    UDP address to listen on (env DNS_LISTEN, default ${DEFAULT_LISTEN})
      --api-port  HTTP status API port, 0 disables it (env API_PORT, default ${DEFAULT_API_PORT})`;

function parsePort(value: string, label: string): number {
  const trimmed = value.trim();
  const port = /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : NaN;
  if (isNaN(port) || port > 65535) {
    throw new ConfigError(`Invalid ${label} "${value}": expected an integer between 0 and 65535`);
  }
  return port;
}

/**
 * Parse `host:port` or `[ipv6]:port`
 */
export function parseListenAddress(value: string): ListenAddress {
  const trimmed = value.trim();

  if (trimmed.startsWith('[')) {
    const close = trimmed.indexOf(']:');
    if (close === -1) {
      throw new ConfigError(`Invalid listen address "${value}": expected [ipv6]:port`);
    }
    const address = trimmed.slice(1, close);
    if (!address) {
      throw new ConfigError(`Invalid listen address "${value}": missing host`);
    }
    return { address, port: parsePort(trimmed.slice(close + 2), 'listen port') };
  }

  const colon = trimmed.lastIndexOf(':');
  if (colon === -1) {
    throw new ConfigError(`Invalid listen address "${value}": expected host:port`);
  }

  const address = trimmed.slice(0, colon);
  if (!address) {
    throw new ConfigError(`Invalid listen address "${value}": missing host`);
  }
  if (address.includes(':')) {
    throw new ConfigError(`Invalid listen address "${value}": wrap IPv6 hosts in brackets`);
  }

  return { address, port: parsePort(trimmed.slice(colon + 1), 'listen port') };
}

function parseHeaders(value: string): Record<string, string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (error) {
    throw new ConfigError(`Invalid OTEL_HEADERS: ${toError(error).message}`);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError('Invalid OTEL_HEADERS: expected a JSON object');
  }

  const headers: Record<string, string> = {};
  for (const [key, header] of Object.entries(parsed)) {
    if (typeof header !== 'string') {
      throw new ConfigError(`Invalid OTEL_HEADERS: header "${key}" must be a string`);
    }
    headers[key] = header;
  }
  return headers;
}

function loadOtelConfig(env: NodeJS.ProcessEnv): OtelConfig {
  const exporterType = env.OTEL_EXPORTER_TYPE || 'otlp';
  if (exporterType !== 'otlp' && exporterType !== 'prometheus') {
    throw new ConfigError(`Invalid OTEL_EXPORTER_TYPE "${exporterType}": expected otlp or prometheus`);
  }

  const config: OtelConfig = {
    enabled: env.OTEL_ENABLED === 'true',
    exporterType,
    endpoint: env.OTEL_ENDPOINT || DEFAULT_OTLP_ENDPOINT,
    prometheusPort: env.OTEL_PROMETHEUS_PORT
      ? parsePort(env.OTEL_PROMETHEUS_PORT, 'OTEL_PROMETHEUS_PORT')
      : DEFAULT_PROMETHEUS_PORT,
  };
  if (env.OTEL_HEADERS) {
    config.headers = parseHeaders(env.OTEL_HEADERS);
  }
  return config;
}

function parseCli(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        cidr: { type: 'string', short: 'c' },
        listen: { type: 'string', short: 'l' },
        'api-port': { type: 'string' },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (error) {
    throw new ConfigError(toError(error).message);
  }
}

/**
 * Build the configuration from command-line flags, falling back to environment variables.
 * The CIDR itself is validated later, when the address pool is built.
 */
export function loadConfig(argv: string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env): AppConfig {
  const flags = parseCli(argv);

  const cidr = flags.cidr ?? env.DNS_CIDR;
  if (!cidr) {
    throw new ConfigError('Missing CIDR block: pass --cidr or set DNS_CIDR');
  }

  const apiPort = parsePort(flags['api-port'] ?? env.API_PORT ?? String(DEFAULT_API_PORT), 'API port');

  return {
    cidr,
    listen: parseListenAddress(flags.listen ?? env.DNS_LISTEN ?? DEFAULT_LISTEN),
    apiPort: apiPort === 0 ? null : apiPort,
    otel: loadOtelConfig(env),
  };
}
