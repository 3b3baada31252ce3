import { MeterProvider, PeriodicExportingMetricReader, type MetricReader } from '@opentelemetry/sdk-metrics';
import type { Counter, Histogram } from '@opentelemetry/api';
import { resourceFromAttributes } from '@opentelemetry/resources';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
// Protobuf encoding is what most OTLP backends accept
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-proto';
import { PrometheusExporter } from '@opentelemetry/exporter-prometheus';
import { logger } from './logger.js';
import { toError } from './errors.js';

export type OtelConfig = {
  enabled: boolean;
  exporterType: 'otlp' | 'prometheus';
  endpoint: string;
  headers?: Record<string, string>;
  prometheusPort?: number;
};

export type QueryOutcome = 'answered' | 'dropped';

interface DNSInstruments {
  queries: Counter;
  dropped: Counter;
  responseTime: Histogram;
}

const SERVICE_NAME = 'sinkhole-dns';
const SERVICE_VERSION = '1.0.0';
const DEFAULT_PROMETHEUS_PORT = 9464;
const EXPORT_INTERVAL_MS = 10000;

let meterProvider: MeterProvider | null = null;
let instruments: DNSInstruments | null = null;

function maskHeaders(headers: Record<string, string>): Record<string, string> {
  const masked: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    masked[key] = key.toLowerCase() === 'authorization' ? `${value.substring(0, 10)}... (length: ${value.length})` : value;
  }
  return masked;
}

/**
 * Initialize OpenTelemetry metrics. Replaces any provider set up earlier.
 */
export async function initializeOtelMetrics(config: OtelConfig): Promise<void> {
  await shutdownOtelMetrics();

  if (!config.enabled) {
    logger.info('OpenTelemetry metrics disabled');
    return;
  }

  try {
    const resource = resourceFromAttributes({
      [ATTR_SERVICE_NAME]: SERVICE_NAME,
      [ATTR_SERVICE_VERSION]: SERVICE_VERSION,
    });

    const readers: MetricReader[] = [];

    if (config.exporterType === 'prometheus') {
      const port = config.prometheusPort || DEFAULT_PROMETHEUS_PORT;
      readers.push(
        new PrometheusExporter({ port, endpoint: '/metrics' }, (error) => {
          if (error) {
            logger.error('Prometheus metrics endpoint failed to start', error, { port });
          } else {
            logger.info('Prometheus metrics endpoint started', { port });
          }
        }),
      );
    } else {
      const headers = config.headers || {};
      logger.debug('OpenTelemetry OTLP exporter configuration', {
        endpoint: config.endpoint,
        headers: maskHeaders(headers),
      });

      readers.push(
        new PeriodicExportingMetricReader({
          exporter: new OTLPMetricExporter({ url: config.endpoint, headers }),
          exportIntervalMillis: EXPORT_INTERVAL_MS,
        }),
      );
    }

    meterProvider = new MeterProvider({ resource, readers });

    const meter = meterProvider.getMeter(SERVICE_NAME, SERVICE_VERSION);
    instruments = {
      queries: meter.createCounter('dns.queries', {
        description: 'Number of DNS datagrams received',
      }),
      dropped: meter.createCounter('dns.queries.dropped', {
        description: 'Number of DNS datagrams dropped without a response',
      }),
      responseTime: meter.createHistogram('dns.response_time', {
        description: 'Time to build a DNS response in milliseconds',
        unit: 'ms',
      }),
    };

    logger.info('OpenTelemetry metrics initialized', {
      exporterType: config.exporterType,
      endpoint:
        config.exporterType === 'otlp'
          ? config.endpoint
          : `http://localhost:${config.prometheusPort || DEFAULT_PROMETHEUS_PORT}/metrics`,
    });
  } catch (error) {
    logger.error('Failed to initialize OpenTelemetry metrics', toError(error));
    meterProvider = null;
    instruments = null;
  }
}

export async function shutdownOtelMetrics(): Promise<void> {
  const provider = meterProvider;
  meterProvider = null;
  instruments = null;
  if (!provider) return;

  try {
    await provider.shutdown();
  } catch (error) {
    logger.error('Error shutting down OpenTelemetry metrics', toError(error));
  }
}

export function isOtelEnabled(): boolean {
  return instruments !== null;
}

/**
 * Record one handled datagram. No-op while metrics are disabled.
 */
export function recordDNSQuery(attributes: {
  outcome: QueryOutcome;
  type?: string;
  errorKind?: string;
  responseTime?: number;
}): void {
  if (!instruments) return;

  try {
    const queryAttributes: Record<string, string> = { 'dns.query.outcome': attributes.outcome };
    if (attributes.type) queryAttributes['dns.query.type'] = attributes.type;

    instruments.queries.add(1, queryAttributes);

    if (attributes.outcome === 'dropped') {
      instruments.dropped.add(1, { 'dns.error.kind': attributes.errorKind || 'unknown' });
    }

    if (attributes.responseTime !== undefined) {
      instruments.responseTime.record(attributes.responseTime, queryAttributes);
    }
  } catch (error) {
    logger.error('Error recording DNS query metrics', toError(error), { attributes });
  }
}
