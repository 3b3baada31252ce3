import dgram from 'dgram';
import net from 'net';
import type { AddressPool } from './address-pool.js';
import { recordTypeName } from './dns-message.js';
import { isResponderError, toError, type ResponderErrorKind } from './errors.js';
import { logger } from './logger.js';
import { recordDNSQuery } from './otel-metrics.js';
import { answerQuery } from './query-responder.js';

/**
 * Bytes of each datagram handed to the responder; anything beyond is cut off
 */
export const MAX_UDP_PAYLOAD = 512;

const DEFAULT_QUERY_LOG_SIZE = 1000;

export interface DNSServerOptions {
  pool: AddressPool;
  bindAddress: string;
  port: number;
  queryLogSize?: number;
}

export interface QueryLogEntry {
  id: number;
  domain: string;
  type: string;
  answer: string;
  clientIp: string;
  timestamp: number;
  responseTime: number; // ms
}

export type DropReason = ResponderErrorKind | 'Internal';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface DNSHealth {
  status: HealthStatus;
  startTime: string; // ISO timestamp
  uptime: number; // seconds
  listening: boolean;
  queryCount: number;
  answeredCount: number;
  droppedCount: number;
  errorRate: number; // percent of received datagrams that were dropped
  lastQueryTime: string | null; // ISO timestamp
}

export interface DNSStats {
  totalQueries: number;
  answeredQueries: number;
  droppedQueries: number;
  dropReasons: Record<DropReason, number>;
  queryTypeBreakdown: Array<{ type: string; count: number }>;
  avgResponseTime: number | null;
  pool: {
    cidr: string;
    firstUsable: string;
    lastUsable: string;
    usableAddresses: number;
  };
}

export class DNSServer {
  private socket: dgram.Socket | null = null;
  private listening = false;
  private readonly pool: AddressPool;
  private readonly bindAddress: string;
  private readonly port: number;
  private readonly queryLogSize: number;
  private startTime: number = Date.now();
  private queryCount = 0;
  private answeredCount = 0;
  private droppedCount = 0;
  private totalResponseTime = 0;
  private lastQueryTime = 0;
  private nextQueryId = 1;
  private dropReasons: Record<DropReason, number> = {
    InvalidNetwork: 0,
    RangeTooSmall: 0,
    MalformedRequest: 0,
    NoQuestion: 0,
    EncodeError: 0,
    Internal: 0,
  };
  private queryTypes: Map<string, number> = new Map();
  private queries: QueryLogEntry[] = []; // newest first

  constructor(options: DNSServerOptions) {
    this.pool = options.pool;
    this.bindAddress = options.bindAddress;
    this.port = options.port;
    this.queryLogSize = options.queryLogSize ?? DEFAULT_QUERY_LOG_SIZE;
  }

  /**
   * Build the response for one datagram, or return null when it is dropped.
   * Never throws: every failure is logged and counted.
   */
  handleDNSQuery(msg: Buffer, clientIp: string): Buffer | null {
    const started = performance.now();
    this.queryCount++;
    this.lastQueryTime = Date.now();

    const request = msg.length > MAX_UDP_PAYLOAD ? msg.subarray(0, MAX_UDP_PAYLOAD) : msg;

    try {
      const { response, question, address } = answerQuery(request, () => this.pool.sample());
      const responseTime = performance.now() - started;
      const type = recordTypeName(question.type);

      this.answeredCount++;
      this.totalResponseTime += responseTime;
      this.queryTypes.set(type, (this.queryTypes.get(type) || 0) + 1);
      this.addQuery({
        id: this.nextQueryId++,
        domain: question.name,
        type,
        answer: address,
        clientIp,
        timestamp: this.lastQueryTime,
        responseTime,
      });
      recordDNSQuery({ outcome: 'answered', type, responseTime });

      logger.debug('Answered DNS query', { domain: question.name, type, answer: address, clientIp });
      return response;
    } catch (error) {
      const reason: DropReason = isResponderError(error) ? error.kind : 'Internal';
      this.droppedCount++;
      this.dropReasons[reason]++;
      recordDNSQuery({ outcome: 'dropped', errorKind: reason });

      if (isResponderError(error)) {
        logger.warn('Dropped DNS datagram', { reason, error: error.message, clientIp, size: msg.length });
      } else {
        logger.error('Error handling DNS datagram', toError(error), { clientIp, size: msg.length });
      }
      return null;
    }
  }

  private addQuery(query: QueryLogEntry) {
    this.queries.unshift(query);
    if (this.queries.length > this.queryLogSize) {
      this.queries.length = this.queryLogSize;
    }
  }

  async start(): Promise<void> {
    if (this.socket) {
      throw new Error('DNS server is already running');
    }

    const socket = dgram.createSocket(net.isIPv6(this.bindAddress) ? 'udp6' : 'udp4');
    this.socket = socket;

    socket.on('message', (msg, rinfo) => {
      const response = this.handleDNSQuery(msg, rinfo.address);
      if (!response) return;

      socket.send(response, rinfo.port, rinfo.address, (err) => {
        if (err) {
          logger.error('Error sending UDP response', err, { clientIp: rinfo.address });
        }
      });
    });

    return new Promise<void>((resolve, reject) => {
      socket.on('error', (err) => {
        // After binding, errors are logged but do not stop the server
        if (this.listening) {
          logger.error('UDP DNS server error', err);
        } else {
          if (this.socket === socket) this.socket = null;
          socket.close();
          reject(err);
        }
      });

      // stop() before the bind completes closes the socket without it ever listening
      socket.once('close', () => {
        if (!this.listening) resolve();
      });

      socket.bind(this.port, this.bindAddress, () => {
        if (this.socket !== socket) {
          resolve();
          return;
        }
        this.listening = true;
        this.startTime = Date.now();
        logger.info('DNS server (UDP) running', {
          address: this.bindAddress,
          port: this.getPort(),
          cidr: this.pool.cidr,
        });
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    const socket = this.socket;
    if (!socket) return;

    this.socket = null;
    this.listening = false;
    await new Promise<void>((resolve) => socket.close(() => resolve()));
    logger.info('DNS server (UDP) stopped');
  }

  isListening(): boolean {
    return this.listening;
  }

  /**
   * The bound port once listening (resolves port 0 to the ephemeral port)
   */
  getPort(): number {
    if (this.socket && this.listening) {
      return this.socket.address().port;
    }
    return this.port;
  }

  getBindAddress(): string {
    return this.bindAddress;
  }

  getQueries(limit: number = 100): QueryLogEntry[] {
    return this.queries.slice(0, Math.max(0, limit));
  }

  getHealth(): DNSHealth {
    const errorRate = this.queryCount > 0 ? (this.droppedCount / this.queryCount) * 100 : 0;

    // Unhealthy when not serving; degraded when more than 10% of datagrams are dropped
    let status: HealthStatus = 'healthy';
    if (!this.listening) {
      status = 'unhealthy';
    } else if (this.queryCount > 0 && errorRate > 10) {
      status = 'degraded';
    }

    return {
      status,
      startTime: new Date(this.startTime).toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      listening: this.listening,
      queryCount: this.queryCount,
      answeredCount: this.answeredCount,
      droppedCount: this.droppedCount,
      errorRate: Math.round(errorRate * 100) / 100,
      lastQueryTime: this.lastQueryTime ? new Date(this.lastQueryTime).toISOString() : null,
    };
  }

  getStats(): DNSStats {
    const queryTypeBreakdown = Array.from(this.queryTypes.entries())
      .map(([type, count]) => ({ type, count }))
      .sort((a, b) => b.count - a.count || a.type.localeCompare(b.type));

    return {
      totalQueries: this.queryCount,
      answeredQueries: this.answeredCount,
      droppedQueries: this.droppedCount,
      dropReasons: { ...this.dropReasons },
      queryTypeBreakdown,
      avgResponseTime: this.answeredCount > 0 ? this.totalResponseTime / this.answeredCount : null,
      pool: {
        cidr: this.pool.cidr,
        firstUsable: this.pool.firstUsable,
        lastUsable: this.pool.lastUsable,
        usableAddresses: this.pool.range - 2,
      },
    };
  }
}
