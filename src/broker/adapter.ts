/**
 * BrokerAdapter - JSON publish/subscribe over NATS
 *
 * Reconnects with jittered exponential backoff. Incoming events carrying an
 * event_id are checked against a duplicate window; handlers decide what to
 * do with a redelivery.
 */
import { connect, DebugEvents, Events, NatsConnection, Subscription, StringCodec } from 'nats';
import { EventEmitter } from 'events';
import Config from '../config';
import { logger } from '../utils/logger';
import { metrics } from '../metrics/metrics';
import { Publisher } from '../sync/notifier';
import { DuplicateTracker } from './duplicates';

export interface MessageContext {
  subject: string;
  isDuplicate: boolean;
  originalTimestamp?: string;
}

/** Payloads arrive unparsed; handlers validate them */
export type MessageHandler = (data: unknown, context: MessageContext) => Promise<void> | void;

export interface BrokerOptions {
  url: string;
  /** Queue group shared by every worker instance */
  queueGroup: string;
  timeout: number;
  reconnectAttempts: number;
  reconnectTimeWait: number;
}

type ConnectionStatus = 'disconnected' | 'connecting' | 'connected';

const MAX_RECONNECT_DELAY_MS = 30000;
const PRUNE_INTERVAL_MS = 60000;

function eventIdOf(data: unknown): string | undefined {
  if (data !== null && typeof data === 'object' && 'event_id' in data && typeof data.event_id === 'string') {
    return data.event_id;
  }
  return undefined;
}

export class BrokerAdapter extends EventEmitter implements Publisher {
  private connection: NatsConnection | null = null;
  private connectionPromise: Promise<NatsConnection> | null = null;
  private status: ConnectionStatus = 'disconnected';
  private reconnectAttempts = 0;
  private readonly subscriptions: Map<string, Subscription> = new Map();
  private readonly codec = StringCodec();
  private readonly duplicates = new DuplicateTracker();
  private pruneTimer: NodeJS.Timeout | null = null;
  private readonly options: BrokerOptions;

  constructor(options: Partial<BrokerOptions> = {}) {
    super();
    this.options = {
      url: options.url ?? Config.broker.url,
      queueGroup: options.queueGroup ?? `index-worker-${process.env.NODE_ENV || 'development'}`,
      timeout: options.timeout ?? Config.broker.timeout,
      reconnectAttempts: options.reconnectAttempts ?? Config.broker.reconnectAttempts,
      reconnectTimeWait: options.reconnectTimeWait ?? Config.broker.reconnectTimeWait,
    };
  }

  get connectionStatus(): ConnectionStatus {
    return this.status;
  }

  /**
   * Connect, or return the live connection. Concurrent callers share one
   * connection attempt.
   */
  async connect(): Promise<NatsConnection> {
    if (this.connection && !this.connection.isClosed()) {
      return this.connection;
    }
    if (this.connectionPromise) {
      return this.connectionPromise;
    }

    this.status = 'connecting';
    this.connectionPromise = this.attemptConnect().finally(() => {
      this.connectionPromise = null;
    });
    return this.connectionPromise;
  }

  private reconnectDelay(): number {
    const jitter = Math.random() * 100;
    const delay = Math.min(
      this.options.reconnectTimeWait * Math.pow(1.5, this.reconnectAttempts) + jitter,
      MAX_RECONNECT_DELAY_MS
    );
    this.reconnectAttempts++;
    return delay;
  }

  private async attemptConnect(): Promise<NatsConnection> {
    logger.info({ url: this.options.url }, 'Connecting to NATS server');

    let nc: NatsConnection;
    try {
      nc = await connect({
        servers: this.options.url,
        timeout: this.options.timeout,
        maxReconnectAttempts: this.options.reconnectAttempts,
        reconnectTimeWait: this.options.reconnectTimeWait,
        reconnectDelayHandler: () => this.reconnectDelay(),
      });
    } catch (error) {
      logger.error({ error, url: this.options.url }, 'Failed to connect to NATS');
      this.status = 'disconnected';
      this.emit('error', error);
      throw error;
    }

    this.connection = nc;
    this.status = 'connected';
    this.reconnectAttempts = 0;
    this.startPruning();
    logger.info({ url: this.options.url }, 'Connected to NATS server');
    this.emit('connect');

    this.watchStatus(nc).catch(error => logger.error({ error }, 'Error processing NATS status events'));
    nc.closed()
      .then(error => {
        if (error) {
          logger.error({ error }, 'NATS connection closed with error');
          this.emit('error', error);
        } else {
          logger.info('NATS connection closed');
        }
        if (this.connection === nc) {
          this.connection = null;
          this.status = 'disconnected';
        }
      })
      .catch(error => logger.error({ error }, 'Error watching NATS connection closure'));

    return nc;
  }

  private async watchStatus(nc: NatsConnection): Promise<void> {
    for await (const status of nc.status()) {
      switch (status.type) {
        case DebugEvents.Reconnecting:
          logger.warn({ attempts: this.reconnectAttempts }, 'Reconnecting to NATS');
          this.emit('reconnecting', this.reconnectAttempts);
          break;
        case Events.Reconnect:
          this.status = 'connected';
          this.reconnectAttempts = 0;
          logger.info('Reconnected to NATS');
          this.emit('connect');
          break;
        case Events.Disconnect:
          this.status = 'disconnected';
          logger.warn('Disconnected from NATS');
          this.emit('disconnect');
          break;
        default:
          logger.debug({ type: status.type }, 'NATS status update');
      }
    }
  }

  private startPruning(): void {
    if (this.pruneTimer) return;
    this.pruneTimer = setInterval(() => {
      const removed = this.duplicates.prune();
      if (removed > 0) {
        logger.debug({ removed, remaining: this.duplicates.size }, 'Pruned duplicate detection window');
      }
    }, PRUNE_INTERVAL_MS);
    this.pruneTimer.unref();
  }

  /**
   * Subscribe in the worker queue group. Handler errors are logged and do
   * not end the subscription.
   */
  async subscribe(subject: string, handler: MessageHandler): Promise<Subscription> {
    const nc = await this.connect();

    const sub = nc.subscribe(subject, {
      queue: this.options.queueGroup,
      callback: (err, msg) => {
        if (err) {
          logger.error({ error: err, subject }, 'Error in subscription');
          return;
        }
        this.dispatch(subject, msg.data, handler).catch(error =>
          logger.error({ error, subject }, 'Error processing message'));
      },
    });

    this.subscriptions.set(subject, sub);
    logger.info({ subject, queue: this.options.queueGroup }, 'Subscribed to subject');
    return sub;
  }

  private async dispatch(subject: string, payload: Uint8Array, handler: MessageHandler): Promise<void> {
    const text = this.codec.decode(payload);
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      logger.warn({ error, subject, data: text.slice(0, 200) }, 'Dropping message that is not JSON');
      return;
    }

    const context: MessageContext = { subject, isDuplicate: false };
    const eventId = eventIdOf(data);
    if (eventId !== undefined) {
      const check = this.duplicates.record(eventId);
      if (check.isDuplicate) {
        context.isDuplicate = true;
        context.originalTimestamp = check.firstSeen;
        metrics.duplicatesDetected.inc();
        logger.debug({ eventId, firstSeen: check.firstSeen, count: check.count }, 'Detected duplicate event_id');
      }
    }

    await handler(data, context);
  }

  async publish<T>(subject: string, data: T): Promise<void> {
    const nc = await this.connect();
    nc.publish(subject, this.codec.encode(JSON.stringify(data)));
    logger.debug({ subject }, 'Published message to subject');
  }

  /** Drain subscriptions and close the connection */
  async close(): Promise<void> {
    if (this.pruneTimer) {
      clearInterval(this.pruneTimer);
      this.pruneTimer = null;
    }
    const nc = this.connection;
    if (!nc || nc.isClosed()) {
      return;
    }

    logger.info({ subscriptions: this.subscriptions.size }, 'Closing broker connection');
    await nc.drain();
    this.subscriptions.clear();
    this.duplicates.clear();
    this.connection = null;
    this.status = 'disconnected';
    logger.info('Broker connection closed');
  }

  static async connect(options: Partial<BrokerOptions> = {}): Promise<BrokerAdapter> {
    const broker = new BrokerAdapter(options);
    await broker.connect();
    return broker;
  }
}

export default BrokerAdapter;
