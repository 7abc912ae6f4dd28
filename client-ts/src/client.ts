/**
 * Main STOMP client
 */

import { parseClientConfig } from './config';
import type { ClientConfig, ClientConfigInput } from './config';
import { NotConnectedError } from './errors';
import { EventHub } from './events';
import type { EventHandler } from './events';
import { consoleLogger, withDebug } from './logger';
import type { Logger } from './logger';
import { Commands, sendHeaders, subscribeHeaders, unsubscribeHeaders } from './protocol/frames';
import type { HeadersInit } from './protocol/frames';
import { ConnectionSession } from './session/connection';
import type { Credentials } from './session/connection';
import { HeartbeatScheduler } from './session/heartbeat';
import { SubscriptionRegistry } from './session/registry';
import type { MessageCallback, Subscription } from './session/registry';
import type { SessionState, StompEvents } from './session/state';
import { buildBrokerUrl } from './transport/url';
import { createWebSocketTransport } from './transport/websocket';
import type { TransportFactory } from './transport/interface';

export interface ClientOptions extends ClientConfigInput {
  /** Log sink (default: console) */
  logger?: Logger;
  /** Transport constructor (default: `ws` WebSocket) */
  transportFactory?: TransportFactory;
}

export interface SubscriptionHandle {
  /** Subscription ID */
  id: string;
  destination: string;
  /** Remove the callback and send UNSUBSCRIBE */
  unsubscribe(): Promise<boolean>;
}

export type EventType = keyof StompEvents;

export class StompClient {
  readonly url: string;
  private readonly config: ClientConfig;
  private readonly credentials: Readonly<Credentials>;
  private readonly logger: Logger;
  private readonly transportFactory: TransportFactory;
  private readonly registry = new SubscriptionRegistry();
  private readonly events: EventHub<StompEvents>;
  private readonly heartbeat: HeartbeatScheduler;
  private session: ConnectionSession | null = null;
  private pendingConnect: Promise<boolean> | null = null;
  private connected = false;

  constructor(options: ClientOptions) {
    const { logger, transportFactory, ...config } = options;
    this.config = parseClientConfig(config);
    this.logger = withDebug(logger ?? consoleLogger, this.config.debug);
    this.transportFactory = transportFactory ?? createWebSocketTransport;
    this.credentials = Object.freeze({
      username: this.config.username,
      passcode: this.config.passcode,
    });
    this.url = buildBrokerUrl(this.config.host, {
      secure: this.config.secure,
      sockjs: this.config.sockjs,
    });
    this.events = new EventHub<StompEvents>(this.logger);
    this.heartbeat = new HeartbeatScheduler(this.config.heartbeatIntervalMs, this.logger);

    this.events.on('state', ({ from }) => {
      if (from === 'Active') {
        this.connected = false;
        this.heartbeat.stop();
      }
    });
  }

  /**
   * Connect to the broker. Resolves true once CONNECTED arrives, false on an
   * ERROR frame, a closed link or the connect timeout.
   */
  connect(): Promise<boolean> {
    if (this.connected) return Promise.resolve(true);
    if (!this.pendingConnect) {
      this.pendingConnect = this.openSession().finally(() => {
        this.pendingConnect = null;
      });
    }
    return this.pendingConnect;
  }

  /**
   * Subscribe to a destination. A later subscription to the same destination
   * replaces this one.
   */
  subscribe(destination: string, callback: MessageCallback): SubscriptionHandle {
    const session = this.requireSession('subscribe');

    const previous = this.registry.resolve(destination);
    if (previous) {
      void session.transmit(Commands.UNSUBSCRIBE, unsubscribeHeaders(previous.id));
    }

    const subscription = this.registry.register(destination, callback);
    void session.transmit(Commands.SUBSCRIBE, subscribeHeaders(subscription.id, destination));
    this.logger.debug(`Subscribed to ${destination} with subscription ID: ${subscription.id}`);

    return {
      id: subscription.id,
      destination,
      unsubscribe: () => this.unsubscribe(subscription),
    };
  }

  /**
   * Send a message to a destination. Throws when not connected; nothing is
   * queued for later.
   */
  send(destination: string, message: string, headers: HeadersInit = {}): Promise<boolean> {
    const session = this.requireSession('send');
    return session.transmit(Commands.SEND, sendHeaders(destination, message, headers), message);
  }

  /**
   * Disconnect from the broker. No-op when not connected.
   */
  async disconnect(): Promise<void> {
    const session = this.session;
    if (!this.connected || !session) return;

    this.connected = false;
    this.heartbeat.stop();
    await session.disconnect();
  }

  /**
   * Check if the session is active
   */
  isConnected(): boolean {
    return this.connected && this.session?.state === 'Active';
  }

  getState(): SessionState {
    return this.session?.state ?? 'Disconnected';
  }

  getSubscriptions(): Subscription[] {
    return this.registry.list();
  }

  /** MESSAGE frames dropped for lack of a subscription, current session */
  get unroutedMessages(): number {
    return this.session?.unroutedMessages ?? 0;
  }

  on<K extends EventType>(event: K, handler: EventHandler<StompEvents[K]>): void {
    this.events.on(event, handler);
  }

  off<K extends EventType>(event: K, handler: EventHandler<StompEvents[K]>): void {
    this.events.off(event, handler);
  }

  // Private methods

  private async openSession(): Promise<boolean> {
    const previous = this.session;
    if (previous) {
      await previous.close();
    }

    // each attempt gets its own session and transport
    const session = new ConnectionSession({
      url: this.url,
      credentials: this.credentials,
      registry: this.registry,
      events: this.events,
      logger: this.logger,
      transportFactory: this.transportFactory,
      insecure: this.config.insecure,
      pingIntervalMs: this.config.pingIntervalMs,
      heartbeatIntervalMs: this.config.heartbeatIntervalMs,
      acceptVersion: this.config.acceptVersion,
      connectTimeoutMs: this.config.connectTimeoutMs,
    });
    this.session = session;
    // subscriptions belong to the broker-side session that ended
    this.registry.clear();

    const state = await session.open();
    if (state === 'Active') {
      this.connected = true;
      this.heartbeat.start(session);
      return true;
    }

    await session.close();
    return false;
  }

  private async unsubscribe(subscription: Subscription): Promise<boolean> {
    if (!this.registry.unregister(subscription.destination, subscription.id)) {
      return false;
    }
    const session = this.session;
    if (!this.isConnected() || !session) {
      return false;
    }
    return session.transmit(Commands.UNSUBSCRIBE, unsubscribeHeaders(subscription.id));
  }

  private requireSession(operation: string): ConnectionSession {
    const session = this.session;
    if (!this.connected || !session || session.state !== 'Active') {
      throw new NotConnectedError(operation);
    }
    return session;
  }
}
