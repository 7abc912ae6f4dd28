/**
 * STOMP over WebSocket client
 *
 * Speaks STOMP 1.0/1.1 to a broker over a WebSocket (or the raw WebSocket
 * endpoint of a SockJS server).
 *
 * @example
 * ```typescript
 * import { StompClient } from 'stomp-ws-client';
 *
 * const client = new StompClient({
 *   host: 'broker.example.com:61614',
 *   username: 'guest',
 *   passcode: 'guest',
 * });
 *
 * if (await client.connect()) {
 *   // Subscribe to a destination
 *   const sub = client.subscribe('/topic/prices', (body) => {
 *     console.log('Received:', body);
 *   });
 *
 *   // Publish a message
 *   await client.send('/topic/prices', JSON.stringify({ symbol: 'ABC', price: 1.5 }));
 *
 *   // Clean up
 *   await sub.unsubscribe();
 *   await client.disconnect();
 * }
 * ```
 */

export { StompClient, type ClientOptions, type SubscriptionHandle, type EventType } from './client';
export {
  ClientConfigSchema,
  parseClientConfig,
  DEFAULT_HEARTBEAT_INTERVAL_MS,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_PING_INTERVAL_MS,
  type ClientConfig,
  type ClientConfigInput,
} from './config';
export {
  StompError,
  ProtocolError,
  BrokerError,
  ConnectionLostError,
  UnroutedMessageError,
  ConnectTimeoutError,
  NotConnectedError,
  ConfigError,
} from './errors';
export { EventHub, type EventHandler } from './events';
export { consoleLogger, silentLogger, withDebug, type Logger } from './logger';
export * from './protocol';
export { ConnectionSession, type ConnectionSessionOptions, type Credentials } from './session/connection';
export { HeartbeatScheduler, type HeartbeatTarget } from './session/heartbeat';
export { SubscriptionRegistry, type Subscription, type MessageCallback } from './session/registry';
export type { SessionState, StompEvents, ConnectedInfo } from './session/state';
export * from './transport';
