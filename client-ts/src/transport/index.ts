export type { Transport, TransportFactory, TransportOptions } from './interface';
export { WebSocketTransport, createWebSocketTransport } from './websocket';
export { buildBrokerUrl, type BrokerUrlOptions } from './url';
