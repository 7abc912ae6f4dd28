export interface BrokerUrlOptions {
  /** wss when true (default), ws otherwise */
  secure?: boolean;
  /** Target the raw WebSocket endpoint of a SockJS server */
  sockjs?: boolean;
}

/**
 * Build the broker URL: scheme://host[/websocket]
 *
 * `host` may carry a port and a path, e.g. "broker.local:61614" or "host/stomp".
 */
export function buildBrokerUrl(host: string, options: BrokerUrlOptions = {}): string {
  const scheme = options.secure === false ? 'ws' : 'wss';
  const target = options.sockjs ? `${host}/websocket` : host;
  return `${scheme}://${target}`;
}
