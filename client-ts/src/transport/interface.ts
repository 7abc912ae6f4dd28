/**
 * Transport interface for the STOMP client
 * Abstracts over the socket carrying STOMP text frames
 */

export interface Transport {
  /** Open the link; resolves once it is usable */
  connect(): Promise<void>;

  /** Close the link */
  disconnect(code?: number, reason?: string): Promise<void>;

  /** Send one text message; rejects when the link is down */
  send(text: string): Promise<void>;

  /** Check if the link is open */
  isConnected(): boolean;

  /** Register message handler */
  onMessage(handler: (data: string | Uint8Array) => void): void;

  /** Register close handler */
  onClose(handler: (code?: number, reason?: string) => void): void;

  /** Register error handler */
  onError(handler: (error: Error) => void): void;
}

export interface TransportOptions {
  /** Accept self-signed or otherwise unverifiable certificates */
  insecure: boolean;
  /** Transport-level ping interval in ms, 0 disables */
  pingIntervalMs: number;
}

export type TransportFactory = (url: string, options: TransportOptions) => Transport;
