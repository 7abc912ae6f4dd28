/**
 * WebSocket transport implementation on top of `ws`
 */

import WebSocket from 'ws';
import { ConnectionLostError } from '../errors';
import type { Transport, TransportFactory, TransportOptions } from './interface';

const DEFAULT_OPTIONS: TransportOptions = { insecure: false, pingIntervalMs: 0 };

export class WebSocketTransport implements Transport {
  private socket: WebSocket | null = null;
  private messageHandler: ((data: string | Uint8Array) => void) | null = null;
  private closeHandler: ((code?: number, reason?: string) => void) | null = null;
  private errorHandler: ((error: Error) => void) | null = null;
  private pingTimer: NodeJS.Timeout | null = null;
  private awaitingPong = false;

  constructor(
    private readonly url: string,
    private readonly options: TransportOptions = DEFAULT_OPTIONS,
  ) {}

  connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      let opened = false;
      const socket = new WebSocket(this.url, {
        rejectUnauthorized: !this.options.insecure,
      });
      this.socket = socket;

      socket.on('open', () => {
        opened = true;
        this.startPing(socket);
        resolve();
      });

      socket.on('message', (data, isBinary) => {
        const buffer = toBuffer(data);
        this.messageHandler?.(isBinary ? buffer : buffer.toString('utf8'));
      });

      socket.on('pong', () => {
        this.awaitingPong = false;
      });

      socket.on('close', (code, reason) => {
        this.stopPing();
        if (this.socket === socket) {
          this.socket = null;
        }
        const text = reason.toString('utf8') || undefined;
        if (!opened) {
          reject(new ConnectionLostError('WebSocket closed before opening', { context: { code, reason: text } }));
          return;
        }
        this.closeHandler?.(code, text);
      });

      // `ws` follows every error with a close event
      socket.on('error', (err) => {
        if (!opened) {
          reject(new ConnectionLostError(`WebSocket connection failed: ${err.message}`, { cause: err }));
          return;
        }
        this.errorHandler?.(err);
      });
    });
  }

  disconnect(code = 1000, reason = 'Client disconnect'): Promise<void> {
    this.stopPing();
    if (this.socket) {
      this.socket.close(code, reason);
      this.socket = null;
    }
    return Promise.resolve();
  }

  send(text: string): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new ConnectionLostError('WebSocket is not open'));
    }
    return new Promise((resolve, reject) => {
      socket.send(text, (err) => {
        if (err) {
          reject(new ConnectionLostError(`WebSocket send failed: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  isConnected(): boolean {
    return this.socket !== null && this.socket.readyState === WebSocket.OPEN;
  }

  onMessage(handler: (data: string | Uint8Array) => void): void {
    this.messageHandler = handler;
  }

  onClose(handler: (code?: number, reason?: string) => void): void {
    this.closeHandler = handler;
  }

  onError(handler: (error: Error) => void): void {
    this.errorHandler = handler;
  }

  // A ping still unanswered at the next tick means the peer is gone
  private startPing(socket: WebSocket): void {
    if (this.options.pingIntervalMs <= 0) return;
    this.stopPing();
    this.awaitingPong = false;
    this.pingTimer = setInterval(() => {
      if (this.awaitingPong) {
        socket.terminate();
        return;
      }
      this.awaitingPong = true;
      socket.ping();
    }, this.options.pingIntervalMs);
  }

  private stopPing(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
  }
}

export const createWebSocketTransport: TransportFactory = (url, options) => new WebSocketTransport(url, options);

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}
