/**
 * STOMP frame types and the frames this client sends
 */

/** Ordered header mapping; insertion order is wire order */
export type FrameHeaders = Map<string, string>;

export type HeadersInit = FrameHeaders | Record<string, string>;

export interface Frame {
  command: string;
  headers: FrameHeaders;
  /** Absent when the frame carries no body at all */
  body?: string;
}

// Decoder output: a heartbeat is never a frame with an empty command
export type InboundUnit =
  | { type: 'Frame'; frame: Frame }
  | { type: 'Heartbeat' };

export const Commands = {
  CONNECT: 'CONNECT',
  CONNECTED: 'CONNECTED',
  SUBSCRIBE: 'SUBSCRIBE',
  UNSUBSCRIBE: 'UNSUBSCRIBE',
  SEND: 'SEND',
  MESSAGE: 'MESSAGE',
  ERROR: 'ERROR',
  DISCONNECT: 'DISCONNECT',
} as const;

export type ClientCommand = 'CONNECT' | 'SUBSCRIBE' | 'UNSUBSCRIBE' | 'SEND' | 'DISCONNECT';

export const ACCEPT_VERSIONS = '1.0,1.1';

export const ACK_MODE = 'client';

export type AckMode = typeof ACK_MODE;

export interface ConnectParams {
  host: string;
  acceptVersion: string;
  heartbeatMs: number;
  login?: string;
  passcode?: string;
}

export function connectHeaders(params: ConnectParams): FrameHeaders {
  const headers: FrameHeaders = new Map([
    ['host', params.host],
    ['accept-version', params.acceptVersion],
    // client proposes the same interval for sending and expecting
    ['heart-beat', `${params.heartbeatMs},${params.heartbeatMs}`],
  ]);
  if (params.login !== undefined) headers.set('login', params.login);
  if (params.passcode !== undefined) headers.set('passcode', params.passcode);
  return headers;
}

export function subscribeHeaders(id: string, destination: string): FrameHeaders {
  return new Map([
    ['id', id],
    ['ack', ACK_MODE],
    ['destination', destination],
  ]);
}

export function unsubscribeHeaders(id: string): FrameHeaders {
  return new Map([['id', id]]);
}

export function sendHeaders(destination: string, body: string, extra: HeadersInit = {}): FrameHeaders {
  const headers: FrameHeaders = new Map([
    ['destination', destination],
    ['content-length', String(Buffer.byteLength(body, 'utf8'))],
  ]);
  for (const [key, value] of toEntries(extra)) {
    if (!headers.has(key)) headers.set(key, value);
  }
  return headers;
}

export function toEntries(headers: HeadersInit): Iterable<[string, string]> {
  return headers instanceof Map ? headers.entries() : Object.entries(headers);
}

/**
 * Parse a `heart-beat` header value ("cx,cy") into milliseconds
 */
export function parseHeartBeat(value: string | undefined): { send: number; receive: number } | undefined {
  if (!value) return undefined;
  const match = /^\s*(\d+)\s*,\s*(\d+)\s*$/.exec(value);
  if (!match) return undefined;
  return { send: Number(match[1]), receive: Number(match[2]) };
}
