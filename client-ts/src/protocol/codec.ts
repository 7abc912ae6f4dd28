/**
 * Text codec for STOMP frames
 *
 * Wire grammar:
 *   COMMAND LF
 *   (key ":" value LF)*
 *   LF
 *   body? NULL
 *
 * A heartbeat is a lone LF with no command line.
 */

import { ProtocolError } from '../errors';
import { toEntries } from './frames';
import type { Frame, FrameHeaders, HeadersInit, InboundUnit } from './frames';

export const LF = '\n';
export const NULL = '\0';

const COMMAND_PATTERN = /^[A-Z]+$/;
const HEARTBEAT_PATTERN = /^(\r?\n)*$/;
// NULL terminator plus any trailing EOLs some brokers append
const TERMINATOR_PATTERN = /\0(\r?\n)*$/;

const textDecoder = new TextDecoder('utf-8');

/**
 * Encode a frame for the wire. Header and body content is written as given.
 */
export function encodeFrame(command: string, headers: HeadersInit = {}, body?: string): string {
  let result = command + LF;

  for (const [key, value] of toEntries(headers)) {
    result += `${key}:${value}${LF}`;
  }

  result += LF;

  if (body !== undefined) {
    result += body;
  }

  return result + NULL;
}

export function encodeHeartbeat(): string {
  return LF;
}

/**
 * Decode one inbound transport message into a frame or a heartbeat
 */
export function decodeFrame(data: string | Uint8Array): InboundUnit {
  const text = typeof data === 'string' ? data : textDecoder.decode(data);

  if (HEARTBEAT_PATTERN.test(text)) {
    return { type: 'Heartbeat' };
  }

  const lines = text.split(LF);
  const command = lines[0].replace(NULL, '').trim();

  if (!COMMAND_PATTERN.test(command)) {
    throw new ProtocolError('Malformed command line', {
      context: { commandLine: lines[0].slice(0, 64) },
    });
  }

  const headers: FrameHeaders = new Map();
  let i = 1;
  for (; i < lines.length && lines[i] !== '' && lines[i] !== '\r'; i++) {
    const line = lines[i].endsWith('\r') ? lines[i].slice(0, -1) : lines[i];
    const colon = line.indexOf(':');
    // lines without a colon are dropped rather than rejected
    if (colon === -1) continue;
    headers.set(line.slice(0, colon), line.slice(colon + 1));
  }

  const frame: Frame = { command, headers };
  // i is the header terminator; everything past it is body
  if (i >= lines.length) {
    return { type: 'Frame', frame };
  }

  const rest = lines.slice(i + 1).join(LF);
  const body = readBody(rest, headers.get('content-length'));
  if (body !== undefined) {
    frame.body = body;
  }

  return { type: 'Frame', frame };
}

function readBody(rest: string, contentLength: string | undefined): string | undefined {
  if (contentLength !== undefined && /^\d+$/.test(contentLength)) {
    const length = Number(contentLength);
    const bytes = Buffer.from(rest, 'utf8');
    if (length > bytes.length) {
      throw new ProtocolError('Body shorter than content-length', {
        context: { contentLength: length, available: bytes.length },
      });
    }
    return bytes.subarray(0, length).toString('utf8');
  }

  const terminator = TERMINATOR_PATTERN.exec(rest);
  const body = terminator ? rest.slice(0, terminator.index) : rest;

  // nothing but the NULL octet after the headers: no body at all
  if (body === '' && (terminator !== null || rest === '')) {
    return undefined;
  }
  return body;
}
