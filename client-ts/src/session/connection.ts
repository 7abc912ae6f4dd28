/**
 * One STOMP connection over one transport: the handshake, inbound dispatch
 * and serialized writes.
 *
 * Disconnected -> Connecting -> Active -> Closed
 *                      \          \
 *                       +----------+-> Failed -> Closed
 */

import {
  BrokerError,
  ConnectionLostError,
  ConnectTimeoutError,
  ProtocolError,
  StompError,
  UnroutedMessageError,
} from '../errors';
import type { EventHub } from '../events';
import type { Logger } from '../logger';
import { decodeFrame, encodeFrame, encodeHeartbeat } from '../protocol/codec';
import { Commands, connectHeaders, parseHeartBeat } from '../protocol/frames';
import type { ClientCommand, Frame, HeadersInit, InboundUnit } from '../protocol/frames';
import type { Transport, TransportFactory } from '../transport/interface';
import type { HeartbeatTarget } from './heartbeat';
import type { SubscriptionRegistry } from './registry';
import { SETTLED_STATES } from './state';
import type { ConnectedInfo, SessionState, StompEvents } from './state';

export interface Credentials {
  username?: string;
  passcode?: string;
}

export interface ConnectionSessionOptions {
  url: string;
  credentials: Readonly<Credentials>;
  registry: SubscriptionRegistry;
  events: EventHub<StompEvents>;
  logger: Logger;
  transportFactory: TransportFactory;
  insecure: boolean;
  pingIntervalMs: number;
  heartbeatIntervalMs: number;
  acceptVersion: string;
  /** 0 disables the timeout */
  connectTimeoutMs: number;
}

export class ConnectionSession implements HeartbeatTarget {
  private currentState: SessionState = 'Disconnected';
  private transport: Transport | null = null;
  private writeChain: Promise<boolean> = Promise.resolve(true);
  private connectTimer: NodeJS.Timeout | null = null;
  private settle: ((state: SessionState) => void) | null = null;
  private readonly settled: Promise<SessionState>;
  private disconnecting: Promise<void> | null = null;
  private connectedInfo: ConnectedInfo | null = null;
  private unrouted = 0;
  private lastHeartbeat: number | null = null;

  constructor(private readonly options: ConnectionSessionOptions) {
    this.settled = new Promise((resolve) => {
      this.settle = resolve;
    });
  }

  get state(): SessionState {
    return this.currentState;
  }

  get url(): string {
    return this.options.url;
  }

  /** Headers of the CONNECTED frame, once Active */
  get info(): ConnectedInfo | null {
    return this.connectedInfo;
  }

  get unroutedMessages(): number {
    return this.unrouted;
  }

  /** Epoch ms of the last heartbeat received from the broker */
  get lastHeartbeatAt(): number | null {
    return this.lastHeartbeat;
  }

  private get logger(): Logger {
    return this.options.logger;
  }

  /**
   * Open the transport and send CONNECT. Resolves with the first settled
   * state: Active, Failed or Closed.
   */
  async open(): Promise<SessionState> {
    if (this.currentState !== 'Disconnected') {
      throw new StompError(`Session already opened (state: ${this.currentState})`);
    }

    this.transition('Connecting');
    this.armConnectTimeout();

    // the timeout may settle the session while the socket is still opening
    await Promise.race([this.openTransport(this.createTransport()), this.settled]);
    return this.settled;
  }

  /**
   * Encode and write a frame. Resolves false (and reports) when the frame
   * could not be written; never rejects.
   */
  transmit(command: ClientCommand, headers: HeadersInit = {}, body?: string): Promise<boolean> {
    const allowed = command === Commands.CONNECT ? this.currentState === 'Connecting' : this.currentState === 'Active';
    if (!allowed) {
      this.logger.warn(`Not sending ${command} in state ${this.currentState}`);
      return Promise.resolve(false);
    }
    return this.write(encodeFrame(command, headers, body), command);
  }

  transmitHeartbeat(): Promise<boolean> {
    return this.write(encodeHeartbeat(), 'heartbeat');
  }

  /**
   * Send DISCONNECT and close the transport. No-op unless Active.
   */
  disconnect(): Promise<void> {
    if (this.disconnecting) return this.disconnecting;
    if (this.currentState !== 'Active') return Promise.resolve();

    this.disconnecting = (async () => {
      // best effort: a failed write is already reported by write()
      const delivered = await this.transmit(Commands.DISCONNECT);
      if (!delivered) {
        this.logger.debug('DISCONNECT was not delivered');
      }
      this.transition('Closed');
      await this.releaseTransport();
    })();
    return this.disconnecting;
  }

  /**
   * Drop the transport without a DISCONNECT frame
   */
  async close(): Promise<void> {
    this.clearConnectTimeout();
    this.transition('Closed');
    await this.releaseTransport();
  }

  private createTransport(): Transport {
    const { url, insecure, pingIntervalMs } = this.options;
    const transport = this.options.transportFactory(url, { insecure, pingIntervalMs });
    this.transport = transport;

    // a released transport may still deliver events; they belong to no session
    transport.onMessage((data) => {
      if (this.transport === transport) this.handleInbound(data);
    });
    transport.onClose((code, reason) => {
      if (this.transport === transport) this.handleTransportClosed(code, reason);
    });
    transport.onError((error) => {
      if (this.transport === transport) this.handleTransportError(error);
    });

    return transport;
  }

  private async openTransport(transport: Transport): Promise<void> {
    try {
      await transport.connect();
    } catch (error) {
      if (this.currentState === 'Connecting') {
        this.report('error', new ConnectionLostError(`Could not open ${this.options.url}`, { cause: error }));
        this.transition('Closed');
      }
      return;
    }

    if (this.currentState !== 'Connecting') {
      this.logger.debug(`Transport opened in state ${this.currentState}, closing it`);
      await this.releaseTransport(transport);
      return;
    }

    this.logger.debug('Transport opened, sending CONNECT');
    const { credentials, acceptVersion, heartbeatIntervalMs, url } = this.options;
    await this.transmit(
      Commands.CONNECT,
      connectHeaders({
        host: url,
        acceptVersion,
        heartbeatMs: heartbeatIntervalMs,
        login: credentials.username,
        passcode: credentials.passcode,
      }),
    );
  }

  private write(payload: string, label: string): Promise<boolean> {
    const result = this.writeChain.then(() => this.writeNow(payload, label));
    this.writeChain = result;
    return result;
  }

  private async writeNow(payload: string, label: string): Promise<boolean> {
    const transport = this.transport;
    if (!transport || !transport.isConnected()) {
      this.report('error', new ConnectionLostError(`Cannot send ${label}: connection is closed`));
      return false;
    }

    try {
      await transport.send(payload);
    } catch (error) {
      this.report('error', new ConnectionLostError(`Error sending ${label}`, { cause: error }));
      return false;
    }

    this.logger.debug(`>>> ${redact(payload)}`);
    return true;
  }

  private handleInbound(data: string | Uint8Array): void {
    let unit: InboundUnit;
    try {
      unit = decodeFrame(data);
    } catch (error) {
      const reported =
        error instanceof StompError ? error : new ProtocolError('Undecodable frame', { cause: error });
      this.report('warning', reported);
      return;
    }

    if (unit.type === 'Heartbeat') {
      this.lastHeartbeat = Date.now();
      this.logger.debug('<<< heartbeat');
      return;
    }

    const { frame } = unit;
    this.logger.debug(`<<< ${frame.command}`, Object.fromEntries(frame.headers));

    switch (frame.command) {
      case Commands.CONNECTED:
        this.handleConnected(frame);
        break;
      case Commands.ERROR:
        this.handleError(frame);
        break;
      case Commands.MESSAGE:
        this.handleMessage(frame);
        break;
      default:
        this.logger.debug(`Ignoring ${frame.command} frame`);
    }
  }

  private handleConnected(frame: Frame): void {
    if (this.currentState !== 'Connecting') {
      this.logger.debug(`Ignoring CONNECTED in state ${this.currentState}`);
      return;
    }

    const info: ConnectedInfo = {
      version: frame.headers.get('version'),
      session: frame.headers.get('session'),
      server: frame.headers.get('server'),
      heartBeat: parseHeartBeat(frame.headers.get('heart-beat')),
    };
    this.connectedInfo = info;
    this.transition('Active');
    this.options.events.emit('connected', info);
  }

  private handleError(frame: Frame): void {
    this.report('error', new BrokerError(frame.headers.get('message'), frame.body || undefined));
    if (this.currentState === 'Connecting' || this.currentState === 'Active') {
      this.transition('Failed');
      // the broker closes the link after ERROR; nothing more is read from it
      void this.releaseTransport();
    }
  }

  private handleMessage(frame: Frame): void {
    if (this.currentState !== 'Active') {
      this.logger.debug(`Ignoring MESSAGE in state ${this.currentState}`);
      return;
    }

    const destination = frame.headers.get('destination');
    const subscription = destination === undefined ? undefined : this.options.registry.resolve(destination);
    if (!subscription) {
      this.unrouted++;
      this.report('warning', new UnroutedMessageError(destination));
      return;
    }

    try {
      subscription.callback(frame.body, frame);
    } catch (error) {
      this.logger.error(`Error in message callback for ${subscription.destination}:`, error);
    }
  }

  private handleTransportClosed(code?: number, reason?: string): void {
    const from = this.currentState;
    if (from === 'Connecting' || from === 'Active') {
      this.report('error', new ConnectionLostError('Connection to remote host was lost', { context: { code, reason } }));
    }
    this.transport = null;
    this.transition('Closed');
    this.options.events.emit('close', { code, reason });
  }

  private handleTransportError(error: Error): void {
    const from = this.currentState;
    if (from === 'Closed' || from === 'Disconnected') {
      this.logger.debug('Transport error after close:', error);
      return;
    }
    this.report('error', new ConnectionLostError(`Transport error: ${error.message}`, { cause: error }));
    this.transition('Closed');
    void this.releaseTransport();
  }

  private transition(to: SessionState): void {
    const from = this.currentState;
    if (from === to || from === 'Closed') return;

    this.currentState = to;
    this.logger.debug(`Session state ${from} -> ${to}`);
    this.options.events.emit('state', { from, to });

    if (SETTLED_STATES.has(to)) {
      this.clearConnectTimeout();
      const settle = this.settle;
      this.settle = null;
      settle?.(to);
    }
  }

  private armConnectTimeout(): void {
    const timeoutMs = this.options.connectTimeoutMs;
    if (timeoutMs <= 0) return;

    this.connectTimer = setTimeout(() => {
      this.connectTimer = null;
      if (this.currentState !== 'Connecting') return;
      this.report('error', new ConnectTimeoutError(timeoutMs));
      this.transition('Failed');
    }, timeoutMs);
  }

  private clearConnectTimeout(): void {
    if (this.connectTimer) {
      clearTimeout(this.connectTimer);
      this.connectTimer = null;
    }
  }

  private async releaseTransport(transport: Transport | null = this.transport): Promise<void> {
    if (this.transport === transport) {
      this.transport = null;
    }
    if (!transport) return;
    try {
      await transport.disconnect();
    } catch (error) {
      this.logger.debug('Error closing transport:', error);
    }
  }

  private report(kind: 'error' | 'warning', error: StompError): void {
    if (kind === 'error') {
      this.logger.error(error.getFullMessage());
    } else {
      this.logger.warn(error.getFullMessage());
    }
    this.options.events.emit(kind, error);
  }
}

function redact(payload: string): string {
  return payload.replace(/^passcode:.*$/m, 'passcode:******');
}
