/**
 * Error types raised or reported by the STOMP client
 */

export interface StompErrorOptions {
  cause?: unknown;
  context?: Record<string, unknown>;
}

/**
 * Base class for every error the client produces
 */
export class StompError extends Error {
  public readonly context?: Record<string, unknown>;

  constructor(message: string, options?: StompErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = this.constructor.name;
    this.context = options?.context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Message with context and cause, for log lines
   */
  getFullMessage(): string {
    let msg = `[${this.name}] ${this.message}`;

    if (this.context && Object.keys(this.context).length > 0) {
      msg += ` ${JSON.stringify(this.context)}`;
    }

    if (this.cause !== undefined) {
      const causeMsg = this.cause instanceof Error ? this.cause.message : String(this.cause);
      msg += ` (cause: ${causeMsg})`;
    }

    return msg;
  }
}

/** The peer sent something that is not a STOMP frame */
export class ProtocolError extends StompError {}

/**
 * The broker answered with an ERROR frame
 */
export class BrokerError extends StompError {
  public readonly brokerMessage: string;
  public readonly details?: string;

  constructor(brokerMessage: string | undefined, details?: string, options?: StompErrorOptions) {
    const summary = brokerMessage ?? 'Unknown error';
    super(details ? `${summary}: ${details}` : summary, options);
    this.brokerMessage = summary;
    this.details = details;
  }
}

/** The transport closed or refused a write */
export class ConnectionLostError extends StompError {}

/**
 * A MESSAGE arrived for a destination nobody subscribed to
 */
export class UnroutedMessageError extends StompError {
  public readonly destination?: string;

  constructor(destination: string | undefined, options?: StompErrorOptions) {
    super(`No callback registered for destination ${destination ?? 'unknown'}`, options);
    this.destination = destination;
  }
}

export class ConnectTimeoutError extends StompError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`No CONNECTED frame received within ${timeoutMs}ms`, { context: { timeoutMs } });
    this.timeoutMs = timeoutMs;
  }
}

export class NotConnectedError extends StompError {
  constructor(operation: string) {
    super(`Cannot ${operation}: not connected to STOMP server`, { context: { operation } });
  }
}

/** Invalid client options or command-line arguments */
export class ConfigError extends StompError {}
