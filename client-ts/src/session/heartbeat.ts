import type { Logger } from '../logger';
import type { SessionState } from './state';

/** What the scheduler writes through */
export interface HeartbeatTarget {
  readonly state: SessionState;
  transmitHeartbeat(): Promise<boolean>;
}

/**
 * Sends the LF heartbeat on a fixed interval while the target is Active
 */
export class HeartbeatScheduler {
  private timer: NodeJS.Timeout | null = null;
  private target: HeartbeatTarget | null = null;
  private sent = 0;
  private failed = 0;

  constructor(
    readonly intervalMs: number,
    private readonly logger: Logger,
  ) {}

  start(target: HeartbeatTarget): void {
    this.stop();
    this.target = target;
    this.logger.debug(`Starting heartbeat (interval: ${this.intervalMs}ms)`);
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    // must not keep the process alive on its own
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.target = null;
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  get stats(): { sent: number; failed: number } {
    return { sent: this.sent, failed: this.failed };
  }

  /**
   * One heartbeat attempt. Never rejects; failures are counted and logged.
   */
  async tick(): Promise<void> {
    const target = this.target;
    if (!target || target.state !== 'Active') return;

    this.logger.debug('Sending heartbeat...');
    try {
      if (await target.transmitHeartbeat()) {
        this.sent++;
        return;
      }
      this.failed++;
      this.logger.warn('Heartbeat not delivered');
    } catch (error) {
      this.failed++;
      this.logger.error('Error sending heartbeat:', error);
    }
  }
}
