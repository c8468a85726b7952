import {
  KeepaliveOptionsSchema,
  parseOptions,
  type KeepaliveOptions,
  type KeepaliveSettings,
} from '../config/options';

export interface KeepaliveHooks {
  /** Sends one probe (a WebSocket ping). */
  sendProbe(): void;
  /** A probe went unanswered for `timeoutMs`. Fires at most once per run. */
  onTimeout(): void;
}

/**
 * Liveness probe for an open socket. `verify()` sends the probe that gates the
 * connected state; `start()` repeats it every `intervalMs`.
 */
export class KeepaliveMonitor {
  readonly settings: KeepaliveSettings;
  private intervalTimer: ReturnType<typeof setInterval> | null = null;
  private timeoutTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    private readonly hooks: KeepaliveHooks,
    options: KeepaliveOptions = {}
  ) {
    this.settings = parseOptions(KeepaliveOptionsSchema, options, 'keepalive');
  }

  verify(): void {
    this.probe();
  }

  start(): void {
    if (this.intervalTimer !== null) return;
    this.intervalTimer = setInterval(() => this.probe(), this.settings.intervalMs);
  }

  /** Records a pong. Returns false when no probe was outstanding. */
  acknowledge(): boolean {
    if (this.timeoutTimer === null) return false;
    clearTimeout(this.timeoutTimer);
    this.timeoutTimer = null;
    return true;
  }

  stop(): void {
    if (this.intervalTimer !== null) {
      clearInterval(this.intervalTimer);
      this.intervalTimer = null;
    }
    if (this.timeoutTimer !== null) {
      clearTimeout(this.timeoutTimer);
      this.timeoutTimer = null;
    }
  }

  get awaitingAck(): boolean {
    return this.timeoutTimer !== null;
  }

  get isRunning(): boolean {
    return this.intervalTimer !== null;
  }

  // ─── Private ────────────────────────────────────────────────────────────────

  private probe(): void {
    // An unanswered probe keeps its original deadline.
    if (this.timeoutTimer === null) {
      this.timeoutTimer = setTimeout(() => {
        this.timeoutTimer = null;
        this.stop();
        this.hooks.onTimeout();
      }, this.settings.timeoutMs);
    }
    this.hooks.sendProbe();
  }
}
