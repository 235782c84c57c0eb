// ─── Silence Watchdog ───────────────────────────────────────────────────────────
// Per-session liveness timer. Audio, text and heartbeats arm it; location
// updates do not. When the deadline passes with no qualifying event it fires
// once and disarms until the next qualifying event.
//
//   ARMED(d) --event--> ARMED(now + T)
//   ARMED(d) --now >= d--> FIRED --> DISARMED --event--> ARMED(now + T)

/**
 * Configuration for the silence watchdog.
 * Deadlines use wall-clock milliseconds from Date.now().
 */
export interface WatchdogConfig {
  /** Seconds without a qualifying event before firing. Default: 10 */
  thresholdSeconds: number;
  /** Whether the watchdog arms at all. Default: true */
  enabled: boolean;
}

export type WatchdogCallbacks = {
  /** Called once per arm cycle with the silence observed, in seconds. */
  onFire: (silenceSeconds: number) => void;
};

export type WatchdogState =
  | { phase: "armed"; deadline: number }
  | { phase: "disarmed"; reason: "initial" | "fired" | "stopped" };

export const DEFAULT_WATCHDOG_CONFIG: WatchdogConfig = {
  thresholdSeconds: 10,
  enabled: true,
};

export class SilenceWatchdog {
  private readonly config: WatchdogConfig;
  private readonly callbacks: WatchdogCallbacks;
  private state: WatchdogState = { phase: "disarmed", reason: "initial" };
  private lastActivityAt: number | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private stopped = false;

  constructor(config: Partial<WatchdogConfig>, callbacks: WatchdogCallbacks) {
    this.config = { ...DEFAULT_WATCHDOG_CONFIG, ...config };
    if (!(this.config.thresholdSeconds > 0)) {
      throw new RangeError(`Watchdog threshold must be positive, got ${this.config.thresholdSeconds}`);
    }
    this.callbacks = callbacks;
  }

  get currentState(): WatchdogState {
    return this.state;
  }

  /** Epoch ms at which the watchdog fires, or null while disarmed. */
  get deadline(): number | null {
    return this.state.phase === "armed" ? this.state.deadline : null;
  }

  /**
   * Records a qualifying inbound event: arms a disarmed watchdog, or pushes
   * an armed one's deadline out to now + threshold.
   */
  recordActivity(): void {
    if (this.stopped || !this.config.enabled) return;

    const now = Date.now();
    this.lastActivityAt = now;
    const deadline = now + this.config.thresholdSeconds * 1000;
    this.state = { phase: "armed", deadline };
    this.schedule(deadline - now);
  }

  /** Permanently disarms. Used on disconnect and session teardown; never fires afterwards. */
  stop(): void {
    this.stopped = true;
    this.clearTimer();
    this.state = { phase: "disarmed", reason: "stopped" };
  }

  // ─── Private ────────────────────────────────────────────────────────────────

  private schedule(delayMs: number): void {
    this.clearTimer();
    this.timer = setTimeout(() => {
      this.timer = null;
      this.check();
    }, Math.max(0, delayMs));
  }

  /**
   * Commits the firing decision. An event that moved the deadline before this
   * runs wins: the timer is rescheduled for the remaining time instead.
   */
  private check(): void {
    if (this.state.phase !== "armed") return;

    const now = Date.now();
    if (now < this.state.deadline) {
      this.schedule(this.state.deadline - now);
      return;
    }

    this.state = { phase: "disarmed", reason: "fired" };
    const silenceSeconds = this.lastActivityAt === null ? this.config.thresholdSeconds : (now - this.lastActivityAt) / 1000;
    this.callbacks.onFire(silenceSeconds);
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
