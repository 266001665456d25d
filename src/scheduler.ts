import { DAILY_RETENTION_MINUTE, SWEEP_CATCH_UP_MINUTES, SWEEP_TICK_MS } from './config.js';
import type { BackupOrchestrator, SweepResult } from './orchestrator.js';
import { cleanupAll, getRetentionKeep } from './retention.js';
import { minuteBucket, windowIncludesMinuteOfDay, type MinuteWindow } from './schedule.js';
import type { ControllerStore } from './types.js';
import { bestEffort, errorMessage, systemClock, type Clock } from './utils.js';

export interface SchedulerOptions {
  orchestrator: BackupOrchestrator;
  store: ControllerStore;
  clock?: Clock;
  tickMs?: number;
  catchUpMinutes?: number;
}

export interface TickResult {
  window: MinuteWindow;
  sweep: SweepResult;
  retention: { keys: number; deleted: number; dir_errors: number } | null;
}

/**
 * Drives scheduled sweeps. Each tick evaluates every minute since the last
 * evaluated one, so minutes that pass while a sweep runs are caught up by the
 * next tick. Fleet-wide retention runs when the window covers 03:00 UTC.
 */
export class SweepScheduler {
  private readonly orchestrator: BackupOrchestrator;
  private readonly store: ControllerStore;
  private readonly clock: Clock;
  private readonly tickMs: number;
  private readonly catchUpMinutes: number;
  private lastMinute: number | null = null;
  private running = false;
  private timer: NodeJS.Timeout | null = null;

  constructor(options: SchedulerOptions) {
    this.orchestrator = options.orchestrator;
    this.store = options.store;
    this.clock = options.clock ?? systemClock;
    this.tickMs = options.tickMs ?? SWEEP_TICK_MS;
    this.catchUpMinutes = options.catchUpMinutes ?? SWEEP_CATCH_UP_MINUTES;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.tick().catch((error: unknown) => {
        console.error('[sweep] error', errorMessage(error));
      });
    }, this.tickMs);
    this.timer.unref();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  /** Returns null when a sweep is still running or the current minute was already evaluated. */
  async tick(): Promise<TickResult | null> {
    if (this.running) return null;
    const current = minuteBucket(this.clock());
    const last = this.lastMinute ?? current - 1;
    if (current <= last) return null;

    const window: MinuteWindow = {
      afterMinute: Math.max(last, current - this.catchUpMinutes),
      throughMinute: current,
    };
    if (window.throughMinute - window.afterMinute > 1) {
      console.log(`[sweep] catching up ${window.throughMinute - window.afterMinute} minutes`);
    }

    this.running = true;
    try {
      const sweep = await this.orchestrator.sweep({ window });
      let retention: TickResult['retention'] = null;
      if (windowIncludesMinuteOfDay(window, DAILY_RETENTION_MINUTE)) {
        const outcome = await bestEffort('retention', () => cleanupAll(this.store, getRetentionKeep(this.store)));
        if (outcome.ok) {
          retention = outcome.value;
          console.log(`[retention] daily run keys=${retention.keys} deleted=${retention.deleted} dir_errors=${retention.dir_errors}`);
        }
      }
      return { window, sweep, retention };
    } finally {
      this.lastMinute = current;
      this.running = false;
    }
  }
}
