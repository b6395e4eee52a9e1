import type { SweepSummary } from '@notesync/shared';

import { getErrorMessage } from '../../errors/index.js';
import { logError } from '../../utils/logger.js';

export type SweepRunner = {
  runSweep(opts?: { signal?: AbortSignal }): Promise<SweepSummary>;
};

export type SweepRunResult = { ok: true; summary: SweepSummary } | { ok: false; error: string };

export type SchedulerStatus = {
  state: 'idle' | 'running' | 'error';
  lastRunAt: number | null;
  lastError: string | null;
  lastSummary: SweepSummary | null;
  nextRunInMs: number | null;
};

const MAX_BACKOFF_MS = 60 * 60_000;

export class SweepScheduler {
  private state: SchedulerStatus['state'] = 'idle';
  private lastRunAt: number | null = null;
  private lastError: string | null = null;
  private lastSummary: SweepSummary | null = null;
  private timer: NodeJS.Timeout | null = null;
  private nextAt: number | null = null;
  private inFlight = false;
  private consecutiveFailures = 0;
  private abort: AbortController | null = null;
  private stopped = true;

  constructor(
    private readonly sweep: SweepRunner,
    private readonly intervalMs: number,
    private readonly clock: () => number = Date.now,
  ) {}

  getStatus(): SchedulerStatus {
    const nextRunInMs = this.nextAt == null ? null : Math.max(0, this.nextAt - this.clock());
    return {
      state: this.state,
      lastRunAt: this.lastRunAt,
      lastError: this.lastError,
      lastSummary: this.lastSummary,
      nextRunInMs,
    };
  }

  start() {
    this.stopped = false;
    this.clearTimer();
    this.scheduleNext(this.intervalMs);
  }

  /** Stops the timer and asks a running sweep to stop after its current notes. */
  stop() {
    this.stopped = true;
    this.clearTimer();
    this.abort?.abort();
  }

  async runOnce(): Promise<SweepRunResult> {
    // Параллельные проходы не запускаем.
    if (this.inFlight) return { ok: false, error: 'sweep busy' };
    this.inFlight = true;
    this.abort = new AbortController();
    this.state = 'running';
    try {
      const summary = await this.sweep.runSweep({ signal: this.abort.signal });
      this.lastSummary = summary;
      this.lastError = null;
      this.state = 'idle';
      this.consecutiveFailures = 0;
      return { ok: true, summary };
    } catch (e) {
      this.lastError = getErrorMessage(e);
      this.state = 'error';
      this.consecutiveFailures += 1;
      logError('sync sweep failed', { error: this.lastError, consecutiveFailures: this.consecutiveFailures });
      return { ok: false, error: this.lastError };
    } finally {
      this.lastRunAt = this.clock();
      this.abort = null;
      this.inFlight = false;
    }
  }

  private scheduleNext(delayMs: number) {
    if (this.timer) clearTimeout(this.timer);
    this.nextAt = this.clock() + delayMs;
    this.timer = setTimeout(() => {
      void this.tick();
    }, delayMs);
  }

  private clearTimer() {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.nextAt = null;
  }

  private async tick() {
    this.timer = null;
    await this.runOnce();
    if (this.stopped) return;
    // После ошибки интервал удваивается (не больше часа), успех возвращает базовый.
    const delay = Math.min(MAX_BACKOFF_MS, this.intervalMs * 2 ** this.consecutiveFailures);
    this.scheduleNext(Math.max(this.intervalMs, delay));
  }
}
