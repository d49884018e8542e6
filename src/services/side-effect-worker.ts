/**
 * Side-Effect Worker
 *
 * Drains the side-effect queue on a polling interval. Ticks are chained with
 * setTimeout, so a slow drain delays the next tick instead of overlapping it.
 * `kick()` runs a drain right away, e.g. after a transition scheduled work.
 *
 * @module services/side-effect-worker
 */

import type { SideEffectExecutor } from './side-effect-executor.service.js';

export interface SideEffectWorkerOptions {
  readonly pollIntervalMs: number;

  /**
   * Age after which failed_retryable records are re-driven; 0 disables it
   */
  readonly redriveAfterMs: number;
}

export class SideEffectWorker {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<void> | null = null;
  private started = false;
  private kickRequested = false;

  constructor(
    private readonly executor: Pick<SideEffectExecutor, 'drain' | 'redriveRetryable'>,
    private readonly options: SideEffectWorkerOptions
  ) {}

  get isRunning(): boolean {
    return this.started;
  }

  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;

    console.log('[SIDE_EFFECT_WORKER] Started:', {
      pollIntervalMs: this.options.pollIntervalMs,
      redriveAfterMs: this.options.redriveAfterMs,
      timestamp: new Date().toISOString(),
    });

    this.schedule(0);
  }

  /**
   * Drain as soon as possible. A kick during a drain runs one more drain
   * right after it.
   */
  kick(): void {
    if (!this.started) {
      return;
    }
    if (this.running) {
      this.kickRequested = true;
      return;
    }
    this.schedule(0);
  }

  /**
   * Stop polling and wait for an in-flight drain to finish
   */
  async stop(): Promise<void> {
    this.started = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.running) {
      await this.running;
    }
    console.log('[SIDE_EFFECT_WORKER] Stopped');
  }

  /**
   * One drain (and scheduled re-drive). Failures are logged; the next tick
   * tries again.
   */
  async tick(): Promise<void> {
    try {
      if (this.options.redriveAfterMs > 0) {
        const redriven = await this.executor.redriveRetryable(this.options.redriveAfterMs);
        if (redriven > 0) {
          console.log('[SIDE_EFFECT_WORKER] Re-drove retryable records:', { count: redriven });
        }
      }
      await this.executor.drain();
    } catch (error) {
      console.error('[SIDE_EFFECT_WORKER] Drain failed:', {
        error: error instanceof Error ? error.message : String(error),
        timestamp: new Date().toISOString(),
      });
    }
  }

  private schedule(delayMs: number): void {
    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      this.running = this.tick().finally(() => {
        this.running = null;
        if (!this.started) {
          return;
        }
        const again = this.kickRequested;
        this.kickRequested = false;
        this.schedule(again ? 0 : this.options.pollIntervalMs);
      });
    }, delayMs);
    this.timer.unref();
  }
}
