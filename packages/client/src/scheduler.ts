import type { ITickScheduler, TickCallback } from '@shared/simulation';
import { MAX_TICK_DELTA } from '@shared/constants';
import type { Logger } from '@shared/log';

/**
 * Drives the engine's cooperative tasks. Either the host calls `advance(dt)` from its own loop,
 * or `start(hz)` runs a Node interval that feeds clamped wall-clock deltas.
 */
export class FrameScheduler implements ITickScheduler {
  private time = 0;
  private callbacks: Set<TickCallback> = new Set();
  private loop: ReturnType<typeof setInterval> | null = null;
  private lastFrameTime = 0;
  private readonly log: Logger;

  constructor(log: Logger) {
    this.log = log;
  }

  public now(): number {
    return this.time;
  }

  public onTick(callback: TickCallback): () => void {
    this.callbacks.add(callback);
    return () => { this.callbacks.delete(callback); };
  }

  public get running(): boolean {
    return this.loop !== null;
  }

  public advance(deltaTime: number): void {
    if (!Number.isFinite(deltaTime) || deltaTime < 0) {
      this.log.warn('Ignoring invalid tick delta', { deltaTime });
      return;
    }
    this.time += deltaTime;

    // Snapshot: registrations made during this dispatch start on the next one
    for (const callback of [...this.callbacks]) {
      if (!this.callbacks.has(callback)) continue;
      try {
        callback(deltaTime);
      } catch (err) {
        this.log.error('Tick callback threw', { error: err instanceof Error ? err.message : String(err) });
      }
    }
  }

  public start(hz: number = 60): void {
    if (this.loop) return;
    const tickRateMs = 1000 / hz;
    this.lastFrameTime = performance.now();
    this.loop = setInterval(() => {
      const time = performance.now();
      const deltaTime = (time - this.lastFrameTime) / 1000.0;
      this.lastFrameTime = time;
      this.advance(Math.min(deltaTime, MAX_TICK_DELTA));
    }, tickRateMs);
    this.log.info(`Scheduler running at ${hz} Hz`);
  }

  public stop(): void {
    if (!this.loop) return;
    clearInterval(this.loop);
    this.loop = null;
    this.log.info('Scheduler stopped');
  }
}
