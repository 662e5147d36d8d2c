// --- Animation Driver ---
// Owns the simulation clock: each tick advances time, snapshots the
// parameters and computes one curve (or seven in white-light mode).

import type { Frame } from './types';
import type { ParameterStore } from './ParameterStore';
import { computeCurves } from './WaveField';
import { RESUMED_TICK_INTERVAL_MS, TICK_INTERVAL_MS, TIME_STEP } from './constants';

export type FrameListener = (frame: Frame) => void;

/** Repeating timer; `schedule` returns a function that cancels it. */
export interface IntervalTimer {
  schedule(callback: () => void, ms: number): () => void;
}

export interface DriverOptions {
  timeStep: number;
  /** Cadence used by start(). */
  intervalMs: number;
  /** Cadence used when the view is re-activated. */
  resumeIntervalMs: number;
  timer: IntervalTimer;
}

const globalTimer: IntervalTimer = {
  schedule(callback, ms) {
    const handle = setInterval(callback, ms);
    return () => clearInterval(handle);
  },
};

export class AnimationDriver {
  private readonly options: DriverOptions;
  private cancel: (() => void) | null = null;
  private interval: number | null = null;
  private frames = 0;
  private failure: unknown = null;

  constructor(
    private readonly store: ParameterStore,
    private readonly onFrame: FrameListener,
    options: Partial<DriverOptions> = {},
  ) {
    this.options = {
      timeStep: TIME_STEP,
      intervalMs: TICK_INTERVAL_MS,
      resumeIntervalMs: RESUMED_TICK_INTERVAL_MS,
      timer: globalTimer,
      ...options,
    };
  }

  get running(): boolean {
    return this.cancel !== null;
  }

  get frameCount(): number {
    return this.frames;
  }

  /** Milliseconds between ticks while running, otherwise null. */
  get currentInterval(): number | null {
    return this.interval;
  }

  /** The error that last stopped the driver, if any. */
  get lastError(): unknown {
    return this.failure;
  }

  start(): void {
    if (this.running) return;
    this.schedule(this.options.intervalMs);
  }

  stop(): void {
    if (this.cancel) this.cancel();
    this.cancel = null;
    this.interval = null;
  }

  /** Hidden views stop the clock; showing the view again restarts it at the resume cadence. */
  setActive(active: boolean): void {
    this.stop();
    if (active) this.schedule(this.options.resumeIntervalMs);
  }

  /** Runs one tick synchronously. A failing frame listener stops the driver and the error propagates. */
  tick(): Frame {
    try {
      return this.advance();
    } catch (err) {
      this.fail(err);
      throw err;
    }
  }

  private advance(): Frame {
    this.store.advanceTime(this.options.timeStep);
    const params = this.store.snapshot();
    const frame: Frame = { index: this.frames, params, curves: computeCurves(params) };
    this.frames++;
    this.onFrame(frame);
    return frame;
  }

  private schedule(ms: number): void {
    this.failure = null;
    this.interval = ms;
    this.cancel = this.options.timer.schedule(() => this.runScheduled(), ms);
  }

  // Timer callbacks have no caller to rethrow to; the failure is logged and kept on lastError
  private runScheduled(): void {
    try {
      this.advance();
    } catch (err) {
      this.fail(err);
    }
  }

  private fail(err: unknown): void {
    this.stop();
    this.failure = err;
    console.error('[AnimationDriver] frame listener failed, animation stopped:', err);
  }
}
