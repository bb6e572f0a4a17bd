// ============================================================================
// Producer loop: cooperative scheduler ticks with an explicit stop signal
// ============================================================================
import { EventEmitter } from 'events';
import type { LoopStatus } from '@skyfuse/shared';
import { errorMessage } from '../errors.js';

export type LoopTick = (signal: AbortSignal) => Promise<void> | void;

export interface ProducerLoopOptions {
  name: string;
  intervalMs: number;
  jitterMs?: number;
  tick: LoopTick;
  random?: () => number;
}

/**
 * Runs `tick` every `intervalMs` (+ up to `jitterMs`). Cycles never overlap:
 * the next one is scheduled only after the previous settles. `stop()` aborts
 * the signal, cancels the pending timer and waits for the in-flight cycle.
 */
export class ProducerLoop extends EventEmitter {
  private controller: AbortController | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<void> | null = null;
  private cycles = 0;
  private failures = 0;
  private lastCycleAt?: number;
  private lastError?: string;

  constructor(private opts: ProducerLoopOptions) {
    super();
  }

  get name(): string {
    return this.opts.name;
  }

  get running(): boolean {
    return this.controller !== null && !this.controller.signal.aborted;
  }

  start(): void {
    if (this.running) return;
    this.controller = new AbortController();
    this.schedule(0);
  }

  async stop(): Promise<void> {
    this.controller?.abort();
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) await this.inFlight;
  }

  /** One cycle outside the schedule, with its own signal. */
  async runOnce(): Promise<void> {
    await this.cycle(new AbortController().signal);
  }

  status(): LoopStatus {
    return {
      name: this.opts.name,
      running: this.running,
      cycles: this.cycles,
      failures: this.failures,
      lastCycleAt: this.lastCycleAt,
      lastError: this.lastError,
    };
  }

  private nextDelay(): number {
    const jitter = this.opts.jitterMs ?? 0;
    const random = this.opts.random ?? Math.random;
    return this.opts.intervalMs + (jitter > 0 ? Math.floor(random() * jitter) : 0);
  }

  private schedule(delay: number) {
    const controller = this.controller;
    if (!controller || controller.signal.aborted) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.cycle(controller.signal).finally(() => {
        this.inFlight = null;
        if (!controller.signal.aborted) this.schedule(this.nextDelay());
      });
    }, delay);
  }

  private async cycle(signal: AbortSignal): Promise<void> {
    if (signal.aborted) return;
    try {
      await this.opts.tick(signal);
      this.cycles++;
      this.lastCycleAt = Date.now();
      this.emit('cycle', this.cycles);
    } catch (err) {
      this.failures++;
      this.lastError = errorMessage(err);
      console.error(`⚠️ ${this.opts.name} cycle failed:`, this.lastError);
      this.emit('cycle_error', err);
    }
  }
}
