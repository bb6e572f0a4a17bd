import type { Alert } from '@skyfuse/shared';
import { ProducerLoop } from '../scheduler/loop.js';
import type { GpsDetector } from './detector.js';
import type { GpsSimulator } from './simulator.js';

/** Drives the simulator into the detector, one fix per cycle. */
export class GpsFeed {
  readonly loop: ProducerLoop;

  constructor(private simulator: GpsSimulator, private detector: GpsDetector, intervalMs: number, jitterMs = 0) {
    this.loop = new ProducerLoop({
      name: 'gps-feed',
      intervalMs,
      jitterMs,
      tick: () => {
        this.step();
      },
    });
  }

  start(): void {
    this.loop.start();
  }

  stop(): Promise<void> {
    return this.loop.stop();
  }

  step(): Alert[] {
    return this.detector.process(this.simulator.next());
  }
}
