import type { Alert } from '@skyfuse/shared';
import { ProducerLoop } from '../scheduler/loop.js';
import type { CyberDetector } from './detector.js';
import type { CyberSimulator } from './simulator.js';

/** Drives one simulated cycle (telemetry, command, traffic) into the detector per tick. */
export class CyberFeed {
  readonly loop: ProducerLoop;

  constructor(private simulator: CyberSimulator, private detector: CyberDetector, intervalMs: number, jitterMs = 0) {
    this.loop = new ProducerLoop({
      name: 'cyber-feed',
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
    return this.detector.processAll(this.simulator.next());
  }
}
