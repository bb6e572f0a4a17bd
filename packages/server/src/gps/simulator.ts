// ============================================================================
// GPS receiver simulator: jittered fixes with occasional spoofing / jamming
// ============================================================================
import type { TelemetrySample } from '@skyfuse/shared';

export interface GpsSimulatorOptions {
  entityId?: string;
  baseLatitude?: number;
  baseLongitude?: number;
  anomalyProbability?: number;
  random?: () => number;
  now?: () => number;
}

export type SimulatedFixKind = 'normal' | 'spoof' | 'jam';

const round6 = (n: number) => Math.round(n * 1e6) / 1e6;
const round1 = (n: number) => Math.round(n * 10) / 10;

export class GpsSimulator {
  readonly entityId: string;
  private readonly baseLat: number;
  private readonly baseLng: number;
  private readonly anomalyProbability: number;
  private readonly random: () => number;
  private readonly now: () => number;
  // true track; spoofed fixes never move it
  private lat: number;
  private lng: number;
  private lastTimestamp = 0;
  lastKind: SimulatedFixKind = 'normal';

  constructor(opts: GpsSimulatorOptions = {}) {
    this.entityId = opts.entityId ?? 'BEY_AIRPORT_GPS_01';
    this.baseLat = opts.baseLatitude ?? 33.8953;
    this.baseLng = opts.baseLongitude ?? 35.4744;
    this.anomalyProbability = opts.anomalyProbability ?? 0.18;
    this.random = opts.random ?? Math.random;
    this.now = opts.now ?? Date.now;
    this.lat = this.baseLat;
    this.lng = this.baseLng;
  }

  private uniform(min: number, max: number): number {
    return min + (max - min) * this.random();
  }

  private int(min: number, max: number): number {
    return Math.floor(this.uniform(min, max + 1));
  }

  next(): TelemetrySample {
    // keep timestamps strictly increasing even if the clock stalls
    const timestamp = Math.max(this.now(), this.lastTimestamp + 1);
    this.lastTimestamp = timestamp;

    this.lat = round6(this.lat + this.uniform(-0.00005, 0.00005));
    this.lng = round6(this.lng + this.uniform(-0.00005, 0.00005));

    let kind: SimulatedFixKind = 'normal';
    if (this.random() < this.anomalyProbability) kind = this.random() < 0.5 ? 'spoof' : 'jam';
    this.lastKind = kind;

    switch (kind) {
      case 'spoof':
        return {
          entityId: this.entityId,
          timestamp,
          latitude: round6(this.baseLat + this.uniform(0.01, 0.05)),
          longitude: round6(this.baseLng + this.uniform(0.01, 0.05)),
          accuracyM: round1(this.uniform(10, 50)),
          signalDbm: this.int(-125, -115),
        };
      case 'jam':
        return {
          entityId: this.entityId,
          timestamp,
          latitude: this.lat,
          longitude: this.lng,
          accuracyM: round1(this.uniform(50, 200)),
          signalDbm: this.int(-160, -140),
        };
      default:
        return {
          entityId: this.entityId,
          timestamp,
          latitude: this.lat,
          longitude: this.lng,
          accuracyM: round1(this.uniform(1.5, 5)),
          signalDbm: this.int(-125, -115),
        };
    }
  }
}
