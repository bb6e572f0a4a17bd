// ============================================================================
// Cyber/GPS Detector: speed gate, position jump, signal quality
// ============================================================================
import type { Alert, AlertCandidate, AlertSeverity, TelemetrySample } from '@skyfuse/shared';
import type { AlertPipeline } from '../alerts/pipeline.js';
import { distanceKm, elapsedSeconds, impliedSpeedKmh } from '../geo/distance.js';
import { InvalidCoordinateError, NonPositiveIntervalError } from '../errors.js';
import { TelemetrySampleSchema, describeIssues } from '../schemas.js';

function round(n: number, digits = 2): number {
  const f = 10 ** digits;
  return Math.round(n * f) / f;
}

export class GpsDetector {
  // last accepted fix per entity; nothing older is kept
  private last = new Map<string, TelemetrySample>();

  constructor(private pipeline: AlertPipeline) {}

  /** Runs one sample through the rules. Returns the alerts that reached the store. */
  process(raw: unknown): Alert[] {
    const parsed = TelemetrySampleSchema.safeParse(raw);
    if (!parsed.success) {
      this.pipeline.diagnose({
        kind: 'INVALID_RECORD',
        source: 'gps',
        timestamp: Date.now(),
        message: `Rejected telemetry sample: ${describeIssues(parsed.error)}`,
        data: { record: raw },
      });
      return [];
    }
    const cur: TelemetrySample = parsed.data;
    const prev = this.last.get(cur.entityId);
    const candidates: AlertCandidate[] = [];

    if (prev) {
      let speed: number;
      try {
        speed = impliedSpeedKmh(prev, cur);
      } catch (err) {
        if (err instanceof NonPositiveIntervalError || err instanceof InvalidCoordinateError) {
          this.rejectOrdering(prev, cur, err);
          return [];
        }
        throw err;
      }
      candidates.push(...this.movementRules(prev, cur, speed));
    }
    candidates.push(...this.signalRules(cur));

    this.last.set(cur.entityId, cur);
    this.pipeline.recordSample(cur);

    const admitted: Alert[] = [];
    for (const c of candidates) {
      const alert = this.pipeline.submit(c);
      if (alert) admitted.push(alert);
    }
    return admitted;
  }

  processAll(samples: Iterable<unknown>): Alert[] {
    const out: Alert[] = [];
    for (const s of samples) out.push(...this.process(s));
    return out;
  }

  lastFix(entityId: string): TelemetrySample | undefined {
    return this.last.get(entityId);
  }

  trackedEntities(): string[] {
    return [...this.last.keys()];
  }

  reset(): void {
    this.last.clear();
  }

  private movementRules(prev: TelemetrySample, cur: TelemetrySample, speed: number): AlertCandidate[] {
    const p = this.pipeline.policy;
    const dist = distanceKm(prev, cur);
    const elapsed = elapsedSeconds(prev, cur);
    const out: AlertCandidate[] = [];

    if (speed > p.speedGateKmh) {
      const severity: AlertSeverity = speed > p.speedGateKmh * p.speedGateCriticalMultiple ? 'critical' : 'warning';
      out.push({
        category: 'GPS_SPOOF_SUSPECTED',
        source: 'gps',
        severity,
        subject: cur.entityId,
        timestamp: cur.timestamp,
        summary: `${cur.entityId} - Implausible speed ${Math.round(speed)} km/h (${round(dist, 3)} km in ${round(elapsed, 1)} s)`,
        details: {
          entityId: cur.entityId,
          impliedSpeedKmh: round(speed),
          distanceKm: round(dist, 4),
          elapsedSeconds: round(elapsed, 3),
          speedGateKmh: p.speedGateKmh,
        },
      });
    }

    if (dist > p.jumpDistanceKm && elapsed <= p.jumpMaxElapsedSeconds) {
      const severity: AlertSeverity = dist > p.jumpDistanceKm * p.jumpCriticalMultiple ? 'critical' : 'warning';
      out.push({
        category: 'GPS_JUMP',
        source: 'gps',
        severity,
        subject: cur.entityId,
        timestamp: cur.timestamp,
        summary: `${cur.entityId} - Position jump ${Math.round(dist * 1000)} m in ${round(elapsed, 1)} s`,
        details: {
          entityId: cur.entityId,
          distanceKm: round(dist, 4),
          elapsedSeconds: round(elapsed, 3),
          jumpDistanceKm: p.jumpDistanceKm,
        },
      });
    }
    return out;
  }

  private signalRules(cur: TelemetrySample): AlertCandidate[] {
    const p = this.pipeline.policy;
    const out: AlertCandidate[] = [];
    if (cur.accuracyM !== undefined && cur.accuracyM > p.degradedAccuracyM) {
      out.push({
        category: 'GPS_SIGNAL_DEGRADED',
        source: 'gps',
        severity: 'info',
        subject: cur.entityId,
        timestamp: cur.timestamp,
        summary: `${cur.entityId} - Degraded accuracy (${cur.accuracyM} m)`,
        details: { entityId: cur.entityId, accuracyM: cur.accuracyM, thresholdM: p.degradedAccuracyM },
      });
    }
    if (cur.signalDbm !== undefined && cur.signalDbm < p.weakSignalDbm) {
      out.push({
        category: 'GPS_JAMMING_SUSPECTED',
        source: 'gps',
        severity: 'warning',
        subject: cur.entityId,
        timestamp: cur.timestamp,
        summary: `${cur.entityId} - Weak signal (${cur.signalDbm} dBm)`,
        details: { entityId: cur.entityId, signalDbm: cur.signalDbm, thresholdDbm: p.weakSignalDbm },
      });
    }
    return out;
  }

  private rejectOrdering(prev: TelemetrySample, cur: TelemetrySample, err: Error) {
    this.pipeline.diagnose({
      kind: err instanceof NonPositiveIntervalError ? 'OUT_OF_ORDER_SAMPLE' : 'INVALID_RECORD',
      source: 'gps',
      timestamp: cur.timestamp,
      message: `${cur.entityId} - ${err.message}`,
      data: { entityId: cur.entityId, previousTimestamp: prev.timestamp, sampleTimestamp: cur.timestamp },
    });
  }
}
