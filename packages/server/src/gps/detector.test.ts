import { describe, it, expect, beforeEach } from 'vitest';
import type { TelemetrySample } from '@skyfuse/shared';
import { AlertPipeline } from '../alerts/pipeline.js';
import { resolvePolicy } from '../config/policy.js';
import { GpsDetector } from './detector.js';

const T0 = 1_700_000_100_000; // aligned to a 300 s bucket

function fix(timestamp: number, latitude: number, longitude: number, extra: Partial<TelemetrySample> = {}): TelemetrySample {
  return { entityId: 'BEY_AIRPORT_GPS_01', timestamp, latitude, longitude, ...extra };
}

describe('GpsDetector', () => {
  let pipeline: AlertPipeline;
  let detector: GpsDetector;

  beforeEach(() => {
    pipeline = new AlertPipeline(resolvePolicy());
    detector = new GpsDetector(pipeline);
  });

  it('flags an implausible speed between consecutive fixes', () => {
    expect(detector.process(fix(T0, 33.8938, 35.5018))).toEqual([]);
    const alerts = detector.process(fix(T0 + 1000, 33.9, 35.51));

    expect(alerts).toHaveLength(1);
    const [alert] = alerts;
    expect(alert.category).toBe('GPS_SPOOF_SUSPECTED');
    expect(alert.severity).toBe('critical');
    expect(alert.subject).toBe('BEY_AIRPORT_GPS_01');
    expect(alert.timestamp).toBe(T0 + 1000);
    if (alert.category !== 'GPS_SPOOF_SUSPECTED') return;
    expect(alert.details.impliedSpeedKmh).toBeGreaterThan(3000);
    expect(alert.details.impliedSpeedKmh).toBeLessThan(4000);
    expect(alert.details.distanceKm).toBeCloseTo(1.02, 1);
    expect(alert.details.elapsedSeconds).toBe(1);
    expect(alert.details.speedGateKmh).toBe(1000);
  });

  it('rates a speed between the gate and its critical multiple as a warning', () => {
    detector.process(fix(T0, 33.8938, 35.5018));
    const [alert] = detector.process(fix(T0 + 2000, 33.9, 35.51));
    expect(alert.category).toBe('GPS_SPOOF_SUSPECTED');
    expect(alert.severity).toBe('warning');
  });

  it('stays quiet for the same displacement over ten minutes', () => {
    detector.process(fix(T0, 33.8938, 35.5018));
    expect(detector.process(fix(T0 + 600_000, 33.9, 35.51))).toEqual([]);
  });

  it('flags a position jump beyond the jump distance within the elapsed limit', () => {
    detector.process(fix(T0, 33.9, 35.5));
    const alerts = detector.process(fix(T0 + 60_000, 33.9225, 35.5));
    expect(alerts.map(a => a.category)).toEqual(['GPS_JUMP']);
    const [jump] = alerts;
    expect(jump.severity).toBe('warning');
    expect(jump.summary).toBe('BEY_AIRPORT_GPS_01 - Position jump 2502 m in 60 s');
    if (jump.category !== 'GPS_JUMP') return;
    expect(jump.details.distanceKm).toBeCloseTo(2.502, 3);
  });

  it('reports a non-increasing timestamp and keeps the last good fix', () => {
    const first = fix(T0, 33.8938, 35.5018);
    detector.process(first);
    expect(detector.process(fix(T0, 33.9, 35.51))).toEqual([]);
    expect(detector.process(fix(T0 - 1000, 33.9, 35.51))).toEqual([]);

    const kinds = pipeline.diagnostics.all().map(d => d.kind);
    expect(kinds).toEqual(['OUT_OF_ORDER_SAMPLE', 'OUT_OF_ORDER_SAMPLE']);
    expect(detector.lastFix('BEY_AIRPORT_GPS_01')).toEqual(first);
    expect(pipeline.samples.size).toBe(1);
    expect(pipeline.store.size()).toBe(0);
  });

  it('rejects malformed records without touching state', () => {
    expect(detector.process(fix(T0, 95, 35.5))).toEqual([]);
    expect(detector.process({ entityId: 'E1', timestamp: 'yesterday' })).toEqual([]);
    expect(pipeline.diagnostics.all().map(d => d.kind)).toEqual(['INVALID_RECORD', 'INVALID_RECORD']);
    expect(detector.trackedEntities()).toEqual([]);
  });

  it('raises one alert for a teleport and its correction', () => {
    const alerts = detector.processAll([
      fix(T0, 33.8938, 35.5018),
      fix(T0 + 1000, 33.9, 35.51),
      fix(T0 + 2000, 33.8938, 35.5018),
    ]);
    expect(alerts).toHaveLength(1);
    expect(pipeline.store.size()).toBe(1);
    expect(pipeline.dedupStats().find(s => s.source === 'gps')?.suppressed).toBe(1);
  });

  it('re-alerts a sustained spoofing run once per dedup window', () => {
    // every 10 s the fix flips between the true position and one 11 km north
    const feed = Array.from({ length: 90 }, (_, k) => fix(T0 + k * 10_000, k % 2 === 0 ? 33.9 : 34.0, 35.5));
    const spoofs = detector.processAll(feed).filter(a => a.category === 'GPS_SPOOF_SUSPECTED');
    expect(spoofs.map(a => a.timestamp)).toEqual([T0 + 10_000, T0 + 300_000, T0 + 600_000]);
  });

  it('produces the same alert ids when the same feed is replayed', () => {
    const feed = [fix(T0, 33.8938, 35.5018), fix(T0 + 1000, 33.9, 35.51)];
    const firstIds = detector.processAll(feed).map(a => a.id);

    const other = new GpsDetector(new AlertPipeline(resolvePolicy()));
    expect(other.processAll(feed).map(a => a.id)).toEqual(firstIds);

    // replaying into the same pipeline is absorbed by dedup
    detector.reset();
    expect(detector.processAll(feed)).toEqual([]);
    expect(pipeline.store.size()).toBe(1);
  });

  it('applies signal-quality rules to every accepted fix', () => {
    const alerts = detector.process(fix(T0, 33.9, 35.5, { accuracyM: 25, signalDbm: -150 }));
    expect(alerts.map(a => [a.category, a.severity])).toEqual([
      ['GPS_SIGNAL_DEGRADED', 'info'],
      ['GPS_JAMMING_SUSPECTED', 'warning'],
    ]);
    expect(detector.process(fix(T0 + 1000, 33.9, 35.5, { accuracyM: 10, signalDbm: -135 }))).toEqual([]);
  });
});
