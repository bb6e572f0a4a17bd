import { describe, it, expect } from 'vitest';
import type { WeatherCategory, WeatherEvent } from '@skyfuse/shared';
import { AlertPipeline } from '../alerts/pipeline.js';
import { resolvePolicy } from '../config/policy.js';
import { WeatherRateDetector } from './detector.js';

const T0 = 1_700_000_100_000; // aligned to 60 s and 300 s
const MIN = 60_000;

let seq = 0;
function event(timestamp: number, category: WeatherCategory = 'GEOMAGNETIC_STORM'): WeatherEvent {
  return { eventId: `EV-${++seq}`, category, timestamp };
}

// Two events per minute for `minutes` minutes starting at T0.
function steadyFeed(minutes: number): WeatherEvent[] {
  const out: WeatherEvent[] = [];
  for (let k = 0; k < minutes; k++) out.push(event(T0 + k * MIN), event(T0 + k * MIN + 30_000));
  return out;
}

function setup(overrides: Record<string, string | number> = {}) {
  const pipeline = new AlertPipeline(resolvePolicy({ rate_window_seconds: 60, ...overrides }));
  return { pipeline, detector: new WeatherRateDetector(pipeline) };
}

describe('WeatherRateDetector', () => {
  it('stays quiet on a steady rate', () => {
    const { detector } = setup();
    expect(detector.processAll(steadyFeed(8))).toEqual([]);
  });

  it('flags a burst well above the learned rate', () => {
    const { detector } = setup();
    expect(detector.processAll(steadyFeed(4))).toEqual([]);
    const burst = Array.from({ length: 20 }, (_, i) => event(T0 + 4 * MIN + i * 1000));
    const alerts = detector.processAll(burst);

    // the window count reaches mean + 3σ (σ floored to 1) on the fifth burst event; later ones share its fingerprint
    expect(alerts).toHaveLength(1);
    const [alert] = alerts;
    expect(alert.category).toBe('WEATHER_RATE_ANOMALY');
    expect(alert.severity).toBe('warning');
    expect(alert.subject).toBe('GEOMAGNETIC_STORM');
    expect(alert.timestamp).toBe(T0 + 4 * MIN + 4000);
    expect(alert.details).toEqual({
      eventCategory: 'GEOMAGNETIC_STORM',
      count: 5,
      baselineMean: 2,
      baselineStddev: 0,
      zScore: 3,
      windowSeconds: 60,
    });
  });

  it('does not flag a rate that oscillates within its usual spread', () => {
    const { detector } = setup();
    const feed: WeatherEvent[] = [];
    for (let k = 0; k < 10; k++) {
      const offsets = k % 2 === 0 ? [0, 30_000] : [0, 15_000, 30_000, 45_000];
      for (const o of offsets) feed.push(event(T0 + k * MIN + o));
    }
    expect(detector.processAll(feed)).toEqual([]);
  });

  it('does not flag an oscillating rate whose events cluster at window edges', () => {
    const { detector } = setup();
    const feed: WeatherEvent[] = [];
    for (let k = 0; k < 11; k++) {
      const offsets = k % 2 === 0 ? [1000, 2000] : [56_000, 57_000, 58_000, 59_000];
      for (const o of offsets) feed.push(event(T0 + k * MIN + o, 'SOLAR_FLARE'));
    }
    expect(detector.processAll(feed)).toEqual([]);
    const [stats] = detector.stats();
    expect(stats.baselineMean).toBe(3);
    expect(stats.baselineStddev).toBe(1);
  });

  it('needs the minimum history before it judges anything', () => {
    const { detector } = setup();
    // one quiet minute, then a burst: only one baseline sample exists
    detector.processAll(steadyFeed(1));
    const burst = Array.from({ length: 20 }, (_, i) => event(T0 + MIN + i * 1000));
    expect(detector.processAll(burst)).toEqual([]);
  });

  it('counts empty windows as zeros in the baseline', () => {
    const { detector } = setup();
    detector.process(event(T0));
    detector.process(event(T0 + 5 * MIN));
    const [stats] = detector.stats();
    expect(stats.category).toBe('GEOMAGNETIC_STORM');
    expect(stats.count).toBe(1);
    expect(stats.baselineSamples).toBe(5);
    expect(stats.baselineMean).toBeCloseTo(0.2, 10);
    expect(stats.baselineStddev).toBeCloseTo(0.4, 10);
  });

  it('keeps categories apart', () => {
    const { detector } = setup();
    detector.processAll(steadyFeed(4));
    const flares = Array.from({ length: 10 }, (_, i) => event(T0 + 4 * MIN + i * 1000, 'SOLAR_FLARE'));
    expect(detector.processAll(flares)).toEqual([]);
    expect(detector.stats().map(s => s.category)).toEqual(['GEOMAGNETIC_STORM', 'SOLAR_FLARE']);
  });

  it('drops an event older than the newest one counted', () => {
    const { pipeline, detector } = setup();
    detector.process(event(T0 + 10_000));
    expect(detector.process(event(T0 + 5000))).toEqual([]);
    expect(pipeline.diagnostics.all().map(d => d.kind)).toEqual(['STALE_EVENT']);
    expect(pipeline.events.size).toBe(1);
    // equal timestamps are not stale
    detector.process(event(T0 + 10_000));
    expect(pipeline.events.size).toBe(2);
  });

  it('rejects an unknown category', () => {
    const { pipeline, detector } = setup();
    expect(detector.process({ eventId: 'X', category: 'METEOR_SHOWER', timestamp: T0 })).toEqual([]);
    expect(pipeline.diagnostics.all().map(d => d.kind)).toEqual(['INVALID_RECORD']);
  });

  it('works the same with the exponentially weighted baseline', () => {
    const { detector } = setup({ rate_baseline: 'ewma' });
    detector.processAll(steadyFeed(4));
    const burst = Array.from({ length: 20 }, (_, i) => event(T0 + 4 * MIN + i * 1000));
    const alerts = detector.processAll(burst);
    expect(alerts).toHaveLength(1);
    expect(alerts[0].timestamp).toBe(T0 + 4 * MIN + 4000);
  });
});
