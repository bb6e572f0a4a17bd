// ============================================================================
// Weather Rate-Anomaly Detector
// ============================================================================
import type { Alert, AlertSeverity, WeatherCategory, WeatherEvent } from '@skyfuse/shared';
import type { AlertPipeline } from '../alerts/pipeline.js';
import { WeatherEventSchema, describeIssues } from '../schemas.js';
import { baselineFactory, type BaselineFactory, type RateBaseline } from './baseline.js';

interface CategoryState {
  epoch: number;        // current tumbling window index
  epochCount: number;   // events so far in the current window
  lastTimestamp: number;
  baseline: RateBaseline;
}

export interface CategoryRateStats {
  category: WeatherCategory;
  count: number;
  baselineSamples: number;
  baselineMean: number;
  baselineStddev: number;
}

export class WeatherRateDetector {
  private states = new Map<WeatherCategory, CategoryState>();
  private windowMs: number;
  private makeBaseline: BaselineFactory;

  constructor(private pipeline: AlertPipeline, makeBaseline?: BaselineFactory) {
    const p = pipeline.policy;
    this.windowMs = p.rateWindowSeconds * 1000;
    this.makeBaseline = makeBaseline ?? baselineFactory(p.rateBaseline, p);
  }

  process(raw: unknown): Alert[] {
    const parsed = WeatherEventSchema.safeParse(raw);
    if (!parsed.success) {
      this.pipeline.diagnose({
        kind: 'INVALID_RECORD',
        source: 'weather',
        timestamp: Date.now(),
        message: `Rejected weather event: ${describeIssues(parsed.error)}`,
        data: { record: raw },
      });
      return [];
    }
    const event: WeatherEvent = parsed.data;
    const ts = event.timestamp;
    const state = this.stateFor(event.category, ts);

    if (ts < state.lastTimestamp) {
      this.pipeline.diagnose({
        kind: 'STALE_EVENT',
        source: 'weather',
        timestamp: ts,
        message: `${event.eventId} (${event.category}) is older than the newest event already counted`,
        data: { eventId: event.eventId, category: event.category, lastTimestamp: state.lastTimestamp },
      });
      return [];
    }

    this.closeEpochs(state, this.epochOf(ts));
    state.epochCount++;
    state.lastTimestamp = ts;
    this.pipeline.recordEvent(event);

    const alert = this.evaluate(event, state);
    return alert ? [alert] : [];
  }

  processAll(events: Iterable<unknown>): Alert[] {
    const out: Alert[] = [];
    for (const e of events) out.push(...this.process(e));
    return out;
  }

  stats(): CategoryRateStats[] {
    return [...this.states.entries()].map(([category, s]) => ({
      category,
      count: s.epochCount,
      baselineSamples: s.baseline.samples,
      baselineMean: s.baseline.mean,
      baselineStddev: s.baseline.stddev,
    }));
  }

  reset(): void {
    this.states.clear();
  }

  private evaluate(event: WeatherEvent, state: CategoryState): Alert | null {
    const p = this.pipeline.policy;
    const { baseline } = state;
    if (baseline.samples < p.rateMinHistory) return null;

    // same quantity the baseline is fed with: the count of one tumbling window
    const count = state.epochCount;
    const mean = baseline.mean;
    const stddev = baseline.stddev;
    const z = (count - mean) / Math.max(stddev, p.rateStddevFloor);
    if (z < p.rateZscoreThreshold) return null;

    const severity: AlertSeverity = z >= p.rateZscoreThreshold * p.rateCriticalMultiple ? 'critical' : 'warning';
    return this.pipeline.submit({
      category: 'WEATHER_RATE_ANOMALY',
      source: 'weather',
      severity,
      subject: event.category,
      timestamp: event.timestamp,
      summary: `${count} ${event.category} events in ${p.rateWindowSeconds}s (baseline ${mean.toFixed(1)} ± ${stddev.toFixed(1)}, z=${z.toFixed(1)})`,
      details: {
        eventCategory: event.category,
        count,
        baselineMean: mean,
        baselineStddev: stddev,
        zScore: z,
        windowSeconds: p.rateWindowSeconds,
      },
    });
  }

  private epochOf(ts: number): number {
    return Math.floor(ts / this.windowMs);
  }

  // Feeds every completed window (empty ones as zero) into the baseline.
  private closeEpochs(state: CategoryState, epoch: number): void {
    if (epoch <= state.epoch) return;
    state.baseline.observe(state.epochCount);
    const gaps = Math.min(epoch - state.epoch - 1, this.pipeline.policy.rateHistoryWindows);
    for (let i = 0; i < gaps; i++) state.baseline.observe(0);
    state.epoch = epoch;
    state.epochCount = 0;
  }

  private stateFor(category: WeatherCategory, ts: number): CategoryState {
    let s = this.states.get(category);
    if (!s) {
      s = {
        epoch: this.epochOf(ts),
        epochCount: 0,
        lastTimestamp: Number.NEGATIVE_INFINITY,
        baseline: this.makeBaseline(),
      };
      this.states.set(category, s);
    }
    return s;
  }
}
