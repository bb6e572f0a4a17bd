// ============================================================================
// Alert pipeline: fingerprint → dedup → store, plus feed and diagnostics logs
// ============================================================================
import { EventEmitter } from 'events';
import type {
  Alert, AlertCandidate, AlertSource, CyberRecord, DedupStats, Diagnostic, TelemetrySample,
  ThresholdPolicy, WeatherEvent,
} from '@skyfuse/shared';
import { ALERT_SOURCES } from '@skyfuse/shared';
import { fingerprint } from './fingerprint.js';
import { DedupWindow } from './dedup.js';
import { AlertStore, BoundedTimeline } from './store.js';

const MAX_DIAGNOSTICS = 500;

/**
 * Explicit owner of everything the detectors share: the policy (read-only),
 * one dedup window per source, the alert store and the raw feed timelines.
 *
 * Events: `alert` (Alert), `diagnostic` (Diagnostic), `sample`
 * (TelemetrySample), `weather_event` (WeatherEvent), `cyber_record` (CyberRecord).
 */
export class AlertPipeline extends EventEmitter {
  readonly store: AlertStore;
  readonly samples: BoundedTimeline<TelemetrySample>;
  readonly events: BoundedTimeline<WeatherEvent>;
  readonly cyber: BoundedTimeline<CyberRecord>;
  readonly diagnostics = new BoundedTimeline<Diagnostic>(MAX_DIAGNOSTICS);
  private dedup = new Map<AlertSource, DedupWindow>();

  constructor(readonly policy: ThresholdPolicy) {
    super();
    this.store = new AlertStore(policy.storeMaxAlerts);
    this.samples = new BoundedTimeline<TelemetrySample>(policy.storeMaxFeed);
    this.events = new BoundedTimeline<WeatherEvent>(policy.storeMaxFeed);
    this.cyber = new BoundedTimeline<CyberRecord>(policy.storeMaxFeed);
    for (const source of ALERT_SOURCES) {
      this.dedup.set(source, new DedupWindow(source, {
        windowSeconds: policy.dedupWindowSeconds,
        graceMultiple: policy.dedupGraceMultiple,
      }));
    }
  }

  dedupFor(source: AlertSource): DedupWindow {
    let window = this.dedup.get(source);
    if (!window) {
      window = new DedupWindow(source, {
        windowSeconds: this.policy.dedupWindowSeconds,
        graceMultiple: this.policy.dedupGraceMultiple,
      });
      this.dedup.set(source, window);
    }
    return window;
  }

  /** Returns the stored alert, or null when dedup suppressed it. */
  submit(candidate: AlertCandidate): Alert | null {
    const fp = fingerprint(candidate, this.policy.dedupWindowSeconds);
    if (this.dedupFor(candidate.source).check(fp, candidate.timestamp) === 'suppress') return null;

    const alert: Alert = {
      ...candidate,
      id: `${candidate.source}-${candidate.timestamp}-${fp.slice(0, 12)}`,
      fingerprint: fp,
    };
    const stored = this.store.append(alert);
    this.emit('alert', stored);
    return stored;
  }

  /** Puts back an alert that already passed dedup in an earlier run. */
  restore(alert: Alert): void {
    this.store.append(alert);
    this.dedupFor(alert.source).seed(alert.fingerprint, alert.timestamp);
  }

  diagnose(diagnostic: Diagnostic): void {
    this.diagnostics.append(diagnostic);
    this.emit('diagnostic', diagnostic);
  }

  recordSample(sample: TelemetrySample): void {
    this.samples.append(sample);
    this.emit('sample', sample);
  }

  recordEvent(event: WeatherEvent): void {
    this.events.append(event);
    this.emit('weather_event', event);
  }

  recordCyber(record: CyberRecord): void {
    this.cyber.append(record);
    this.emit('cyber_record', record);
  }

  dedupStats(): DedupStats[] {
    return [...this.dedup.values()].map(d => d.stats());
  }
}
