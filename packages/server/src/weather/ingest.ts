// ============================================================================
// Weather ingest: source → dedup by event id → rate-anomaly detector
// ============================================================================
import type { Alert } from '@skyfuse/shared';
import type { AlertPipeline } from '../alerts/pipeline.js';
import { ProducerLoop } from '../scheduler/loop.js';
import type { WeatherRateDetector } from './detector.js';
import { ResilientWeatherSource, type WeatherEventSource } from './source.js';

const LOOKBACK_MS = 3 * 24 * 3600 * 1000;
const MAX_SEEN_IDS = 5000;

export interface WeatherIngestOptions {
  intervalMs: number;
  jitterMs?: number;
  now?: () => number;
}

export class WeatherIngest {
  readonly loop: ProducerLoop;
  private seen = new Set<string>();
  private now: () => number;

  constructor(
    private source: WeatherEventSource,
    private detector: WeatherRateDetector,
    private pipeline: AlertPipeline,
    opts: WeatherIngestOptions,
  ) {
    this.now = opts.now ?? Date.now;
    this.loop = new ProducerLoop({
      name: 'weather-ingest',
      intervalMs: opts.intervalMs,
      jitterMs: opts.jitterMs,
      tick: signal => this.poll(signal).then(() => undefined),
    });

    if (source instanceof ResilientWeatherSource) {
      source.on('fallback', ({ source: primary, reason }: { source: string; reason: string }) => {
        console.log(`🛰️ ${primary} unavailable (${reason}), using local fallback events`);
        this.pipeline.diagnose({
          kind: 'SOURCE_FALLBACK',
          source: 'weather',
          timestamp: this.now(),
          message: `${primary} unavailable, switched to local fallback`,
          data: { reason },
        });
      });
      source.on('recovered', (primary: string) => {
        console.log(`🛰️ ${primary} reachable again, back on live events`);
      });
    }
  }

  start(): void {
    this.loop.start();
  }

  stop(): Promise<void> {
    return this.loop.stop();
  }

  /** Marks event ids as processed, e.g. the ones restored from the database. */
  markSeen(ids: Iterable<string>): void {
    for (const id of ids) this.remember(id);
  }

  /** One fetch-and-detect cycle. Returns the alerts it admitted. */
  async poll(signal?: AbortSignal): Promise<Alert[]> {
    const batch = await this.source.fetchEvents(new Date(this.now() - LOOKBACK_MS));
    if (signal?.aborted) return [];

    for (const r of batch.rejected) {
      this.pipeline.diagnose({
        kind: 'INVALID_RECORD',
        source: 'weather',
        timestamp: this.now(),
        message: `Rejected ${batch.origin} record: ${r.reason}`,
        data: { record: r.record },
      });
    }

    const fresh = batch.events
      .filter(e => !this.seen.has(e.eventId))
      .sort((a, b) => a.timestamp - b.timestamp);

    const alerts: Alert[] = [];
    for (const event of fresh) {
      this.remember(event.eventId);
      alerts.push(...this.detector.process(event));
    }
    return alerts;
  }

  private remember(id: string) {
    this.seen.add(id);
    if (this.seen.size > MAX_SEEN_IDS) {
      const oldest = this.seen.values().next();
      if (!oldest.done) this.seen.delete(oldest.value);
    }
  }
}
