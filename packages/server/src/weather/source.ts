import { EventEmitter } from 'events';
import type { WeatherEvent } from '@skyfuse/shared';
import { SourceUnavailableError, errorMessage } from '../errors.js';

export interface RejectedRecord {
  record: unknown;
  reason: string;
}

export interface WeatherBatch {
  origin: 'live' | 'fallback';
  events: WeatherEvent[];
  rejected: RejectedRecord[];
}

/** Producer of space-weather events. Throws SourceUnavailableError when it cannot answer. */
export interface WeatherEventSource {
  readonly name: string;
  fetchEvents(since: Date): Promise<WeatherBatch>;
}

/**
 * Tries the primary source and substitutes the fallback on
 * SourceUnavailableError. Emits `fallback` once per outage and `recovered`
 * when the primary answers again.
 */
export class ResilientWeatherSource extends EventEmitter implements WeatherEventSource {
  readonly name: string;
  private usingFallback = false;

  constructor(private primary: WeatherEventSource, private fallback: WeatherEventSource) {
    super();
    this.name = `${primary.name} (fallback: ${fallback.name})`;
  }

  get mode(): 'live' | 'fallback' {
    return this.usingFallback ? 'fallback' : 'live';
  }

  async fetchEvents(since: Date): Promise<WeatherBatch> {
    try {
      const batch = await this.primary.fetchEvents(since);
      if (this.usingFallback) {
        this.usingFallback = false;
        this.emit('recovered', this.primary.name);
      }
      return batch;
    } catch (err) {
      if (!(err instanceof SourceUnavailableError)) throw err;
      if (!this.usingFallback) {
        this.usingFallback = true;
        this.emit('fallback', { source: this.primary.name, reason: errorMessage(err) });
      }
      const batch = await this.fallback.fetchEvents(since);
      return { ...batch, origin: 'fallback' };
    }
  }
}
