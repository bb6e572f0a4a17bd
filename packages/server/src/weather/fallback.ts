import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { SourceUnavailableError } from '../errors.js';
import { DONKI_ENDPOINTS, mapDonkiRecords } from './donki.js';
import type { WeatherBatch, WeatherEventSource } from './source.js';

export const DEFAULT_FALLBACK_PATH = fileURLToPath(new URL('../../data/donki-fallback.json', import.meta.url));

/**
 * Static local event set, DONKI-shaped and keyed by endpoint
 * (`{ "FLR": [...], "GST": [...] }`). Read on every fetch so an operator can
 * swap the file without a restart.
 */
export class FallbackSource implements WeatherEventSource {
  readonly name = 'local fallback';

  constructor(private filePath: string = DEFAULT_FALLBACK_PATH) {}

  async fetchEvents(_since: Date): Promise<WeatherBatch> {
    let raw: unknown;
    try {
      raw = JSON.parse(await fs.promises.readFile(this.filePath, 'utf8'));
    } catch (err) {
      throw new SourceUnavailableError(this.name, err);
    }

    const batch: WeatherBatch = { origin: 'fallback', events: [], rejected: [] };
    if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
      batch.rejected.push({ record: raw, reason: 'fallback file must be an object keyed by DONKI endpoint' });
      return batch;
    }
    const byEndpoint = new Map(Object.entries(raw));
    for (const endpoint of DONKI_ENDPOINTS) {
      if (!byEndpoint.has(endpoint)) continue;
      const mapped = mapDonkiRecords(endpoint, byEndpoint.get(endpoint));
      batch.events.push(...mapped.events);
      batch.rejected.push(...mapped.rejected);
    }
    return batch;
  }
}
