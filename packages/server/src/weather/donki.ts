// ============================================================================
// NASA DONKI space-weather records → WeatherEvent
// ============================================================================
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { WeatherCategory, WeatherEvent } from '@skyfuse/shared';
import { SourceUnavailableError } from '../errors.js';
import type { RejectedRecord, WeatherBatch, WeatherEventSource } from './source.js';

export const DONKI_BASE = 'https://api.nasa.gov/DONKI';

export const DONKI_ENDPOINTS = ['FLR', 'CME', 'GST', 'SEP', 'RBE'] as const;
export type DonkiEndpoint = typeof DONKI_ENDPOINTS[number];

const ENDPOINT_CATEGORY: Record<DonkiEndpoint, WeatherCategory> = {
  FLR: 'SOLAR_FLARE',
  CME: 'CORONAL_MASS_EJECTION',
  GST: 'GEOMAGNETIC_STORM',
  SEP: 'SOLAR_ENERGETIC_PARTICLE',
  RBE: 'RADIATION_BELT_ENHANCEMENT',
};

const DonkiTime = z.string().refine(s => !Number.isNaN(Date.parse(s)), 'not a timestamp');

const FlareZ = z.object({
  flrID: z.string().min(1),
  beginTime: DonkiTime,
  peakTime: DonkiTime.nullish(),
  classType: z.string().nullish(),
});
const CmeZ = z.object({ activityID: z.string().min(1), startTime: DonkiTime });
const StormZ = z.object({
  gstID: z.string().min(1),
  startTime: DonkiTime,
  allKpIndex: z.array(z.object({ kpIndex: z.number() })).nullish(),
});
const SepZ = z.object({ sepID: z.string().min(1), eventTime: DonkiTime });
const RbeZ = z.object({ rbeID: z.string().min(1), eventTime: DonkiTime });

const FLARE_CLASS_FLUX: Record<string, number> = { A: 1e-8, B: 1e-7, C: 1e-6, M: 1e-5, X: 1e-4 };

/** GOES class (e.g. "M2.5") → peak 1–8 Å X-ray flux in W/m². */
export function flareClassToFlux(classType: string): number | undefined {
  const m = /^([ABCMX])(\d+(?:\.\d+)?)$/i.exec(classType.trim());
  if (!m) return undefined;
  return FLARE_CLASS_FLUX[m[1].toUpperCase()] * parseFloat(m[2]);
}

function mapRecord(endpoint: DonkiEndpoint, record: unknown): WeatherEvent | string {
  const category = ENDPOINT_CATEGORY[endpoint];
  switch (endpoint) {
    case 'FLR': {
      const r = FlareZ.safeParse(record);
      if (!r.success) return r.error.issues[0]?.message ?? 'invalid flare record';
      const magnitude = r.data.classType ? flareClassToFlux(r.data.classType) : undefined;
      return {
        eventId: r.data.flrID,
        category,
        timestamp: Date.parse(r.data.peakTime ?? r.data.beginTime),
        ...(magnitude !== undefined ? { magnitude } : {}),
      };
    }
    case 'CME': {
      const r = CmeZ.safeParse(record);
      if (!r.success) return r.error.issues[0]?.message ?? 'invalid CME record';
      return { eventId: r.data.activityID, category, timestamp: Date.parse(r.data.startTime) };
    }
    case 'GST': {
      const r = StormZ.safeParse(record);
      if (!r.success) return r.error.issues[0]?.message ?? 'invalid storm record';
      const kp = (r.data.allKpIndex ?? []).map(k => k.kpIndex);
      return {
        eventId: r.data.gstID,
        category,
        timestamp: Date.parse(r.data.startTime),
        ...(kp.length ? { magnitude: Math.max(...kp) } : {}),
      };
    }
    case 'SEP': {
      const r = SepZ.safeParse(record);
      if (!r.success) return r.error.issues[0]?.message ?? 'invalid SEP record';
      return { eventId: r.data.sepID, category, timestamp: Date.parse(r.data.eventTime) };
    }
    case 'RBE': {
      const r = RbeZ.safeParse(record);
      if (!r.success) return r.error.issues[0]?.message ?? 'invalid RBE record';
      return { eventId: r.data.rbeID, category, timestamp: Date.parse(r.data.eventTime) };
    }
  }
}

/** Maps raw DONKI records of one endpoint; records that do not fit are returned as rejects. */
export function mapDonkiRecords(endpoint: DonkiEndpoint, records: unknown): Omit<WeatherBatch, 'origin'> {
  const events: WeatherEvent[] = [];
  const rejected: RejectedRecord[] = [];
  if (!Array.isArray(records)) {
    rejected.push({ record: records, reason: `${endpoint}: expected an array` });
    return { events, rejected };
  }
  for (const record of records) {
    const mapped = mapRecord(endpoint, record);
    if (typeof mapped === 'string') rejected.push({ record, reason: `${endpoint}: ${mapped}` });
    else events.push(mapped);
  }
  return { events, rejected };
}

function isoDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

export interface DonkiSourceOptions {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  http?: AxiosInstance;
  now?: () => number;
}

export class DonkiSource implements WeatherEventSource {
  readonly name = 'NASA/DONKI';
  private http: AxiosInstance;
  private apiKey?: string;
  private now: () => number;

  constructor(opts: DonkiSourceOptions = {}) {
    this.apiKey = opts.apiKey;
    this.now = opts.now ?? Date.now;
    this.http = opts.http ?? axios.create({
      baseURL: opts.baseUrl ?? DONKI_BASE,
      timeout: opts.timeoutMs ?? 10000,
    });
  }

  async fetchEvents(since: Date): Promise<WeatherBatch> {
    const apiKey = this.apiKey;
    if (!apiKey) throw new SourceUnavailableError(this.name, new Error('no API key configured'));

    const params = { startDate: isoDate(since), endDate: isoDate(new Date(this.now())), api_key: apiKey };
    let responses: { endpoint: DonkiEndpoint; data: unknown }[];
    try {
      responses = await Promise.all(DONKI_ENDPOINTS.map(async endpoint => {
        const res = await this.http.get<unknown>(`/${endpoint}`, { params });
        return { endpoint, data: res.data };
      }));
    } catch (err) {
      throw new SourceUnavailableError(this.name, err);
    }

    const batch: WeatherBatch = { origin: 'live', events: [], rejected: [] };
    for (const { endpoint, data } of responses) {
      // DONKI answers an empty range with an empty body
      const mapped = mapDonkiRecords(endpoint, data === '' || data == null ? [] : data);
      batch.events.push(...mapped.events);
      batch.rejected.push(...mapped.rejected);
    }
    return batch;
  }
}
