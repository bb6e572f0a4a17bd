import type BetterSqlite3 from 'better-sqlite3';
import type { Alert, CyberRecord, Diagnostic, TelemetrySample, WeatherEvent } from '@skyfuse/shared';
import type { AlertPipeline } from '../alerts/pipeline.js';
import { errorMessage } from '../errors.js';
import { AlertSchema, CyberRecordSchema, DiagnosticSchema, TelemetrySampleSchema, WeatherEventSchema } from '../schemas.js';

interface SampleRow {
  entity_id: string;
  timestamp: number;
  latitude: number;
  longitude: number;
  reported_speed_kmh: number | null;
  accuracy_m: number | null;
  signal_dbm: number | null;
}

interface EventRow {
  event_id: string;
  category: string;
  timestamp: number;
  magnitude: number | null;
}

interface CyberRow {
  id: number;
  record: string;
}

interface AlertRow {
  id: string;
  fingerprint: string;
  category: string;
  severity: string;
  source: string;
  subject: string;
  timestamp: number;
  summary: string;
  details: string;
}

interface DiagnosticRow {
  kind: string;
  source: string;
  timestamp: number;
  message: string;
  data: string;
}

export interface RetentionLimits {
  maxAlerts: number; // per source
  maxFeed: number;
  maxDiagnostics: number;
}

function parseJson(text: string): unknown {
  try { return JSON.parse(text); } catch { return undefined; }
}

/**
 * Buffers pipeline records and writes them to SQLite
 * in one transaction per flush, then trims each table to the retention limits.
 */
export class FeedPersistence {
  private samples: TelemetrySample[] = [];
  private events: WeatherEvent[] = [];
  private cyber: CyberRecord[] = [];
  private alerts: Alert[] = [];
  private diagnostics: Diagnostic[] = [];
  private flushInterval: ReturnType<typeof setInterval> | null = null;

  private sampleInsert: BetterSqlite3.Statement<unknown[]>;
  private eventInsert: BetterSqlite3.Statement<unknown[]>;
  private cyberInsert: BetterSqlite3.Statement<unknown[]>;
  private alertInsert: BetterSqlite3.Statement<unknown[]>;
  private diagnosticInsert: BetterSqlite3.Statement<unknown[]>;

  constructor(private db: BetterSqlite3.Database, private limits: RetentionLimits) {
    this.sampleInsert = db.prepare(`
      INSERT INTO telemetry_samples (entity_id, timestamp, latitude, longitude, reported_speed_kmh, accuracy_m, signal_dbm)
      VALUES (@entityId, @timestamp, @latitude, @longitude, @reportedSpeedKmh, @accuracyM, @signalDbm)
    `);
    this.eventInsert = db.prepare(`
      INSERT OR REPLACE INTO weather_events (event_id, category, timestamp, magnitude)
      VALUES (@eventId, @category, @timestamp, @magnitude)
    `);
    this.cyberInsert = db.prepare(`
      INSERT INTO cyber_records (kind, timestamp, record) VALUES (@kind, @timestamp, @record)
    `);
    this.alertInsert = db.prepare(`
      INSERT OR IGNORE INTO alerts (id, fingerprint, category, severity, source, subject, timestamp, summary, details)
      VALUES (@id, @fingerprint, @category, @severity, @source, @subject, @timestamp, @summary, @details)
    `);
    this.diagnosticInsert = db.prepare(`
      INSERT INTO diagnostics (kind, source, timestamp, message, data) VALUES (@kind, @source, @timestamp, @message, @data)
    `);
  }

  /** Subscribes to the pipeline and flushes every `intervalMs`. */
  attach(pipeline: AlertPipeline, intervalMs = 5000): void {
    pipeline.on('sample', (s: TelemetrySample) => this.samples.push(s));
    pipeline.on('weather_event', (e: WeatherEvent) => this.events.push(e));
    pipeline.on('cyber_record', (r: CyberRecord) => this.cyber.push(r));
    pipeline.on('alert', (a: Alert) => this.alerts.push(a));
    pipeline.on('diagnostic', (d: Diagnostic) => this.diagnostics.push(d));
    this.flushInterval = setInterval(() => {
      try {
        this.flush();
      } catch (err) {
        console.error('💾 Flush failed:', errorMessage(err));
      }
    }, intervalMs);
    console.log('💾 Persistence service started');
  }

  stop(): void {
    if (this.flushInterval) clearInterval(this.flushInterval);
    this.flushInterval = null;
    this.flush(); // final flush
  }

  recordSample(s: TelemetrySample): void { this.samples.push(s); }
  recordEvent(e: WeatherEvent): void { this.events.push(e); }
  recordCyber(r: CyberRecord): void { this.cyber.push(r); }
  recordAlert(a: Alert): void { this.alerts.push(a); }
  recordDiagnostic(d: Diagnostic): void { this.diagnostics.push(d); }

  get pending(): number {
    return this.samples.length + this.events.length + this.cyber.length + this.alerts.length + this.diagnostics.length;
  }

  flush(): void {
    if (!this.pending) return;
    const samples = this.samples.splice(0);
    const events = this.events.splice(0);
    const cyber = this.cyber.splice(0);
    const alerts = this.alerts.splice(0);
    const diagnostics = this.diagnostics.splice(0);

    const tx = this.db.transaction(() => {
      for (const s of samples) {
        this.sampleInsert.run({
          entityId: s.entityId,
          timestamp: s.timestamp,
          latitude: s.latitude,
          longitude: s.longitude,
          reportedSpeedKmh: s.reportedSpeedKmh ?? null,
          accuracyM: s.accuracyM ?? null,
          signalDbm: s.signalDbm ?? null,
        });
      }
      for (const e of events) {
        this.eventInsert.run({ eventId: e.eventId, category: e.category, timestamp: e.timestamp, magnitude: e.magnitude ?? null });
      }
      for (const r of cyber) {
        this.cyberInsert.run({ kind: r.kind, timestamp: r.timestamp, record: JSON.stringify(r) });
      }
      for (const a of alerts) {
        this.alertInsert.run({
          id: a.id,
          fingerprint: a.fingerprint,
          category: a.category,
          severity: a.severity,
          source: a.source,
          subject: a.subject,
          timestamp: a.timestamp,
          summary: a.summary,
          details: JSON.stringify(a.details),
        });
      }
      for (const d of diagnostics) {
        this.diagnosticInsert.run({ kind: d.kind, source: d.source, timestamp: d.timestamp, message: d.message, data: JSON.stringify(d.data) });
      }
      this.trim();
    });
    tx();
  }

  private trim(): void {
    const { maxAlerts, maxFeed, maxDiagnostics } = this.limits;
    this.db.prepare(`DELETE FROM telemetry_samples WHERE id NOT IN
      (SELECT id FROM telemetry_samples ORDER BY timestamp DESC, id DESC LIMIT ?)`).run(maxFeed);
    this.db.prepare(`DELETE FROM weather_events WHERE event_id NOT IN
      (SELECT event_id FROM weather_events ORDER BY timestamp DESC LIMIT ?)`).run(maxFeed);
    this.db.prepare(`DELETE FROM cyber_records WHERE id NOT IN
      (SELECT id FROM cyber_records ORDER BY timestamp DESC, id DESC LIMIT ?)`).run(maxFeed);
    this.db.prepare(`DELETE FROM alerts WHERE id NOT IN
      (SELECT id FROM alerts a2 WHERE a2.source = alerts.source ORDER BY timestamp DESC LIMIT ?)`).run(maxAlerts);
    this.db.prepare(`DELETE FROM diagnostics WHERE id NOT IN
      (SELECT id FROM diagnostics ORDER BY id DESC LIMIT ?)`).run(maxDiagnostics);
  }

  // ── Read back (oldest first) ──

  loadSamples(): TelemetrySample[] {
    const rows = this.db.prepare<[], SampleRow>('SELECT * FROM telemetry_samples ORDER BY timestamp, id').all();
    const out: TelemetrySample[] = [];
    for (const r of rows) {
      const rec = {
        entityId: r.entity_id,
        timestamp: r.timestamp,
        latitude: r.latitude,
        longitude: r.longitude,
        ...(r.reported_speed_kmh !== null ? { reportedSpeedKmh: r.reported_speed_kmh } : {}),
        ...(r.accuracy_m !== null ? { accuracyM: r.accuracy_m } : {}),
        ...(r.signal_dbm !== null ? { signalDbm: r.signal_dbm } : {}),
      };
      const parsed = TelemetrySampleSchema.safeParse(rec);
      if (parsed.success) out.push(parsed.data);
      else console.warn(`💾 Skipping unreadable sample row for ${r.entity_id}`);
    }
    return out;
  }

  loadEvents(): WeatherEvent[] {
    const rows = this.db.prepare<[], EventRow>('SELECT * FROM weather_events ORDER BY timestamp').all();
    const out: WeatherEvent[] = [];
    for (const r of rows) {
      const rec = {
        eventId: r.event_id,
        category: r.category,
        timestamp: r.timestamp,
        ...(r.magnitude !== null ? { magnitude: r.magnitude } : {}),
      };
      const parsed = WeatherEventSchema.safeParse(rec);
      if (parsed.success) out.push(parsed.data);
      else console.warn(`💾 Skipping unreadable event row ${r.event_id}`);
    }
    return out;
  }

  loadCyber(): CyberRecord[] {
    const rows = this.db.prepare<[], CyberRow>('SELECT id, record FROM cyber_records ORDER BY timestamp, id').all();
    const out: CyberRecord[] = [];
    for (const r of rows) {
      const parsed = CyberRecordSchema.safeParse(parseJson(r.record));
      if (parsed.success) out.push(parsed.data);
      else console.warn(`💾 Skipping unreadable cyber row ${r.id}`);
    }
    return out;
  }

  loadAlerts(): Alert[] {
    const rows = this.db.prepare<[], AlertRow>('SELECT * FROM alerts ORDER BY timestamp, id').all();
    const out: Alert[] = [];
    for (const r of rows) {
      const rec = {
        id: r.id,
        fingerprint: r.fingerprint,
        category: r.category,
        severity: r.severity,
        source: r.source,
        subject: r.subject,
        timestamp: r.timestamp,
        summary: r.summary,
        details: parseJson(r.details),
      };
      const parsed = AlertSchema.safeParse(rec);
      if (parsed.success) out.push(parsed.data);
      else console.warn(`💾 Skipping unreadable alert row ${r.id}`);
    }
    return out;
  }

  loadDiagnostics(): Diagnostic[] {
    const rows = this.db.prepare<[], DiagnosticRow>('SELECT * FROM diagnostics ORDER BY timestamp, id').all();
    const out: Diagnostic[] = [];
    for (const r of rows) {
      const parsed = DiagnosticSchema.safeParse({ ...r, data: parseJson(r.data) });
      if (parsed.success) out.push(parsed.data);
    }
    return out;
  }

  /** Rehydrates the pipeline's store, feed timelines and dedup windows. */
  restoreInto(pipeline: AlertPipeline): { alerts: number; samples: number; events: number; cyber: number } {
    const alerts = this.loadAlerts();
    const samples = this.loadSamples();
    const events = this.loadEvents();
    const cyber = this.loadCyber();
    for (const a of alerts) pipeline.restore(a);
    for (const s of samples) pipeline.samples.append(s);
    for (const e of events) pipeline.events.append(e);
    for (const r of cyber) pipeline.cyber.append(r);
    return { alerts: alerts.length, samples: samples.length, events: events.length, cyber: cyber.length };
  }
}
