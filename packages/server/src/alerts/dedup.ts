import type { AlertSource, DedupDecision, DedupEntry, DedupStats } from '@skyfuse/shared';

export interface DedupWindowOptions {
  windowSeconds: number;
  graceMultiple: number; // entries idle for window × grace are evicted
}

/**
 * Time-bounded set of recently admitted fingerprints for one source.
 *
 * `check` is synchronous, so the lookup and the insert/refresh happen in one
 * turn of the event loop and two near-simultaneous candidates can never both
 * observe "no entry".
 */
export class DedupWindow {
  private table = new Map<string, DedupEntry>();
  private windowMs: number;
  private evictAfterMs: number;
  private lastSweep = Number.NEGATIVE_INFINITY;
  private admitted = 0;
  private suppressed = 0;
  private evicted = 0;

  constructor(public readonly source: AlertSource, opts: DedupWindowOptions) {
    this.windowMs = opts.windowSeconds * 1000;
    this.evictAfterMs = this.windowMs * Math.max(1, opts.graceMultiple);
  }

  check(fingerprint: string, now: number): DedupDecision {
    if (now - this.lastSweep >= this.windowMs) this.sweep(now);

    const entry = this.table.get(fingerprint);
    if (!entry) {
      this.table.set(fingerprint, { fingerprint, firstSeen: now, lastSeen: now, lastAdmitted: now, count: 1 });
      this.admitted++;
      return 'admit';
    }

    entry.count++;
    if (now > entry.lastSeen) entry.lastSeen = now;
    if (now - entry.lastAdmitted > this.windowMs) {
      entry.lastAdmitted = now;
      this.admitted++;
      return 'admit';
    }
    this.suppressed++;
    return 'suppress';
  }

  /**
   * Records an admission decided in an earlier run. Leaves the admitted and
   * suppressed counters alone.
   */
  seed(fingerprint: string, admittedAt: number): void {
    const entry = this.table.get(fingerprint);
    if (!entry) {
      this.table.set(fingerprint, {
        fingerprint, firstSeen: admittedAt, lastSeen: admittedAt, lastAdmitted: admittedAt, count: 1,
      });
      return;
    }
    entry.count++;
    entry.firstSeen = Math.min(entry.firstSeen, admittedAt);
    entry.lastSeen = Math.max(entry.lastSeen, admittedAt);
    entry.lastAdmitted = Math.max(entry.lastAdmitted, admittedAt);
  }

  /** Drops entries idle for longer than the grace period. Returns how many went. */
  sweep(now: number): number {
    this.lastSweep = now;
    let dropped = 0;
    for (const [fp, entry] of this.table) {
      if (now - entry.lastSeen > this.evictAfterMs) {
        this.table.delete(fp);
        dropped++;
      }
    }
    this.evicted += dropped;
    return dropped;
  }

  get(fingerprint: string): DedupEntry | undefined {
    const entry = this.table.get(fingerprint);
    return entry ? { ...entry } : undefined;
  }

  /** Snapshot of every live entry. */
  entries(): DedupEntry[] {
    return [...this.table.values()].map(e => ({ ...e }));
  }

  get size(): number {
    return this.table.size;
  }

  clear(): void {
    this.table.clear();
    this.lastSweep = Number.NEGATIVE_INFINITY;
  }

  stats(): DedupStats {
    return {
      source: this.source,
      entries: this.table.size,
      admitted: this.admitted,
      suppressed: this.suppressed,
      evicted: this.evicted,
    };
  }
}
