// ============================================================================
// Alert / Feed Store: bounded, timestamp-ordered, partitioned by source
// ============================================================================
import type { Alert, AlertSource } from '@skyfuse/shared';
import { ALERT_SOURCES } from '@skyfuse/shared';

interface Timestamped {
  timestamp: number;
}

/**
 * Ascending-by-timestamp list capped at `capacity`; the oldest entries go
 * first when it overflows. Items with equal timestamps keep arrival order.
 */
export class BoundedTimeline<T extends Timestamped> {
  private items: T[] = [];

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Timeline capacity must be a positive integer, got ${capacity}`);
    }
  }

  append(item: T): void {
    const last = this.items[this.items.length - 1];
    if (!last || last.timestamp <= item.timestamp) {
      this.items.push(item);
    } else {
      this.items.splice(this.upperBound(item.timestamp), 0, item);
    }
    if (this.items.length > this.capacity) {
      this.items.splice(0, this.items.length - this.capacity);
    }
  }

  /** Newest first. */
  recent(n: number): T[] {
    if (n <= 0) return [];
    return this.items.slice(-n).reverse();
  }

  /** Oldest first, `timestamp >= since`. */
  since(since: number): T[] {
    return this.items.slice(this.lowerBound(since));
  }

  all(): T[] {
    return [...this.items];
  }

  get size(): number {
    return this.items.length;
  }

  clear(): void {
    this.items = [];
  }

  // first index with timestamp >= ts
  private lowerBound(ts: number): number {
    let lo = 0, hi = this.items.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.items[mid].timestamp < ts) lo = mid + 1; else hi = mid;
    }
    return lo;
  }

  // first index with timestamp > ts
  private upperBound(ts: number): number {
    let lo = 0, hi = this.items.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.items[mid].timestamp <= ts) lo = mid + 1; else hi = mid;
    }
    return lo;
  }
}

function freezeAlert(alert: Alert): Alert {
  Object.freeze(alert.details);
  Object.freeze(alert);
  return alert;
}

/**
 * Accepted alerts. Each source writes only to its own partition; reads merge
 * the partitions by timestamp.
 */
export class AlertStore {
  private partitions = new Map<AlertSource, BoundedTimeline<Alert>>();

  constructor(public readonly capacityPerSource: number) {
    for (const source of ALERT_SOURCES) {
      this.partitions.set(source, new BoundedTimeline<Alert>(capacityPerSource));
    }
  }

  append(alert: Alert): Alert {
    const frozen = freezeAlert(alert);
    this.partition(alert.source).append(frozen);
    return frozen;
  }

  /** Newest first across all sources. */
  recent(n: number, source?: AlertSource): Alert[] {
    if (source) return this.partition(source).recent(n);
    const merged: Alert[] = [];
    for (const p of this.partitions.values()) merged.push(...p.recent(n));
    return merged.sort((a, b) => b.timestamp - a.timestamp).slice(0, Math.max(0, n));
  }

  /** Oldest first across all sources, `timestamp >= since`. */
  since(since: number, source?: AlertSource): Alert[] {
    if (source) return this.partition(source).since(since);
    const merged: Alert[] = [];
    for (const p of this.partitions.values()) merged.push(...p.since(since));
    return merged.sort((a, b) => a.timestamp - b.timestamp);
  }

  findById(id: string): Alert | undefined {
    for (const p of this.partitions.values()) {
      const hit = p.all().find(a => a.id === id);
      if (hit) return hit;
    }
    return undefined;
  }

  size(source?: AlertSource): number {
    if (source) return this.partition(source).size;
    let total = 0;
    for (const p of this.partitions.values()) total += p.size;
    return total;
  }

  private partition(source: AlertSource): BoundedTimeline<Alert> {
    let p = this.partitions.get(source);
    if (!p) {
      p = new BoundedTimeline<Alert>(this.capacityPerSource);
      this.partitions.set(source, p);
    }
    return p;
  }
}
