import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FallbackSource } from './fallback.js';
import { SourceUnavailableError } from '../errors.js';

describe('FallbackSource', () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'skyfuse-fallback-'));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('serves the bundled event set', async () => {
    const batch = await new FallbackSource().fetchEvents(new Date(0));
    expect(batch.origin).toBe('fallback');
    expect(batch.rejected).toEqual([]);
    expect(batch.events).toHaveLength(9);
    const storm = batch.events.find(e => e.category === 'GEOMAGNETIC_STORM');
    expect(storm).toEqual({
      eventId: '2025-03-04T09:00:00-GST-001',
      category: 'GEOMAGNETIC_STORM',
      timestamp: Date.parse('2025-03-04T09:00Z'),
      magnitude: 6.67,
    });
  });

  it('is unavailable when the file is missing or unreadable', async () => {
    await expect(new FallbackSource(path.join(dir, 'missing.json')).fetchEvents(new Date(0)))
      .rejects.toBeInstanceOf(SourceUnavailableError);

    const broken = path.join(dir, 'broken.json');
    fs.writeFileSync(broken, '{ "FLR": [');
    await expect(new FallbackSource(broken).fetchEvents(new Date(0))).rejects.toBeInstanceOf(SourceUnavailableError);
  });

  it('maps only the endpoints present and rejects a file of the wrong shape', async () => {
    const partial = path.join(dir, 'partial.json');
    fs.writeFileSync(partial, JSON.stringify({ RBE: [{ rbeID: 'RBE-1', eventTime: '2025-03-05T13:25Z' }] }));
    const batch = await new FallbackSource(partial).fetchEvents(new Date(0));
    expect(batch.events.map(e => e.eventId)).toEqual(['RBE-1']);

    const list = path.join(dir, 'list.json');
    fs.writeFileSync(list, '[]');
    const rejected = await new FallbackSource(list).fetchEvents(new Date(0));
    expect(rejected.events).toEqual([]);
    expect(rejected.rejected).toHaveLength(1);
  });
});
