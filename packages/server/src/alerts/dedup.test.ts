import { describe, it, expect } from 'vitest';
import { DedupWindow } from './dedup.js';

const WINDOW_MS = 300_000;

function makeWindow() {
  return new DedupWindow('gps', { windowSeconds: 300, graceMultiple: 2 });
}

describe('DedupWindow', () => {
  it('admits the first sighting and suppresses repeats inside the window', () => {
    const w = makeWindow();
    expect(w.check('fp', 0)).toBe('admit');
    expect(w.check('fp', 1000)).toBe('suppress');
    expect(w.check('fp', WINDOW_MS)).toBe('suppress');
    expect(w.get('fp')).toEqual({ fingerprint: 'fp', firstSeen: 0, lastSeen: WINDOW_MS, lastAdmitted: 0, count: 3 });
  });

  it('admits again once the window has passed since the last admission', () => {
    const w = makeWindow();
    w.check('fp', 0);
    // a suppressed sighting does not push the next admission back
    expect(w.check('fp', 200_000)).toBe('suppress');
    expect(w.check('fp', WINDOW_MS + 1)).toBe('admit');
    expect(w.get('fp')?.lastAdmitted).toBe(WINDOW_MS + 1);
    expect(w.check('fp', WINDOW_MS + 2)).toBe('suppress');
  });

  it('keeps fingerprints independent', () => {
    const w = makeWindow();
    expect(w.check('a', 0)).toBe('admit');
    expect(w.check('b', 0)).toBe('admit');
    expect(w.size).toBe(2);
    expect(w.entries().map(e => e.fingerprint)).toEqual(['a', 'b']);
  });

  it('evicts entries idle for longer than window × grace', () => {
    const w = makeWindow();
    w.check('fp', 0);
    expect(w.sweep(2 * WINDOW_MS)).toBe(0);
    expect(w.sweep(2 * WINDOW_MS + 1)).toBe(1);
    expect(w.get('fp')).toBeUndefined();
  });

  it('sweeps as part of check once a window has elapsed', () => {
    const w = makeWindow();
    w.check('old', 0);
    w.check('new', 700_000);
    expect(w.get('old')).toBeUndefined();
    expect(w.size).toBe(1);
  });

  it('seeds earlier admissions without counting them', () => {
    const w = makeWindow();
    w.seed('fp', 0);
    expect(w.stats()).toEqual({ source: 'gps', entries: 1, admitted: 0, suppressed: 0, evicted: 0 });
    expect(w.check('fp', 1000)).toBe('suppress');
    expect(w.check('fp', WINDOW_MS + 1)).toBe('admit');
  });

  it('counts decisions in its stats', () => {
    const w = makeWindow();
    w.check('fp', 0);
    w.check('fp', 10);
    w.check('fp', 20);
    w.sweep(10 * WINDOW_MS);
    expect(w.stats()).toEqual({ source: 'gps', entries: 0, admitted: 1, suppressed: 2, evicted: 1 });
  });
});
