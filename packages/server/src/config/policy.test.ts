import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadPolicy, policyFromEnv, policyFromFile, resolvePolicy } from './policy.js';
import { PolicyError } from '../errors.js';

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof PolicyError) return err.issues;
    throw err;
  }
  throw new Error('expected a PolicyError');
}

describe('resolvePolicy', () => {
  it('fills every key with its default and freezes the result', () => {
    const policy = resolvePolicy();
    expect(policy.speedGateKmh).toBe(1000);
    expect(policy.jumpDistanceKm).toBe(2);
    expect(policy.dedupWindowSeconds).toBe(300);
    expect(policy.rateWindowSeconds).toBe(3600);
    expect(policy.rateZscoreThreshold).toBe(3);
    expect(policy.rateBaseline).toBe('window');
    expect(Object.isFrozen(policy)).toBe(true);
  });

  it('lets later layers win and coerces numeric strings', () => {
    const policy = resolvePolicy({ speed_gate_kmh: 800, jump_distance_km: 3 }, { speed_gate_kmh: '900' });
    expect(policy.speedGateKmh).toBe(900);
    expect(policy.jumpDistanceKm).toBe(3);
  });

  it('ignores blank values', () => {
    expect(resolvePolicy({ speed_gate_kmh: 800 }, { speed_gate_kmh: '  ' }).speedGateKmh).toBe(800);
  });

  it('names the offending key', () => {
    expect(issuesOf(() => resolvePolicy({ speed_gate_kmh: -1 }))[0].startsWith('speed_gate_kmh: ')).toBe(true);
    expect(issuesOf(() => resolvePolicy({ dedup_window_seconds: 'soon' }))[0].startsWith('dedup_window_seconds: ')).toBe(true);
    expect(issuesOf(() => resolvePolicy({ rate_baseline: 'median' }))[0].startsWith('rate_baseline: ')).toBe(true);
  });

  it('rejects unknown keys', () => {
    expect(() => resolvePolicy({ speed_gate: 1200 })).toThrow(PolicyError);
  });

  it('requires the minimum history to fit in the kept history', () => {
    expect(issuesOf(() => resolvePolicy({ rate_history_windows: 2, rate_min_history: 3 }))).toEqual([
      'rate_min_history: must not exceed rate_history_windows (2)',
    ]);
  });

  it('splits the command allowlist into addresses', () => {
    expect(resolvePolicy().commandAllowlist).toEqual(['192.168.1.10', '192.168.1.11', '192.168.1.12']);
    expect(resolvePolicy({ command_allowlist: '10.0.0.1,10.0.0.2' }).commandAllowlist).toEqual(['10.0.0.1', '10.0.0.2']);
    expect(issuesOf(() => resolvePolicy({ command_allowlist: '10.0.0.1,,10.0.0.2' }))).toEqual([
      'command_allowlist: expected comma-separated addresses',
    ]);
  });
});

describe('policy sources', () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'skyfuse-policy-'));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads SKYFUSE_ variables for known keys only', () => {
    expect(policyFromEnv({
      SKYFUSE_RATE_BASELINE: 'ewma',
      SKYFUSE_DEDUP_WINDOW_SECONDS: '120',
      SKYFUSE_CONFIG: '/etc/skyfuse.json',
      PATH: '/usr/bin',
    })).toEqual({ rate_baseline: 'ewma', dedup_window_seconds: '120' });
  });

  it('treats a missing file as an empty layer', () => {
    expect(policyFromFile(path.join(dir, 'absent.json'))).toEqual({});
  });

  it('refuses a file that is not a flat object', () => {
    const nested = path.join(dir, 'nested.json');
    fs.writeFileSync(nested, JSON.stringify({ gps: { speed_gate_kmh: 900 } }));
    expect(() => policyFromFile(nested)).toThrow(PolicyError);

    const garbage = path.join(dir, 'garbage.json');
    fs.writeFileSync(garbage, 'speed_gate_kmh = 900');
    expect(() => policyFromFile(garbage)).toThrow(PolicyError);
  });

  it('layers the environment over the file', () => {
    const file = path.join(dir, 'policy.json');
    fs.writeFileSync(file, JSON.stringify({ speed_gate_kmh: 800, jump_distance_km: 3 }));
    const policy = loadPolicy({ SKYFUSE_CONFIG: file, SKYFUSE_SPEED_GATE_KMH: '1200' });
    expect(policy.speedGateKmh).toBe(1200);
    expect(policy.jumpDistanceKm).toBe(3);
  });
});
