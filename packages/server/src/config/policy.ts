// ============================================================================
// Threshold policy: flat key→value config resolved once, frozen, fail-fast
// ============================================================================
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { FlatConfig, ThresholdPolicy } from '@skyfuse/shared';
import { PolicyError, errorMessage } from '../errors.js';

const positive = (def: number) => z.coerce.number().finite().positive().default(def);
const positiveInt = (def: number) => z.coerce.number().int().positive().default(def);

export const PolicySchema = z.object({
  speed_gate_kmh: positive(1000),
  speed_gate_critical_multiple: z.coerce.number().finite().min(1).default(3),
  jump_distance_km: positive(2),
  jump_max_elapsed_seconds: positive(60),
  jump_critical_multiple: z.coerce.number().finite().min(1).default(5),
  degraded_accuracy_m: positive(10),
  weak_signal_dbm: z.coerce.number().finite().max(0).default(-135),
  dedup_window_seconds: positive(300),
  dedup_grace_multiple: z.coerce.number().finite().min(1).default(2),
  rate_window_seconds: positive(3600),
  rate_zscore_threshold: positive(3),
  rate_critical_multiple: z.coerce.number().finite().min(1).default(2),
  rate_stddev_floor: positive(1),
  rate_history_windows: positiveInt(24),
  rate_min_history: positiveInt(3),
  rate_baseline: z.enum(['window', 'ewma']).default('window'),
  rate_ewma_alpha: z.coerce.number().gt(0).max(1).default(0.3),
  high_temp_c: z.coerce.number().finite().default(70),
  low_battery_percent: z.coerce.number().finite().min(0).max(100).default(25),
  high_cpu_percent: z.coerce.number().finite().min(0).max(100).default(75),
  command_allowlist: z.string().regex(/^[^,\s]+(,[^,\s]+)*$/, 'expected comma-separated addresses')
    .default('192.168.1.10,192.168.1.11,192.168.1.12'),
  ddos_packets_min: positiveInt(1000),
  large_packet_kb_min: positive(800),
  large_packet_packets_max: positiveInt(50),
  store_max_alerts: positiveInt(500),
  store_max_feed: positiveInt(2000),
  gps_interval_ms: positiveInt(1000),
  weather_interval_ms: positiveInt(60000),
  cyber_interval_ms: positiveInt(1000),
}).strict().superRefine((v, ctx) => {
  if (v.rate_min_history > v.rate_history_windows) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['rate_min_history'],
      message: `must not exceed rate_history_windows (${v.rate_history_windows})`,
    });
  }
});

export type PolicyKey = keyof z.input<typeof PolicySchema>;

export const POLICY_KEYS: readonly PolicyKey[] = PolicySchema.innerType().keyof().options;

export const ENV_PREFIX = 'SKYFUSE_';

function compact(flat: FlatConfig): FlatConfig {
  const out: FlatConfig = {};
  for (const [k, v] of Object.entries(flat)) {
    if (v === undefined) continue;
    if (typeof v === 'string' && v.trim() === '') continue;
    out[k] = typeof v === 'string' ? v.trim() : v;
  }
  return out;
}

/**
 * Resolves layered flat configs (later layers win) into a frozen policy.
 * Missing keys take their documented defaults; anything invalid throws.
 */
export function resolvePolicy(...layers: FlatConfig[]): ThresholdPolicy {
  const merged: FlatConfig = {};
  for (const layer of layers) Object.assign(merged, compact(layer));

  const parsed = PolicySchema.safeParse(merged);
  if (!parsed.success) {
    throw new PolicyError(parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`));
  }
  const v = parsed.data;
  return Object.freeze({
    speedGateKmh: v.speed_gate_kmh,
    speedGateCriticalMultiple: v.speed_gate_critical_multiple,
    jumpDistanceKm: v.jump_distance_km,
    jumpMaxElapsedSeconds: v.jump_max_elapsed_seconds,
    jumpCriticalMultiple: v.jump_critical_multiple,
    degradedAccuracyM: v.degraded_accuracy_m,
    weakSignalDbm: v.weak_signal_dbm,
    dedupWindowSeconds: v.dedup_window_seconds,
    dedupGraceMultiple: v.dedup_grace_multiple,
    rateWindowSeconds: v.rate_window_seconds,
    rateZscoreThreshold: v.rate_zscore_threshold,
    rateCriticalMultiple: v.rate_critical_multiple,
    rateStddevFloor: v.rate_stddev_floor,
    rateHistoryWindows: v.rate_history_windows,
    rateMinHistory: v.rate_min_history,
    rateBaseline: v.rate_baseline,
    rateEwmaAlpha: v.rate_ewma_alpha,
    highTempC: v.high_temp_c,
    lowBatteryPercent: v.low_battery_percent,
    highCpuPercent: v.high_cpu_percent,
    commandAllowlist: Object.freeze(v.command_allowlist.split(',')),
    ddosPacketsMin: v.ddos_packets_min,
    largePacketKbMin: v.large_packet_kb_min,
    largePacketPacketsMax: v.large_packet_packets_max,
    storeMaxAlerts: v.store_max_alerts,
    storeMaxFeed: v.store_max_feed,
    gpsIntervalMs: v.gps_interval_ms,
    weatherIntervalMs: v.weather_interval_ms,
    cyberIntervalMs: v.cyber_interval_ms,
  });
}

/** Picks `SKYFUSE_<KEY>` variables for every known policy key. */
export function policyFromEnv(env: NodeJS.ProcessEnv): FlatConfig {
  const out: FlatConfig = {};
  for (const key of POLICY_KEYS) {
    const value = env[`${ENV_PREFIX}${key.toUpperCase()}`];
    if (value !== undefined) out[key] = value;
  }
  return out;
}

/** Reads a flat JSON object of policy values. A missing file is an empty layer. */
export function policyFromFile(filePath: string): FlatConfig {
  if (!fs.existsSync(filePath)) return {};
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (err) {
    throw new PolicyError([`${filePath}: ${errorMessage(err)}`]);
  }
  const flat = z.record(z.union([z.string(), z.number()])).safeParse(raw);
  if (!flat.success) {
    throw new PolicyError([`${filePath}: expected a flat object of string or number values`]);
  }
  return flat.data;
}

export function loadPolicy(env: NodeJS.ProcessEnv = process.env): ThresholdPolicy {
  const file = env.SKYFUSE_CONFIG || path.join(process.cwd(), 'config', 'policy.json');
  return resolvePolicy(policyFromFile(file), policyFromEnv(env));
}
