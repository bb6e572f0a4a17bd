// ============================================================================
// SkyFuse Threshold Policy
// ============================================================================

export type BaselineKind = 'window' | 'ewma';

/** Resolved once at startup, read-only afterwards. */
export interface ThresholdPolicy {
  // GPS speed gate
  speedGateKmh: number;
  speedGateCriticalMultiple: number;
  // GPS jump
  jumpDistanceKm: number;
  jumpMaxElapsedSeconds: number;
  jumpCriticalMultiple: number;
  // GPS signal quality
  degradedAccuracyM: number;
  weakSignalDbm: number;
  // Dedup
  dedupWindowSeconds: number;
  dedupGraceMultiple: number;
  // Weather rate anomaly
  rateWindowSeconds: number;
  rateZscoreThreshold: number;
  rateCriticalMultiple: number;
  rateStddevFloor: number;
  rateHistoryWindows: number;
  rateMinHistory: number;
  rateBaseline: BaselineKind;
  rateEwmaAlpha: number;
  // Satellite health
  highTempC: number;
  lowBatteryPercent: number;
  highCpuPercent: number;
  // Command log
  commandAllowlist: readonly string[];
  // Network traffic
  ddosPacketsMin: number;
  largePacketKbMin: number;
  largePacketPacketsMax: number;
  // Store retention
  storeMaxAlerts: number;
  storeMaxFeed: number;
  // Producer cadence
  gpsIntervalMs: number;
  weatherIntervalMs: number;
  cyberIntervalMs: number;
}

/** Flat key→value form, as read from files and the environment. */
export type FlatConfig = Record<string, string | number | undefined>;
