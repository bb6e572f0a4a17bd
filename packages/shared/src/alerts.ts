// ============================================================================
// SkyFuse Alert Types
// ============================================================================
import type { WeatherCategory } from './weather.js';
import type { CommandStatus } from './cyber.js';

export type AlertSource = 'gps' | 'weather' | 'cyber';

export const ALERT_SOURCES: readonly AlertSource[] = ['gps', 'weather', 'cyber'];

export type AlertSeverity = 'info' | 'warning' | 'critical';

export const SEVERITY_RANK: Record<AlertSeverity, number> = {
  info: 0,
  warning: 1,
  critical: 2,
};

export interface SpoofDetails {
  entityId: string;
  impliedSpeedKmh: number;
  distanceKm: number;
  elapsedSeconds: number;
  speedGateKmh: number;
}

export interface JumpDetails {
  entityId: string;
  distanceKm: number;
  elapsedSeconds: number;
  jumpDistanceKm: number;
}

export interface SignalDegradedDetails {
  entityId: string;
  accuracyM: number;
  thresholdM: number;
}

export interface JammingDetails {
  entityId: string;
  signalDbm: number;
  thresholdDbm: number;
}

export interface RateAnomalyDetails {
  eventCategory: WeatherCategory;
  count: number;
  baselineMean: number;
  baselineStddev: number;
  zScore: number;
  windowSeconds: number;
}

export type SatelliteMetric = 'temperatureC' | 'batteryPercent' | 'cpuLoadPercent';

export interface SatelliteHealthDetails {
  satelliteId: string;
  metric: SatelliteMetric;
  value: number;
  threshold: number;
}

export interface CommandDetails {
  sourceIp: string;
  userId: string;
  commandType: string;
  status: CommandStatus;
}

export interface TrafficDetails {
  sourceIp: string;
  destIp: string;
  packetCount: number;
  dataVolumeKb: number;
  threshold: number;
}

export type AlertPayload =
  | { category: 'GPS_SPOOF_SUSPECTED'; details: SpoofDetails }
  | { category: 'GPS_JUMP'; details: JumpDetails }
  | { category: 'GPS_SIGNAL_DEGRADED'; details: SignalDegradedDetails }
  | { category: 'GPS_JAMMING_SUSPECTED'; details: JammingDetails }
  | { category: 'WEATHER_RATE_ANOMALY'; details: RateAnomalyDetails }
  | { category: 'SAT_HIGH_TEMPERATURE'; details: SatelliteHealthDetails }
  | { category: 'SAT_LOW_BATTERY'; details: SatelliteHealthDetails }
  | { category: 'SAT_HIGH_CPU'; details: SatelliteHealthDetails }
  | { category: 'UNAUTHORIZED_COMMAND'; details: CommandDetails }
  | { category: 'CRITICAL_COMMAND'; details: CommandDetails }
  | { category: 'FAILED_LOGIN'; details: CommandDetails }
  | { category: 'DDOS_SUSPECTED'; details: TrafficDetails }
  | { category: 'LARGE_PACKET'; details: TrafficDetails };

export type AlertCategory = AlertPayload['category'];

export const ALERT_CATEGORIES: readonly AlertCategory[] = [
  'GPS_SPOOF_SUSPECTED',
  'GPS_JUMP',
  'GPS_SIGNAL_DEGRADED',
  'GPS_JAMMING_SUSPECTED',
  'WEATHER_RATE_ANOMALY',
  'SAT_HIGH_TEMPERATURE',
  'SAT_LOW_BATTERY',
  'SAT_HIGH_CPU',
  'UNAUTHORIZED_COMMAND',
  'CRITICAL_COMMAND',
  'FAILED_LOGIN',
  'DDOS_SUSPECTED',
  'LARGE_PACKET',
];

/** What a detector raises before fingerprinting and dedup. */
export type AlertCandidate = AlertPayload & {
  source: AlertSource;
  severity: AlertSeverity;
  subject: string; // entity id, or the category bucket for feed-level alerts
  timestamp: number;
  summary: string;
};

export type Alert = AlertCandidate & {
  id: string;
  fingerprint: string;
};

export interface DedupEntry {
  fingerprint: string;
  firstSeen: number;
  lastSeen: number;
  lastAdmitted: number;
  count: number;
}

export type DedupDecision = 'admit' | 'suppress';

export interface DedupStats {
  source: AlertSource;
  entries: number;
  admitted: number;
  suppressed: number;
  evicted: number;
}
