// ============================================================================
// SkyFuse GPS / Cyber Telemetry Types
// ============================================================================

export interface GeoPoint {
  latitude: number;  // degrees, -90..90
  longitude: number; // degrees, -180..180
}

export interface TimedFix extends GeoPoint {
  timestamp: number; // ms since epoch
}

export interface TelemetrySample extends TimedFix {
  entityId: string;
  reportedSpeedKmh?: number;
  accuracyM?: number;  // receiver horizontal accuracy estimate
  signalDbm?: number;  // received signal strength
}
