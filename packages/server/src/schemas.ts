import { z } from 'zod';
import { WEATHER_CATEGORIES } from '@skyfuse/shared';

// Record-level validation for everything that enters a detector.

export const TelemetrySampleSchema = z.object({
  entityId: z.string().min(1),
  timestamp: z.number().int().nonnegative(),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  reportedSpeedKmh: z.number().nonnegative().optional(),
  accuracyM: z.number().nonnegative().optional(),
  signalDbm: z.number().finite().optional(),
});

export const WeatherEventSchema = z.object({
  eventId: z.string().min(1),
  category: z.enum(WEATHER_CATEGORIES),
  timestamp: z.number().int().nonnegative(),
  magnitude: z.number().finite().optional(),
});

export const CyberRecordSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('telemetry'),
    satelliteId: z.string().min(1),
    timestamp: z.number().int().nonnegative(),
    batteryPercent: z.number().min(0).max(100),
    temperatureC: z.number().finite(),
    cpuLoadPercent: z.number().min(0).max(100),
  }),
  z.object({
    kind: z.literal('command'),
    timestamp: z.number().int().nonnegative(),
    sourceIp: z.string().min(1),
    userId: z.string().min(1),
    commandType: z.string().min(1),
    status: z.enum(['SUCCESS', 'FAILED', 'FAILED_AUTH']),
  }),
  z.object({
    kind: z.literal('network'),
    timestamp: z.number().int().nonnegative(),
    sourceIp: z.string().min(1),
    destIp: z.string().min(1),
    packetCount: z.number().int().nonnegative(),
    dataVolumeKb: z.number().nonnegative(),
  }),
]);

export function describeIssues(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.join('.') || '(record)'}: ${i.message}`).join('; ');
}

const satelliteHealth = z.object({
  satelliteId: z.string(),
  metric: z.enum(['temperatureC', 'batteryPercent', 'cpuLoadPercent']),
  value: z.number(),
  threshold: z.number(),
});

const command = z.object({
  sourceIp: z.string(),
  userId: z.string(),
  commandType: z.string(),
  status: z.enum(['SUCCESS', 'FAILED', 'FAILED_AUTH']),
});

const traffic = z.object({
  sourceIp: z.string(),
  destIp: z.string(),
  packetCount: z.number(),
  dataVolumeKb: z.number(),
  threshold: z.number(),
});

const alertBase = {
  id: z.string().min(1),
  fingerprint: z.string().min(1),
  source: z.enum(['gps', 'weather', 'cyber']),
  severity: z.enum(['info', 'warning', 'critical']),
  subject: z.string(),
  timestamp: z.number().int(),
  summary: z.string(),
};

export const AlertSchema = z.discriminatedUnion('category', [
  z.object({
    ...alertBase,
    category: z.literal('GPS_SPOOF_SUSPECTED'),
    details: z.object({
      entityId: z.string(),
      impliedSpeedKmh: z.number(),
      distanceKm: z.number(),
      elapsedSeconds: z.number(),
      speedGateKmh: z.number(),
    }),
  }),
  z.object({
    ...alertBase,
    category: z.literal('GPS_JUMP'),
    details: z.object({
      entityId: z.string(),
      distanceKm: z.number(),
      elapsedSeconds: z.number(),
      jumpDistanceKm: z.number(),
    }),
  }),
  z.object({
    ...alertBase,
    category: z.literal('GPS_SIGNAL_DEGRADED'),
    details: z.object({ entityId: z.string(), accuracyM: z.number(), thresholdM: z.number() }),
  }),
  z.object({
    ...alertBase,
    category: z.literal('GPS_JAMMING_SUSPECTED'),
    details: z.object({ entityId: z.string(), signalDbm: z.number(), thresholdDbm: z.number() }),
  }),
  z.object({
    ...alertBase,
    category: z.literal('WEATHER_RATE_ANOMALY'),
    details: z.object({
      eventCategory: z.enum(WEATHER_CATEGORIES),
      count: z.number(),
      baselineMean: z.number(),
      baselineStddev: z.number(),
      zScore: z.number(),
      windowSeconds: z.number(),
    }),
  }),
  z.object({ ...alertBase, category: z.literal('SAT_HIGH_TEMPERATURE'), details: satelliteHealth }),
  z.object({ ...alertBase, category: z.literal('SAT_LOW_BATTERY'), details: satelliteHealth }),
  z.object({ ...alertBase, category: z.literal('SAT_HIGH_CPU'), details: satelliteHealth }),
  z.object({ ...alertBase, category: z.literal('UNAUTHORIZED_COMMAND'), details: command }),
  z.object({ ...alertBase, category: z.literal('CRITICAL_COMMAND'), details: command }),
  z.object({ ...alertBase, category: z.literal('FAILED_LOGIN'), details: command }),
  z.object({ ...alertBase, category: z.literal('DDOS_SUSPECTED'), details: traffic }),
  z.object({ ...alertBase, category: z.literal('LARGE_PACKET'), details: traffic }),
]);

export const DiagnosticSchema = z.object({
  kind: z.enum(['OUT_OF_ORDER_SAMPLE', 'INVALID_RECORD', 'STALE_EVENT', 'SOURCE_FALLBACK']),
  source: z.enum(['gps', 'weather', 'cyber']),
  timestamp: z.number().int(),
  message: z.string(),
  data: z.record(z.unknown()),
});
