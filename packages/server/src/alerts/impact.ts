import type { Alert, AlertCategory, ImpactNote } from '@skyfuse/shared';

const GNSS_INTEGRITY: ImpactNote[] = [
  { domain: 'aviation', level: 'high', note: 'Navigation integrity risk near airport and flight routes' },
  { domain: 'maritime', level: 'medium', note: 'Course deviation risk for port approaches' },
  { domain: 'telecom', level: 'low', note: 'Timing source degradation' },
];

const HOSTILE_CONTROL: ImpactNote[] = [
  { domain: 'operations', level: 'high', note: 'Potential hostile control attempt' },
  { domain: 'security', level: 'high', note: 'Access control failure' },
];

const MONITOR: ImpactNote[] = [
  { domain: 'general', level: 'low', note: 'Monitor' },
];

const IMPACTS: Record<AlertCategory, ImpactNote[]> = {
  GPS_SPOOF_SUSPECTED: GNSS_INTEGRITY,
  GPS_JUMP: GNSS_INTEGRITY,
  GPS_JAMMING_SUSPECTED: [
    { domain: 'aviation', level: 'high', note: 'Loss of GNSS positioning on approach' },
    { domain: 'telecom', level: 'medium', note: 'Timing holdover on GNSS-disciplined clocks' },
  ],
  GPS_SIGNAL_DEGRADED: [
    { domain: 'aviation', level: 'low', note: 'Reduced position accuracy' },
  ],
  WEATHER_RATE_ANOMALY: [
    { domain: 'aviation', level: 'medium', note: 'HF comms degraded; GNSS accuracy impacted' },
    { domain: 'power', level: 'medium', note: 'Geomagnetically induced currents risk' },
    { domain: 'telecom', level: 'medium', note: 'Ionospheric disturbance adds signal noise' },
  ],
  DDOS_SUSPECTED: [
    { domain: 'telecom', level: 'high', note: 'Traffic saturation and packet loss' },
    { domain: 'operations', level: 'medium', note: 'Service degradation for ground stations' },
  ],
  UNAUTHORIZED_COMMAND: HOSTILE_CONTROL,
  CRITICAL_COMMAND: HOSTILE_CONTROL,
  FAILED_LOGIN: MONITOR,
  LARGE_PACKET: MONITOR,
  SAT_HIGH_TEMPERATURE: MONITOR,
  SAT_LOW_BATTERY: MONITOR,
  SAT_HIGH_CPU: MONITOR,
};

/** Affected domains for an alert; critical alerts raise every note by one level. */
export function assessImpact(alert: Alert): ImpactNote[] {
  const notes = IMPACTS[alert.category];
  if (alert.severity !== 'critical') return notes.map(n => ({ ...n }));
  return notes.map((n): ImpactNote => ({ ...n, level: n.level === 'low' ? 'medium' : 'high' }));
}
