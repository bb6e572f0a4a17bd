// ============================================================================
// SkyFuse Cyber Feed Types: satellite telemetry, command log, network traffic
// ============================================================================

export interface SatelliteTelemetry {
  kind: 'telemetry';
  satelliteId: string;
  timestamp: number;
  batteryPercent: number;
  temperatureC: number;
  cpuLoadPercent: number;
}

export type CommandStatus = 'SUCCESS' | 'FAILED' | 'FAILED_AUTH';

export interface CommandLogEntry {
  kind: 'command';
  timestamp: number;
  sourceIp: string;
  userId: string;
  commandType: string;
  status: CommandStatus;
}

export interface NetworkTrafficSample {
  kind: 'network';
  timestamp: number;
  sourceIp: string;
  destIp: string;
  packetCount: number;
  dataVolumeKb: number;
}

export type CyberRecord = SatelliteTelemetry | CommandLogEntry | NetworkTrafficSample;

export type CyberRecordKind = CyberRecord['kind'];

/** Commands that can take a satellite out of service. */
export const CRITICAL_COMMANDS: readonly string[] = ['DEACTIVATE_TRANSPONDER', 'FACTORY_RESET', 'ORBIT_DECAY'];
