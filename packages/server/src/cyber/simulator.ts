// ============================================================================
// Cyber feed simulator: satellite telemetry, command log, network traffic
// ============================================================================
import type { CommandLogEntry, CyberRecord, NetworkTrafficSample, SatelliteTelemetry } from '@skyfuse/shared';

export interface CyberSimulatorOptions {
  satelliteId?: string;
  anomalyProbability?: number;
  random?: () => number;
  now?: () => number;
}

const OPERATOR_IPS = ['192.168.1.10', '192.168.1.11', '192.168.1.12'];
const ROUTINE_COMMANDS = ['ORBIT_ADJUST', 'DOWNLOAD_DATA', 'ACTIVATE_SENSOR', 'STATUS_CHECK'];
const OPERATORS = ['operator_alpha', 'operator_beta', 'system_auto'];
const GROUND_STATION = '10.0.0.5';

const round2 = (n: number) => Math.round(n * 100) / 100;
const round1 = (n: number) => Math.round(n * 10) / 10;

export class CyberSimulator {
  readonly satelliteId: string;
  private readonly anomalyProbability: number;
  private readonly random: () => number;
  private readonly now: () => number;
  private lastTimestamp = 0;
  lastAnomalous = false;

  constructor(opts: CyberSimulatorOptions = {}) {
    this.satelliteId = opts.satelliteId ?? 'LEB-SAT-001';
    this.anomalyProbability = opts.anomalyProbability ?? 0.18;
    this.random = opts.random ?? Math.random;
    this.now = opts.now ?? Date.now;
  }

  private uniform(min: number, max: number): number {
    return min + (max - min) * this.random();
  }

  private int(min: number, max: number): number {
    return Math.floor(this.uniform(min, max + 1));
  }

  private pick<T>(items: readonly T[]): T {
    return items[Math.min(items.length - 1, Math.floor(this.random() * items.length))];
  }

  /** One record of each kind. A single anomaly draw covers the whole cycle. */
  next(): CyberRecord[] {
    const timestamp = Math.max(this.now(), this.lastTimestamp + 1);
    this.lastTimestamp = timestamp;
    const anomalous = this.random() < this.anomalyProbability;
    this.lastAnomalous = anomalous;
    return [this.telemetry(timestamp, anomalous), this.command(timestamp, anomalous), this.network(timestamp, anomalous)];
  }

  private telemetry(timestamp: number, anomalous: boolean): SatelliteTelemetry {
    let batteryPercent = this.uniform(70, 99);
    let temperatureC = this.uniform(20, 35);
    let cpuLoadPercent = this.uniform(20, 50);
    if (anomalous) {
      switch (this.pick(['temperature', 'battery', 'cpu'] as const)) {
        case 'temperature': temperatureC = this.uniform(80, 120); break;
        case 'battery': batteryPercent = this.uniform(5, 20); break;
        case 'cpu': cpuLoadPercent = this.uniform(80, 100); break;
      }
    }
    return {
      kind: 'telemetry',
      satelliteId: this.satelliteId,
      timestamp,
      batteryPercent: round2(batteryPercent),
      temperatureC: round2(temperatureC),
      cpuLoadPercent: round1(cpuLoadPercent),
    };
  }

  private command(timestamp: number, anomalous: boolean): CommandLogEntry {
    const entry: CommandLogEntry = {
      kind: 'command',
      timestamp,
      sourceIp: this.pick(OPERATOR_IPS),
      userId: this.pick(OPERATORS),
      commandType: this.pick(ROUTINE_COMMANDS),
      status: 'SUCCESS',
    };
    if (!anomalous) return entry;
    switch (this.pick(['foreign-ip', 'critical', 'login'] as const)) {
      case 'foreign-ip':
        return { ...entry, sourceIp: `203.0.113.${this.int(1, 254)}`, userId: 'unknown', status: 'FAILED_AUTH' };
      case 'critical':
        return { ...entry, commandType: 'DEACTIVATE_TRANSPONDER', userId: 'unknown_hacker', status: 'FAILED_AUTH' };
      case 'login':
        return { ...entry, commandType: 'LOGIN_ATTEMPT', status: 'FAILED' };
    }
  }

  private network(timestamp: number, anomalous: boolean): NetworkTrafficSample {
    let sourceIp = `192.168.1.${this.int(10, 20)}`;
    let packetCount = this.int(50, 200);
    let dataVolumeKb = this.int(100, 500);
    if (anomalous) {
      if (this.pick(['flood', 'large'] as const) === 'flood') {
        packetCount = this.int(2000, 5000);
        dataVolumeKb = this.int(5000, 10000);
        sourceIp = `172.16.0.${this.int(1, 254)}`;
      } else {
        packetCount = this.int(10, 20);
        dataVolumeKb = this.int(1000, 3000);
      }
    }
    return { kind: 'network', timestamp, sourceIp, destIp: GROUND_STATION, packetCount, dataVolumeKb };
  }
}
