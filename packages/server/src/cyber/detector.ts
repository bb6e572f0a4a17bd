// ============================================================================
// Cyber Detector: satellite health, command log and traffic threshold rules
// ============================================================================
import type {
  Alert, AlertCandidate, CommandLogEntry, CyberRecord, NetworkTrafficSample, SatelliteTelemetry,
} from '@skyfuse/shared';
import { CRITICAL_COMMANDS } from '@skyfuse/shared';
import type { AlertPipeline } from '../alerts/pipeline.js';
import { CyberRecordSchema, describeIssues } from '../schemas.js';

export class CyberDetector {
  constructor(private pipeline: AlertPipeline) {}

  /** Runs one record through the rules for its kind. Returns the alerts that reached the store. */
  process(raw: unknown): Alert[] {
    const parsed = CyberRecordSchema.safeParse(raw);
    if (!parsed.success) {
      this.pipeline.diagnose({
        kind: 'INVALID_RECORD',
        source: 'cyber',
        timestamp: Date.now(),
        message: `Rejected cyber record: ${describeIssues(parsed.error)}`,
        data: { record: raw },
      });
      return [];
    }
    const record: CyberRecord = parsed.data;
    this.pipeline.recordCyber(record);

    const admitted: Alert[] = [];
    for (const c of this.rulesFor(record)) {
      const alert = this.pipeline.submit(c);
      if (alert) admitted.push(alert);
    }
    return admitted;
  }

  processAll(records: Iterable<unknown>): Alert[] {
    const out: Alert[] = [];
    for (const r of records) out.push(...this.process(r));
    return out;
  }

  private rulesFor(record: CyberRecord): AlertCandidate[] {
    switch (record.kind) {
      case 'telemetry': return this.telemetryRules(record);
      case 'command': return this.commandRules(record);
      case 'network': return this.networkRules(record);
    }
  }

  private telemetryRules(t: SatelliteTelemetry): AlertCandidate[] {
    const p = this.pipeline.policy;
    const base = { source: 'cyber' as const, subject: t.satelliteId, timestamp: t.timestamp };
    const out: AlertCandidate[] = [];
    if (t.temperatureC > p.highTempC) {
      out.push({
        ...base,
        category: 'SAT_HIGH_TEMPERATURE',
        severity: 'warning',
        summary: `${t.satelliteId} - High temperature (${t.temperatureC} °C)`,
        details: { satelliteId: t.satelliteId, metric: 'temperatureC', value: t.temperatureC, threshold: p.highTempC },
      });
    }
    if (t.batteryPercent < p.lowBatteryPercent) {
      out.push({
        ...base,
        category: 'SAT_LOW_BATTERY',
        severity: 'warning',
        summary: `${t.satelliteId} - Critical low battery (${t.batteryPercent}%)`,
        details: { satelliteId: t.satelliteId, metric: 'batteryPercent', value: t.batteryPercent, threshold: p.lowBatteryPercent },
      });
    }
    if (t.cpuLoadPercent > p.highCpuPercent) {
      out.push({
        ...base,
        category: 'SAT_HIGH_CPU',
        severity: 'info',
        summary: `${t.satelliteId} - High CPU load (${t.cpuLoadPercent}%)`,
        details: { satelliteId: t.satelliteId, metric: 'cpuLoadPercent', value: t.cpuLoadPercent, threshold: p.highCpuPercent },
      });
    }
    return out;
  }

  private commandRules(c: CommandLogEntry): AlertCandidate[] {
    const base = { source: 'cyber' as const, subject: c.sourceIp, timestamp: c.timestamp };
    const details = { sourceIp: c.sourceIp, userId: c.userId, commandType: c.commandType, status: c.status };
    const out: AlertCandidate[] = [];
    if (!this.pipeline.policy.commandAllowlist.includes(c.sourceIp) && c.userId === 'unknown') {
      out.push({
        ...base,
        category: 'UNAUTHORIZED_COMMAND',
        severity: 'warning',
        summary: `Unauthorized IP (${c.sourceIp}) attempting '${c.commandType}'`,
        details,
      });
    }
    if (CRITICAL_COMMANDS.includes(c.commandType) && c.userId === 'unknown_hacker') {
      out.push({
        ...base,
        category: 'CRITICAL_COMMAND',
        severity: 'critical',
        summary: `Critical '${c.commandType}' from unknown user`,
        details,
      });
    }
    if (c.status !== 'SUCCESS' && c.commandType === 'LOGIN_ATTEMPT') {
      out.push({
        ...base,
        category: 'FAILED_LOGIN',
        severity: 'info',
        summary: `Failed login from ${c.sourceIp}`,
        details,
      });
    }
    return out;
  }

  private networkRules(n: NetworkTrafficSample): AlertCandidate[] {
    const p = this.pipeline.policy;
    const base = { source: 'cyber' as const, subject: n.sourceIp, timestamp: n.timestamp };
    const traffic = { sourceIp: n.sourceIp, destIp: n.destIp, packetCount: n.packetCount, dataVolumeKb: n.dataVolumeKb };
    const out: AlertCandidate[] = [];
    if (n.packetCount > p.ddosPacketsMin) {
      out.push({
        ...base,
        category: 'DDOS_SUSPECTED',
        severity: 'warning',
        summary: `Traffic spike (${n.packetCount} pkts) from ${n.sourceIp}`,
        details: { ...traffic, threshold: p.ddosPacketsMin },
      });
    }
    if (n.dataVolumeKb > p.largePacketKbMin && n.packetCount < p.largePacketPacketsMax) {
      out.push({
        ...base,
        category: 'LARGE_PACKET',
        severity: 'info',
        summary: `Large packet (${n.dataVolumeKb} KB) from ${n.sourceIp}`,
        details: { ...traffic, threshold: p.largePacketKbMin },
      });
    }
    return out;
  }
}
