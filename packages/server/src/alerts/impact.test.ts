import { describe, it, expect } from 'vitest';
import type { Alert } from '@skyfuse/shared';
import { assessImpact } from './impact.js';

function spoof(severity: Alert['severity']): Alert {
  return {
    id: 'gps-1-abc', fingerprint: 'abc', source: 'gps', severity, subject: 'E1', timestamp: 1, summary: 'spoof',
    category: 'GPS_SPOOF_SUSPECTED',
    details: { entityId: 'E1', impliedSpeedKmh: 1500, distanceKm: 0.42, elapsedSeconds: 1, speedGateKmh: 1000 },
  };
}

describe('assessImpact', () => {
  it('lists the affected domains for the category', () => {
    expect(assessImpact(spoof('warning')).map(n => [n.domain, n.level])).toEqual([
      ['aviation', 'high'],
      ['maritime', 'medium'],
      ['telecom', 'low'],
    ]);
  });

  it('raises every level for a critical alert without touching the table', () => {
    expect(assessImpact(spoof('critical')).map(n => n.level)).toEqual(['high', 'high', 'medium']);
    expect(assessImpact(spoof('warning')).map(n => n.level)).toEqual(['high', 'medium', 'low']);
  });
});

describe('assessImpact for the cyber feed', () => {
  function command(category: 'CRITICAL_COMMAND' | 'FAILED_LOGIN', severity: Alert['severity']): Alert {
    return {
      id: 'cyber-1-abc', fingerprint: 'abc', source: 'cyber', severity, subject: '203.0.113.7', timestamp: 1, summary: 'cmd',
      category,
      details: { sourceIp: '203.0.113.7', userId: 'unknown_hacker', commandType: 'DEACTIVATE_TRANSPONDER', status: 'FAILED_AUTH' },
    };
  }

  it('flags a critical command against operations and security', () => {
    expect(assessImpact(command('CRITICAL_COMMAND', 'critical')).map(n => [n.domain, n.level])).toEqual([
      ['operations', 'high'],
      ['security', 'high'],
    ]);
  });

  it('falls back to a general watch note', () => {
    expect(assessImpact(command('FAILED_LOGIN', 'info'))).toEqual([{ domain: 'general', level: 'low', note: 'Monitor' }]);
  });
});
