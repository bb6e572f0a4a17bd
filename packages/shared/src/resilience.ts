// Health & runtime status types

export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  version: string;
  uptime: number;
  timestamp: number;
  components: ComponentHealth[];
}

export interface ComponentHealth {
  name: string;
  status: 'up' | 'down' | 'degraded';
  lastCheck: number;
  details?: Record<string, unknown>;
  error?: string;
}

export interface LoopStatus {
  name: string;
  running: boolean;
  cycles: number;
  failures: number;
  lastCycleAt?: number;
  lastError?: string;
}
