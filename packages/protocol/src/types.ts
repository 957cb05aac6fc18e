/**
 * A principal entitled to connect through the proxy, as stored in the
 * managed inbound's `settings.clients` array.
 */
export interface ProxyUser {
  id: string;
  email?: string;
  flow?: string;
}

export type HealthStatus = 'unknown' | 'up' | 'down' | 'degraded';

export interface HealthSample {
  status: HealthStatus;
  timestamp: number;
  reason?: string;
}

export interface MetricsSample {
  timestamp: number;
  load: number;
  usersCount: number;
  xrayStatus: 'running' | 'stopped';
  uptimeSeconds: number;
  counters: Record<string, number>;
}

export type CommandStatus = 'queued' | 'running' | 'applied' | 'failed';
