/**
 * Health check result model. Computed per request, never persisted.
 */

export type HealthStatus = 'ok' | 'degraded' | 'down';

export type DependencyState = 'up' | 'down';

export interface DependencyCheck {
  name: string;
  /** Whether a failure of this dependency takes the whole service down. */
  critical: boolean;
  state: DependencyState;
  latencyMs: number;
  error?: string;
}

export interface HealthReport {
  status: HealthStatus;
  version: string;
  uptimeMs: number;
  timestamp: string;
  checks: DependencyCheck[];
}

/** Aggregate individual checks: a critical failure is down, any other failure degraded. */
export function aggregateHealth(checks: DependencyCheck[]): HealthStatus {
  if (checks.some((c) => c.critical && c.state === 'down')) return 'down';
  if (checks.some((c) => c.state === 'down')) return 'degraded';
  return 'ok';
}
