/**
 * Health Service.
 *
 * Runs every probe concurrently, each bounded by the configured timeout,
 * and folds the results into one report. A probe that throws or times out
 * is reported as down; check() itself never rejects.
 */

import { HttpDependency } from '../config';
import { dependencyError } from '../domain/errors';
import { DependencyCheck, HealthReport, aggregateHealth } from '../domain/health';
import { Logger } from '../logger';
import { Store } from '../storage/store';

export interface HealthProbe {
  name: string;
  /** A critical probe that fails takes the whole service down. */
  critical: boolean;
  run(signal: AbortSignal): Promise<void>;
}

export interface HealthServiceOptions {
  timeoutMs: number;
  version: string;
  /** Epoch millis the process started at. */
  startedAt: number;
}

export class ProbeTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = 'ProbeTimeoutError';
  }
}

/** Probe the record store through its ping(). */
export function storeProbe(store: Store): HealthProbe {
  return {
    name: 'store',
    critical: true,
    run: () => store.ping(),
  };
}

/** GET the dependency's URL; any 2xx answer means up. */
export function httpProbe(dependency: HttpDependency): HealthProbe {
  return {
    name: dependency.name,
    critical: false,
    async run(signal) {
      const response = await fetch(dependency.url, { method: 'GET', signal });
      // Only the status matters; release the connection.
      await response.body?.cancel();
      if (response.status < 200 || response.status >= 300) {
        throw new Error(`HTTP ${response.status}`);
      }
    },
  };
}

/** Run `fn`, rejecting with ProbeTimeoutError and aborting it once `timeoutMs` passes. */
async function runWithTimeout(fn: (signal: AbortSignal) => Promise<void>, timeoutMs: number): Promise<void> {
  const controller = new AbortController();
  return new Promise<void>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller.abort();
      reject(new ProbeTimeoutError(timeoutMs));
    }, timeoutMs);
    Promise.resolve()
      .then(() => fn(controller.signal))
      .then(() => {
        clearTimeout(timer);
        resolve();
      })
      .catch((err: unknown) => {
        clearTimeout(timer);
        reject(err);
      });
  });
}

export class HealthService {
  constructor(
    private readonly probes: HealthProbe[],
    private readonly logger: Logger,
    private readonly options: HealthServiceOptions,
  ) {}

  async check(): Promise<HealthReport> {
    const checks = await Promise.all(this.probes.map((probe) => this.runProbe(probe)));
    const status = aggregateHealth(checks);
    if (status !== 'ok') {
      this.logger.warn('Health check not ok', {
        status,
        down: checks.filter((c) => c.state === 'down').map((c) => c.name),
      });
    }
    return {
      status,
      version: this.options.version,
      uptimeMs: Date.now() - this.options.startedAt,
      timestamp: new Date().toISOString(),
      checks,
    };
  }

  private async runProbe(probe: HealthProbe): Promise<DependencyCheck> {
    const startedAt = Date.now();
    try {
      await runWithTimeout((signal) => probe.run(signal), this.options.timeoutMs);
      return { name: probe.name, critical: probe.critical, state: 'up', latencyMs: Date.now() - startedAt };
    } catch (err) {
      const reason = err instanceof Error ? err.message : 'Unknown error';
      const failure = dependencyError(probe.name, reason);
      this.logger.debug('Health probe failed', { probe: probe.name, code: failure.code, error: reason });
      return {
        name: probe.name,
        critical: probe.critical,
        state: 'down',
        latencyMs: Date.now() - startedAt,
        error: failure.message,
      };
    }
  }
}
