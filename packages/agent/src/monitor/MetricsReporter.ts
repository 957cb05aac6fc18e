import * as os from 'node:os';
import { AgentEvent, type HealthStatus, type MetricsPayload, type MetricsSample } from '@xray-agent/protocol';
import { errorMessage } from '../errors.js';
import type { EventReporter } from '../registry/EventReporter.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { withTimeout } from '../utils/retry.js';
import type { ProxyController } from '../xray/ProxyController.js';

export interface MetricsReporterOptions {
  controller: Pick<ProxyController, 'queryStats'>;
  reporter?: EventReporter;
  health: { readonly status: HealthStatus };
  usersCount: () => number;
  intervalMs: number;
  queryTimeoutMs?: number;
  /** Injected for tests; defaults to the 1-minute load average. */
  loadAverage?: () => number;
  logger?: Logger;
}

export function toMetricsPayload(sample: MetricsSample): MetricsPayload {
  return {
    timestamp: new Date(sample.timestamp).toISOString(),
    load: sample.load,
    users_count: sample.usersCount,
    xray_status: sample.xrayStatus,
    uptime_seconds: sample.uptimeSeconds,
    counters: sample.counters,
  };
}

/**
 * Collects a metrics sample on a fixed interval and pushes it to the Core
 * API. A failed push is dropped; nothing is queued for later.
 */
export class MetricsReporter {
  private controller: Pick<ProxyController, 'queryStats'>;
  private reporter?: EventReporter;
  private health: { readonly status: HealthStatus };
  private usersCount: () => number;
  private intervalMs: number;
  private queryTimeoutMs: number;
  private loadAverage: () => number;
  private logger: Logger;
  private timer: ReturnType<typeof setInterval> | null = null;
  private collecting: Promise<MetricsSample> | null = null;
  private runningSince: number | null = null;
  private lastSample: MetricsSample | null = null;

  constructor(options: MetricsReporterOptions) {
    this.controller = options.controller;
    this.reporter = options.reporter;
    this.health = options.health;
    this.usersCount = options.usersCount;
    this.intervalMs = options.intervalMs;
    this.queryTimeoutMs = options.queryTimeoutMs ?? options.intervalMs;
    this.loadAverage = options.loadAverage ?? (() => os.loadavg()[0]);
    this.logger = options.logger ?? rootLogger.child({ component: 'metrics-reporter' });
  }

  get lastSampleAt(): number | null {
    return this.lastSample?.timestamp ?? null;
  }

  get latest(): MetricsSample | null {
    return this.lastSample;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.collecting) {
      await this.collecting;
    }
  }

  /** Collect one sample and push it without waiting for delivery. */
  tick(): Promise<MetricsSample> {
    if (!this.collecting) {
      this.collecting = this.collect()
        .then((sample) => {
          this.lastSample = sample;
          this.reporter?.report(AgentEvent.METRICS, toMetricsPayload(sample));
          return sample;
        })
        .finally(() => {
          this.collecting = null;
        });
    }
    return this.collecting;
  }

  private async collect(): Promise<MetricsSample> {
    const now = Date.now();
    const status = this.health.status;
    const running = status === 'up' || status === 'degraded';

    if (running && this.runningSince === null) {
      this.runningSince = now;
    } else if (!running) {
      this.runningSince = null;
    }

    let counters: Record<string, number> = {};
    if (running) {
      try {
        counters = await withTimeout(this.controller.queryStats(), this.queryTimeoutMs, 'Stats query');
      } catch (err) {
        this.logger.warn({ err: errorMessage(err) }, 'Failed to read proxy counters');
      }
    }

    return {
      timestamp: now,
      load: roundLoad(this.loadAverage()),
      usersCount: this.usersCount(),
      xrayStatus: running ? 'running' : 'stopped',
      uptimeSeconds: this.runningSince === null ? 0 : Math.floor((now - this.runningSince) / 1000),
      counters,
    };
  }
}

function roundLoad(value: number): number {
  return Number.isFinite(value) ? Math.round(value * 100) / 100 : 0;
}
