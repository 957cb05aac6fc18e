import { EventEmitter } from 'node:events';
import { AgentEvent, type HealthPayload, type HealthStatus } from '@xray-agent/protocol';
import { errorMessage } from '../errors.js';
import type { EventReporter } from '../registry/EventReporter.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { withTimeout } from '../utils/retry.js';
import type { ProcessProbe, ProxyController } from '../xray/ProxyController.js';

const TRANSITIONS: Record<HealthStatus, readonly HealthStatus[]> = {
  unknown: ['up', 'down', 'degraded'],
  up: ['down', 'degraded'],
  down: ['up'],
  degraded: ['up', 'down'],
};

export function canTransition(from: HealthStatus, to: HealthStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export interface HealthTransition {
  from: HealthStatus;
  to: HealthStatus;
  reason?: string;
  at: number;
}

export interface HealthMonitorOptions {
  controller: Pick<ProxyController, 'probe'>;
  reporter?: EventReporter;
  intervalMs: number;
  /** Consecutive failed probes before the proxy counts as down. */
  failureThreshold?: number;
  probeTimeoutMs?: number;
  logger?: Logger;
}

interface HealthMonitorEvents {
  transition: [transition: HealthTransition];
}

/**
 * Polls the proxy on a fixed interval and tracks its health. Each
 * transition into `down` or `degraded`, and each recovery from them,
 * pushes one event to the Core API; the push is not awaited by the loop.
 */
export class HealthMonitor extends EventEmitter<HealthMonitorEvents> {
  private controller: Pick<ProxyController, 'probe'>;
  private reporter?: EventReporter;
  private intervalMs: number;
  private failureThreshold: number;
  private probeTimeoutMs: number;
  private logger: Logger;
  private timer: ReturnType<typeof setInterval> | null = null;
  private ticking: Promise<void> | null = null;
  private state: HealthStatus = 'unknown';
  private consecutiveFailures = 0;
  private registrationHealthy = true;
  private lastProbe: number | null = null;

  constructor(options: HealthMonitorOptions) {
    super();
    this.controller = options.controller;
    this.reporter = options.reporter;
    this.intervalMs = options.intervalMs;
    this.failureThreshold = options.failureThreshold ?? 2;
    this.probeTimeoutMs = options.probeTimeoutMs ?? options.intervalMs;
    this.logger = options.logger ?? rootLogger.child({ component: 'health-monitor' });
  }

  get status(): HealthStatus {
    return this.state;
  }

  get lastProbeAt(): number | null {
    return this.lastProbe;
  }

  /** Registration trouble keeps an otherwise healthy agent in `degraded`. */
  setRegistrationHealthy(healthy: boolean): void {
    this.registrationHealthy = healthy;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    void this.tick();
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.ticking) {
      await this.ticking;
    }
  }

  /** Run one probe. Overlapping calls share the probe already in flight. */
  tick(): Promise<void> {
    if (!this.ticking) {
      this.ticking = this.runProbe().finally(() => {
        this.ticking = null;
      });
    }
    return this.ticking;
  }

  private async runProbe(): Promise<void> {
    let probe: ProcessProbe;
    try {
      probe = await withTimeout(this.controller.probe(), this.probeTimeoutMs, 'Proxy probe');
    } catch (err) {
      probe = { running: false, managementReachable: false, detail: errorMessage(err) };
    }
    this.lastProbe = Date.now();

    const observed = this.evaluate(probe);
    if (observed) {
      this.moveTo(observed.status, observed.reason);
    }
  }

  private evaluate(probe: ProcessProbe): { status: HealthStatus; reason?: string } | null {
    if (!probe.running) {
      this.consecutiveFailures++;
      if (this.consecutiveFailures < this.failureThreshold) {
        this.logger.debug({ failures: this.consecutiveFailures, detail: probe.detail }, 'Proxy probe failed');
        return null;
      }
      return { status: 'down', reason: probe.detail ?? 'Proxy process not running' };
    }

    this.consecutiveFailures = 0;

    if (!probe.managementReachable) {
      return { status: 'degraded', reason: probe.detail ?? 'Management interface unreachable' };
    }
    if (!this.registrationHealthy) {
      return { status: 'degraded', reason: 'Registration with Core API failing' };
    }
    return { status: 'up' };
  }

  private moveTo(to: HealthStatus, reason?: string): void {
    const from = this.state;
    if (from === to || !canTransition(from, to)) return;

    this.state = to;
    const transition: HealthTransition = { from, to, reason, at: Date.now() };

    if (to === 'up') {
      this.logger.info({ from, to }, 'Proxy health changed');
    } else {
      this.logger.warn({ from, to, reason }, 'Proxy health changed');
    }
    this.emit('transition', transition);

    if (to !== 'up' || from === 'down' || from === 'degraded') {
      this.push(transition);
    }
  }

  private push(transition: HealthTransition): void {
    if (!this.reporter) return;

    const payload: HealthPayload = {
      status: transition.to,
      previous: transition.from,
      timestamp: new Date(transition.at).toISOString(),
    };
    if (transition.reason) payload.reason = transition.reason;

    const event =
      transition.to === 'down'
        ? AgentEvent.XRAY_STOPPED
        : transition.to === 'degraded'
          ? AgentEvent.XRAY_DEGRADED
          : AgentEvent.HEALTH;
    this.reporter.report(event, payload);
  }
}
