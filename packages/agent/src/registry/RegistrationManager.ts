import { EventEmitter } from 'node:events';
import { AGENT_VERSION, AgentEvent } from '@xray-agent/protocol';
import { errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import type { CoreApiClient } from './CoreApiClient.js';

export interface RegistrationManagerOptions {
  client: Pick<CoreApiClient, 'register' | 'report' | 'lastAcknowledgedAt' | 'enabled'>;
  agentUrl: string;
  version?: string;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Re-register once the Core API has not acknowledged anything for this long. */
  reRegisterAfterMs: number;
  logger?: Logger;
}

interface RegistrationEvents {
  registered: [attempts: number];
  failed: [attempt: number, error: Error];
}

/**
 * Registers the agent with the Core API in the background. Attempts
 * repeat with exponential backoff until one succeeds or `stop` is called;
 * nothing waits on them, so the command endpoint is ready meanwhile.
 */
export class RegistrationManager extends EventEmitter<RegistrationEvents> {
  private client: RegistrationManagerOptions['client'];
  private agentUrl: string;
  private version: string;
  private baseDelayMs: number;
  private maxDelayMs: number;
  private reRegisterAfterMs: number;
  private logger: Logger;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private watchdog: ReturnType<typeof setInterval> | null = null;
  private isRegistered = false;

  constructor(options: RegistrationManagerOptions) {
    super();
    this.client = options.client;
    this.agentUrl = options.agentUrl;
    this.version = options.version ?? AGENT_VERSION;
    this.baseDelayMs = options.baseDelayMs ?? 2000;
    this.maxDelayMs = options.maxDelayMs ?? 60_000;
    this.reRegisterAfterMs = options.reRegisterAfterMs;
    this.logger = options.logger ?? rootLogger.child({ component: 'registration' });
  }

  get registered(): boolean {
    return this.isRegistered;
  }

  start(): void {
    if (this.controller) return;

    if (!this.client.enabled) {
      this.logger.warn('Core API credentials not configured, registration disabled');
      return;
    }

    this.controller = new AbortController();
    this.beginRegistration();

    const checkEvery = Math.max(Math.floor(this.reRegisterAfterMs / 2), 1000);
    this.watchdog = setInterval(() => this.checkAcknowledgements(), checkEvery);
    this.watchdog.unref();
  }

  async stop(): Promise<void> {
    if (this.watchdog) {
      clearInterval(this.watchdog);
      this.watchdog = null;
    }
    this.controller?.abort();
    this.controller = null;

    if (this.loop) {
      await this.loop;
    }
  }

  /** Resolves when the current registration loop, if any, has ended. */
  async settled(): Promise<void> {
    if (this.loop) await this.loop;
  }

  private beginRegistration(): void {
    const controller = this.controller;
    if (!controller || this.loop) return;

    this.loop = this.registerWithBackoff(controller.signal).finally(() => {
      this.loop = null;
    });
  }

  private async registerWithBackoff(signal: AbortSignal): Promise<void> {
    let failures = 0;

    try {
      const attempts = await withRetry(
        async (attempt) => {
          await this.client.register(this.agentUrl, this.version);
          return attempt;
        },
        {
          maxRetries: Infinity,
          baseDelayMs: this.baseDelayMs,
          maxDelayMs: this.maxDelayMs,
          jitterFactor: 0.1,
          signal,
          onRetry: (attempt, err, delayMs) => {
            failures++;
            this.logger.warn({ attempt, delayMs, err: err.message }, 'Registration failed, retrying');
            this.emit('failed', attempt, err);
            if (failures === 1) {
              this.client.report(AgentEvent.REGISTRATION_FAILED, { attempt, message: err.message });
            }
          },
        }
      );

      this.isRegistered = true;
      this.logger.info({ agentUrl: this.agentUrl, attempts }, 'Agent registered with Core API');
      this.emit('registered', attempts);
    } catch (err) {
      if (signal.aborted) {
        this.logger.debug('Registration loop stopped');
        return;
      }
      this.logger.error({ err: errorMessage(err) }, 'Registration loop ended unexpectedly');
    }
  }

  private checkAcknowledgements(): void {
    if (!this.isRegistered || this.loop) return;

    const lastAck = this.client.lastAcknowledgedAt;
    if (lastAck === null || Date.now() - lastAck <= this.reRegisterAfterMs) return;

    this.logger.warn(
      { silentForMs: Date.now() - lastAck },
      'Core API stopped acknowledging reports, registering again'
    );
    this.isRegistered = false;
    this.beginRegistration();
  }
}
