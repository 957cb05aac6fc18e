import {
  API_KEY_HEADER,
  AGENT_VERSION,
  CoreApiRoute,
  createEnvelope,
  type AgentEventValue,
  type EventPayloadMap,
  type RegisterPayload,
} from '@xray-agent/protocol';
import { RegistrationError, errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { EventReporter } from './EventReporter.js';

export interface CoreApiClientOptions {
  baseUrl: string;
  apiKey: string;
  serverId: number;
  /** Bound on every request to the Core API. */
  timeoutMs: number;
  logger?: Logger;
}

/**
 * HTTP client for the central Core API: registration and the event
 * webhook. Every request carries the shared API key header.
 */
export class CoreApiClient implements EventReporter {
  private baseUrl: string;
  private apiKey: string;
  private serverId: number;
  private timeoutMs: number;
  private logger: Logger;
  private lastAck: number | null = null;

  constructor(options: CoreApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.apiKey = options.apiKey;
    this.serverId = options.serverId;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? rootLogger.child({ component: 'core-api' });
  }

  /** False when no key or server id is configured; nothing is sent then. */
  get enabled(): boolean {
    return this.apiKey.length > 0 && this.serverId > 0;
  }

  /** Time of the last 2xx answer from the Core API. */
  get lastAcknowledgedAt(): number | null {
    return this.lastAck;
  }

  async register(agentUrl: string, version: string = AGENT_VERSION): Promise<void> {
    if (!this.enabled) {
      throw new RegistrationError('Core API credentials are not configured');
    }

    const payload: RegisterPayload = { agent_url: agentUrl, version };
    let response: Response;
    try {
      response = await this.request(CoreApiRoute.register(this.serverId), payload);
    } catch (err) {
      throw new RegistrationError(`Registration request failed: ${errorMessage(err)}`);
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new RegistrationError(`Failed to register agent: ${response.status} ${text}`.trim(), {
        status: response.status,
      });
    }
  }

  /**
   * Deliver one event to the webhook. Rejects on transport errors and
   * non-2xx answers.
   */
  async sendEvent<E extends AgentEventValue>(event: E, data: EventPayloadMap[E]): Promise<void> {
    if (!this.enabled) return;

    const response = await this.request(CoreApiRoute.webhook, createEnvelope(event, this.serverId, data));
    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new Error(`Webhook ${event} rejected: ${response.status} ${text}`.trim());
    }
  }

  report<E extends AgentEventValue>(event: E, data: EventPayloadMap[E]): void {
    this.sendEvent(event, data).catch((err: unknown) => {
      this.logger.warn({ event, err: errorMessage(err) }, 'Failed to deliver event');
    });
  }

  private async request(path: string, body: unknown): Promise<Response> {
    const response = await fetch(`${this.baseUrl}${path}`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        [API_KEY_HEADER]: this.apiKey,
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (response.ok) {
      this.lastAck = Date.now();
    }
    return response;
  }
}
