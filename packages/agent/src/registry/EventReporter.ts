import type { AgentEventValue, EventPayloadMap } from '@xray-agent/protocol';

/**
 * Fire-and-forget event sink towards the Core API. Implementations log
 * delivery failures and never throw.
 */
export interface EventReporter {
  report<E extends AgentEventValue>(event: E, data: EventPayloadMap[E]): void;
}
