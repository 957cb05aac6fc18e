import { z } from 'zod';
import { AgentEvent, CommandKind, type AgentEventValue, type CommandKindValue } from './constants.js';
import type { CommandStatus, HealthStatus } from './types.js';

// --- Inbound: Core API -> agent ---

export const CommandRequestSchema = z
  .object({
    command: z.enum([CommandKind.ADD_USER, CommandKind.REMOVE_USER, CommandKind.REGENERATE_USER]),
    user_uuid: z.string().uuid('Invalid UUID format'),
    /** The uuid a `regenerate_user` replaces. */
    old_user_uuid: z.string().uuid('Invalid UUID format').nullish(),
    email: z.string().trim().min(1).max(254).nullish(),
  })
  .superRefine((body, ctx) => {
    if (body.command !== CommandKind.REGENERATE_USER) return;
    if (!body.old_user_uuid) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['old_user_uuid'],
        message: 'Required for regenerate_user',
      });
    } else if (body.old_user_uuid.toLowerCase() === body.user_uuid.toLowerCase()) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['old_user_uuid'],
        message: 'Must differ from user_uuid',
      });
    }
  });

export type CommandRequest = z.infer<typeof CommandRequestSchema>;

/** A validated command, in the agent's own naming. */
export interface Command {
  kind: CommandKindValue;
  userUuid: string;
  /** Set for `regenerate_user`: the user being replaced by `userUuid`. */
  previousUuid?: string;
  email?: string;
}

export type ParseResult<T> = { success: true; value: T } | { success: false; error: string };

const KNOWN_COMMANDS = new Set<string>(Object.values(CommandKind));

export function parseCommandRequest(body: unknown): ParseResult<Command> {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return { success: false, error: 'Request body must be a JSON object' };
  }

  const kind: unknown = Reflect.get(body, 'command');
  if (typeof kind !== 'string' || kind.length === 0) {
    return { success: false, error: 'command is required' };
  }
  if (!KNOWN_COMMANDS.has(kind)) {
    return { success: false, error: `Unknown command: ${kind}` };
  }

  const parsed = CommandRequestSchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.join('.') || 'body';
    return { success: false, error: `${field}: ${issue.message}` };
  }

  const command: Command = { kind: parsed.data.command, userUuid: parsed.data.user_uuid };
  if (parsed.data.command === CommandKind.REGENERATE_USER && parsed.data.old_user_uuid) {
    command.previousUuid = parsed.data.old_user_uuid;
  }
  if (parsed.data.email) command.email = parsed.data.email;
  return { success: true, value: command };
}

// --- Proxy management interface ---

export const StatsQueryReplySchema = z.object({
  stat: z
    .array(
      z.object({
        name: z.string(),
        value: z.union([z.string(), z.number()]).optional(),
      })
    )
    .optional(),
});

export type StatsQueryReply = z.infer<typeof StatsQueryReplySchema>;

// --- Outbound: agent -> Core API ---

export interface RegisterPayload {
  agent_url: string;
  version: string;
}

export interface MetricsPayload {
  timestamp: string;
  load: number;
  users_count: number;
  xray_status: 'running' | 'stopped';
  uptime_seconds: number;
  counters: Record<string, number>;
}

export interface HealthPayload {
  status: HealthStatus;
  previous: HealthStatus;
  timestamp: string;
  reason?: string;
}

export interface UserChangedPayload {
  command_id: string;
  user_uuid: string;
  email?: string;
}

export interface UserRegeneratedPayload extends UserChangedPayload {
  old_user_uuid: string;
}

export interface CommandFailedPayload {
  command_id: string;
  command: CommandKindValue;
  user_uuid: string;
  old_user_uuid?: string;
  reason: string;
  message: string;
}

export interface RegistrationFailedPayload {
  attempt: number;
  message: string;
}

export interface EventPayloadMap {
  [AgentEvent.METRICS]: MetricsPayload;
  [AgentEvent.HEALTH]: HealthPayload;
  [AgentEvent.USER_ADDED]: UserChangedPayload;
  [AgentEvent.USER_REMOVED]: UserChangedPayload;
  [AgentEvent.USER_REGENERATED]: UserRegeneratedPayload;
  [AgentEvent.COMMAND_FAILED]: CommandFailedPayload;
  [AgentEvent.XRAY_STOPPED]: HealthPayload;
  [AgentEvent.XRAY_DEGRADED]: HealthPayload;
  [AgentEvent.REGISTRATION_FAILED]: RegistrationFailedPayload;
}

export interface EventEnvelope<E extends AgentEventValue = AgentEventValue> {
  event: E;
  server_id: number;
  data: EventPayloadMap[E];
}

export function createEnvelope<E extends AgentEventValue>(
  event: E,
  serverId: number,
  data: EventPayloadMap[E]
): EventEnvelope<E> {
  return { event, server_id: serverId, data };
}

// --- Agent HTTP responses ---

export interface HealthResponse {
  status: 'healthy';
  service: string;
}

export interface CommandAck {
  accepted: true;
  command_id: string;
  queue_position: number;
}

export interface CommandResultResponse {
  command_id: string;
  command: CommandKindValue;
  user_uuid: string;
  old_user_uuid?: string;
  status: CommandStatus;
  changed?: boolean;
  error?: { code: string; message: string };
}

export interface StatusResponse {
  agent_version: string;
  server_id: number;
  agent_url: string;
  registered: boolean;
  xray: {
    status: HealthStatus;
    running: boolean;
    users_count: number;
    last_probe_at: string | null;
  };
  last_metrics_at: string | null;
  queue_depth: number;
}

export interface ErrorResponse {
  error: { code: string; message: string };
}
