export const PROTOCOL_VERSION = '1';
export const AGENT_VERSION = '0.1.0';
export const SERVICE_NAME = 'xray-agent';

export const API_KEY_HEADER = 'X-API-Key';

export const CommandKind = {
  ADD_USER: 'add_user',
  REMOVE_USER: 'remove_user',
  REGENERATE_USER: 'regenerate_user',
} as const;

export type CommandKindValue = (typeof CommandKind)[keyof typeof CommandKind];

export const AgentEvent = {
  METRICS: 'metrics',
  HEALTH: 'health',
  USER_ADDED: 'user_added',
  USER_REMOVED: 'user_removed',
  USER_REGENERATED: 'user_regenerated',
  COMMAND_FAILED: 'command_failed',
  XRAY_STOPPED: 'xray_stopped',
  XRAY_DEGRADED: 'xray_degraded',
  REGISTRATION_FAILED: 'registration_failed',
} as const;

export type AgentEventValue = (typeof AgentEvent)[keyof typeof AgentEvent];

export const CoreApiRoute = {
  register: (serverId: number) => `/api/v1/servers/${serverId}/agent/register`,
  webhook: '/api/v1/agents/webhook',
} as const;

export const DEFAULT_PORT = 8080;
export const DEFAULT_CORE_API_URL = 'http://localhost:8000';
export const DEFAULT_USER_FLOW = 'xtls-rprx-vision';
