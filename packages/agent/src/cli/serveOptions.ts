import { InvalidArgumentError } from 'commander';
import {
  AgentSettingsSchema,
  type AgentSettings,
  type SettingsOverrides,
  type XraySettings,
} from '../config/ConfigManager.js';

export interface ServeFlags {
  config?: string;
  coreApiUrl?: string;
  apiKey?: string;
  serverId?: number;
  host?: string;
  port?: number;
  agentUrl?: string;
  xrayConfig?: string;
  scratchDir?: string;
  testCommand?: string;
  reloadCommand?: string;
  processCheckCommand?: string;
  statsCommand?: string;
  inboundTag?: string;
  userFlow?: string;
  operationTimeout?: number;
  logLevel?: AgentSettings['logLevel'];
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

export function parseLogLevel(value: string): AgentSettings['logLevel'] {
  const parsed = AgentSettingsSchema.shape.logLevel.safeParse(value.toLowerCase());
  if (!parsed.success) {
    throw new InvalidArgumentError(`Expected one of: ${AgentSettingsSchema.shape.logLevel.options.join(', ')}.`);
  }
  return parsed.data;
}

/** CLI flags that were actually given, in settings shape. */
export function toOverrides(flags: ServeFlags): SettingsOverrides {
  const overrides: SettingsOverrides = {};
  const xray: Partial<XraySettings> = {};

  if (flags.coreApiUrl !== undefined) overrides.coreApiUrl = flags.coreApiUrl;
  if (flags.apiKey !== undefined) overrides.apiKey = flags.apiKey;
  if (flags.serverId !== undefined) overrides.serverId = flags.serverId;
  if (flags.host !== undefined) overrides.host = flags.host;
  if (flags.port !== undefined) overrides.port = flags.port;
  if (flags.agentUrl !== undefined) overrides.agentUrl = flags.agentUrl;
  if (flags.operationTimeout !== undefined) overrides.operationTimeoutMs = flags.operationTimeout;
  if (flags.logLevel !== undefined) overrides.logLevel = flags.logLevel;

  if (flags.xrayConfig !== undefined) xray.configPath = flags.xrayConfig;
  if (flags.scratchDir !== undefined) xray.scratchDir = flags.scratchDir;
  if (flags.testCommand !== undefined) xray.testCommand = flags.testCommand;
  if (flags.reloadCommand !== undefined) xray.reloadCommand = flags.reloadCommand;
  if (flags.processCheckCommand !== undefined) xray.processCheckCommand = flags.processCheckCommand;
  if (flags.statsCommand !== undefined) xray.statsCommand = flags.statsCommand;
  if (flags.inboundTag !== undefined) xray.inboundTag = flags.inboundTag;
  if (flags.userFlow !== undefined) xray.userFlow = flags.userFlow;

  if (Object.keys(xray).length > 0) overrides.xray = xray;
  return overrides;
}
