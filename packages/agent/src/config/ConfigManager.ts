import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import { z } from 'zod';
import { DEFAULT_CORE_API_URL, DEFAULT_PORT, DEFAULT_USER_FLOW } from '@xray-agent/protocol';
import { ConfigError, errorMessage } from '../errors.js';

export const DEFAULT_SETTINGS_PATH = '/etc/xray-agent/agent.json';
export const CONFIG_PLACEHOLDER = '{config}';

const XraySettingsSchema = z.object({
  configPath: z.string().min(1),
  scratchDir: z.string().min(1),
  testCommand: z.string().min(1),
  // The process must load the candidate itself; the live path is only
  // committed after the reload succeeds.
  reloadCommand: z.string().min(1).refine((command) => command.includes(CONFIG_PLACEHOLDER), {
    message: `must contain ${CONFIG_PLACEHOLDER}, the candidate the proxy loads`,
  }),
  processCheckCommand: z.string().min(1),
  statsCommand: z.string().min(1),
  inboundTag: z.string().min(1).optional(),
  userFlow: z.string(),
});

export const AgentSettingsSchema = z.object({
  coreApiUrl: z.string().url(),
  apiKey: z.string(),
  serverId: z.number().int().nonnegative(),
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  agentUrl: z.string(),
  xray: XraySettingsSchema,
  operationTimeoutMs: z.number().int().positive(),
  healthIntervalMs: z.number().int().positive(),
  healthFailureThreshold: z.number().int().positive(),
  metricsIntervalMs: z.number().int().positive(),
  reRegisterAfterMs: z.number().int().positive(),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
});

export type AgentSettings = z.infer<typeof AgentSettingsSchema>;
export type XraySettings = z.infer<typeof XraySettingsSchema>;

export type SettingsOverrides = Partial<Omit<AgentSettings, 'xray'>> & {
  xray?: Partial<XraySettings>;
};

const FileSettingsSchema = AgentSettingsSchema.deepPartial();

/**
 * Resolves the agent's settings: overrides (CLI flags) > environment >
 * settings file > defaults. The result is frozen.
 */
export class ConfigManager {
  private settingsPath: string;
  private env: NodeJS.ProcessEnv;

  constructor(settingsPath?: string, env: NodeJS.ProcessEnv = process.env) {
    this.settingsPath = settingsPath || env.AGENT_SETTINGS_PATH || DEFAULT_SETTINGS_PATH;
    this.env = env;
  }

  get path(): string {
    return this.settingsPath;
  }

  getDefault(): AgentSettings {
    return {
      coreApiUrl: DEFAULT_CORE_API_URL,
      apiKey: '',
      serverId: 0,
      host: '0.0.0.0',
      port: DEFAULT_PORT,
      agentUrl: '',
      xray: {
        configPath: '/etc/xray/config.json',
        scratchDir: os.tmpdir(),
        testCommand: 'xray run -test -config {config}',
        reloadCommand: 'install -m 0644 {config} /run/xray/config.json && pkill -HUP -x xray',
        processCheckCommand: 'pgrep -x xray',
        statsCommand: 'xray api statsquery --server=127.0.0.1:10085',
        userFlow: DEFAULT_USER_FLOW,
      },
      operationTimeoutMs: 10_000,
      healthIntervalMs: 10_000,
      healthFailureThreshold: 2,
      metricsIntervalMs: 30_000,
      reRegisterAfterMs: 300_000,
      logLevel: this.env.NODE_ENV === 'production' ? 'info' : 'debug',
    };
  }

  async load(overrides: SettingsOverrides = {}): Promise<Readonly<AgentSettings>> {
    const defaults = this.getDefault();
    const fromFile = await this.readFile();
    const fromEnv = this.fromEnv();

    const merged = {
      ...defaults,
      ...fromFile,
      ...fromEnv,
      ...overrides,
      xray: {
        ...defaults.xray,
        ...(fromFile.xray || {}),
        ...(fromEnv.xray || {}),
        ...(overrides.xray || {}),
      },
    };

    if (!merged.agentUrl) {
      merged.agentUrl = `http://localhost:${merged.port}`;
    }

    const parsed = AgentSettingsSchema.safeParse(merged);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigError(`Invalid setting ${issue.path.join('.')}: ${issue.message}`);
    }

    return Object.freeze({ ...parsed.data, xray: Object.freeze(parsed.data.xray) });
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.settingsPath);
      return true;
    } catch {
      return false;
    }
  }

  private async readFile(): Promise<SettingsOverrides> {
    let raw: string;
    try {
      raw = await fs.readFile(this.settingsPath, 'utf-8');
    } catch (err: unknown) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        return {};
      }
      throw new ConfigError(`Cannot read settings file ${this.settingsPath}: ${errorMessage(err)}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err: unknown) {
      throw new ConfigError(`Settings file ${this.settingsPath} is not valid JSON: ${errorMessage(err)}`);
    }

    const parsed = FileSettingsSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigError(`Invalid setting ${issue.path.join('.')} in ${this.settingsPath}: ${issue.message}`);
    }
    return parsed.data;
  }

  private fromEnv(): SettingsOverrides {
    const env = this.env;
    const result: SettingsOverrides = {};
    const xray: Partial<XraySettings> = {};

    if (env.CORE_API_URL) result.coreApiUrl = env.CORE_API_URL;
    if (env.AGENT_API_KEY) result.apiKey = env.AGENT_API_KEY;
    if (env.SERVER_ID) result.serverId = Number(env.SERVER_ID);
    if (env.AGENT_HOST) result.host = env.AGENT_HOST;
    if (env.AGENT_PORT) result.port = Number(env.AGENT_PORT);
    if (env.AGENT_URL) result.agentUrl = env.AGENT_URL;
    if (env.OPERATION_TIMEOUT_MS) result.operationTimeoutMs = Number(env.OPERATION_TIMEOUT_MS);
    if (env.XRAY_CHECK_INTERVAL) result.healthIntervalMs = Number(env.XRAY_CHECK_INTERVAL) * 1000;
    if (env.METRICS_INTERVAL) result.metricsIntervalMs = Number(env.METRICS_INTERVAL) * 1000;
    if (env.REREGISTER_AFTER) result.reRegisterAfterMs = Number(env.REREGISTER_AFTER) * 1000;
    if (env.LOG_LEVEL) {
      const level = AgentSettingsSchema.shape.logLevel.safeParse(env.LOG_LEVEL.toLowerCase());
      if (level.success) result.logLevel = level.data;
    }

    if (env.XRAY_CONFIG_PATH) xray.configPath = env.XRAY_CONFIG_PATH;
    if (env.XRAY_SCRATCH_DIR) xray.scratchDir = env.XRAY_SCRATCH_DIR;
    if (env.XRAY_TEST_COMMAND) xray.testCommand = env.XRAY_TEST_COMMAND;
    if (env.XRAY_RELOAD_COMMAND) xray.reloadCommand = env.XRAY_RELOAD_COMMAND;
    if (env.XRAY_PROCESS_CHECK_COMMAND) xray.processCheckCommand = env.XRAY_PROCESS_CHECK_COMMAND;
    if (env.XRAY_STATS_COMMAND) xray.statsCommand = env.XRAY_STATS_COMMAND;
    if (env.XRAY_INBOUND_TAG) xray.inboundTag = env.XRAY_INBOUND_TAG;
    if (env.XRAY_USER_FLOW !== undefined) xray.userFlow = env.XRAY_USER_FLOW;

    if (Object.keys(xray).length > 0) result.xray = xray;
    return result;
  }
}

/** Settings safe to print: the API key is masked. */
export function describeSettings(settings: AgentSettings): AgentSettings {
  const key = settings.apiKey;
  const masked = key.length > 4 ? `${'*'.repeat(key.length - 4)}${key.slice(-4)}` : key ? '****' : '';
  return { ...settings, apiKey: masked, xray: { ...settings.xray } };
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
