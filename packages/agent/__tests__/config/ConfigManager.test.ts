import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { ConfigManager, describeSettings } from '../../src/config/ConfigManager.js';
import { ConfigError } from '../../src/errors.js';

describe('ConfigManager', () => {
  let tmpDir: string;
  let settingsPath: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'xray-agent-config-test-'));
    settingsPath = path.join(tmpDir, 'agent.json');
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('getDefault() returns the built-in defaults', () => {
    const manager = new ConfigManager(settingsPath, { NODE_ENV: 'production' });
    const config = manager.getDefault();

    expect(config.coreApiUrl).toBe('http://localhost:8000');
    expect(config.port).toBe(8080);
    expect(config.xray.configPath).toBe('/etc/xray/config.json');
    expect(config.xray.userFlow).toBe('xtls-rprx-vision');
    expect(config.healthIntervalMs).toBe(10_000);
    expect(config.metricsIntervalMs).toBe(30_000);
    expect(config.logLevel).toBe('info');
  });

  it('exists() reflects the settings file', async () => {
    const manager = new ConfigManager(settingsPath, {});
    expect(await manager.exists()).toBe(false);

    await fs.writeFile(settingsPath, '{}', 'utf-8');
    expect(await manager.exists()).toBe(true);
  });

  it('load() works without a settings file and derives the agent url', async () => {
    const manager = new ConfigManager(settingsPath, {});
    const settings = await manager.load();

    expect(settings.agentUrl).toBe('http://localhost:8080');
    expect(settings.apiKey).toBe('');
    expect(Object.isFrozen(settings)).toBe(true);
    expect(Object.isFrozen(settings.xray)).toBe(true);
  });

  it('load() merges file, environment and overrides in precedence order', async () => {
    await fs.writeFile(
      settingsPath,
      JSON.stringify({ port: 9001, serverId: 3, apiKey: 'file-key', xray: { inboundTag: 'vless-in' } }),
      'utf-8'
    );
    const manager = new ConfigManager(settingsPath, {
      AGENT_API_KEY: 'test-secret',
      SERVER_ID: '12',
      XRAY_CHECK_INTERVAL: '5',
      XRAY_CONFIG_PATH: '/srv/xray/config.json',
    });

    const settings = await manager.load({ serverId: 42, xray: { userFlow: '' } });

    expect(settings.port).toBe(9001);
    expect(settings.apiKey).toBe('test-secret');
    expect(settings.serverId).toBe(42);
    expect(settings.healthIntervalMs).toBe(5000);
    expect(settings.agentUrl).toBe('http://localhost:9001');
    expect(settings.xray).toMatchObject({
      configPath: '/srv/xray/config.json',
      inboundTag: 'vless-in',
      userFlow: '',
      testCommand: 'xray run -test -config {config}',
    });
  });

  it('load() takes the settings path from AGENT_SETTINGS_PATH', async () => {
    await fs.writeFile(settingsPath, JSON.stringify({ host: '127.0.0.1' }), 'utf-8');
    const manager = new ConfigManager(undefined, { AGENT_SETTINGS_PATH: settingsPath });

    expect(manager.path).toBe(settingsPath);
    expect((await manager.load()).host).toBe('127.0.0.1');
  });

  it('load() rejects a settings file that is not JSON', async () => {
    await fs.writeFile(settingsPath, 'port = 8080', 'utf-8');
    const manager = new ConfigManager(settingsPath, {});

    await expect(manager.load()).rejects.toBeInstanceOf(ConfigError);
  });

  it('load() rejects an out-of-range port from the environment', async () => {
    const manager = new ConfigManager(settingsPath, { AGENT_PORT: '70000' });

    await expect(manager.load()).rejects.toThrow('Invalid setting port');
  });

  it('load() rejects a wrongly typed value in the file', async () => {
    await fs.writeFile(settingsPath, JSON.stringify({ serverId: 'seven' }), 'utf-8');
    const manager = new ConfigManager(settingsPath, {});

    await expect(manager.load()).rejects.toThrow(`Invalid setting serverId in ${settingsPath}`);
  });

  it('load() rejects a reload command that does not load the candidate', async () => {
    const manager = new ConfigManager(settingsPath, { XRAY_RELOAD_COMMAND: 'pkill -HUP -x xray' });

    await expect(manager.load()).rejects.toThrow(
      'Invalid setting xray.reloadCommand: must contain {config}, the candidate the proxy loads'
    );
  });

  it('load() accepts a reload command that installs the candidate', async () => {
    const manager = new ConfigManager(settingsPath, {
      XRAY_RELOAD_COMMAND: 'cp {config} /run/xray/config.json && systemctl reload xray',
    });

    const settings = await manager.load();

    expect(settings.xray.reloadCommand).toBe('cp {config} /run/xray/config.json && systemctl reload xray');
    expect(manager.getDefault().xray.reloadCommand).toContain('{config}');
  });

  it('describeSettings() masks the API key', async () => {
    const manager = new ConfigManager(settingsPath, { AGENT_API_KEY: 'test-secret' });
    const settings = await manager.load();

    expect(describeSettings(settings).apiKey).toBe('*******cret');
    expect(settings.apiKey).toBe('test-secret');
  });
});
