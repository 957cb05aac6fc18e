#!/usr/bin/env node
import { Command } from 'commander';
import { AGENT_VERSION } from '@xray-agent/protocol';
import { XrayAgent } from '../src/agent/XrayAgent.js';
import { parseInteger, parseLogLevel, toOverrides, type ServeFlags } from '../src/cli/serveOptions.js';
import { ConfigManager, describeSettings } from '../src/config/ConfigManager.js';
import { StorageCorruptionError, errorMessage } from '../src/errors.js';
import { logger } from '../src/utils/logger.js';
import { ShellXrayController } from '../src/xray/ShellXrayController.js';

async function loadSettings(flags: ServeFlags) {
  const configManager = new ConfigManager(flags.config);
  const overrides = toOverrides(flags);
  const settings = await configManager.load(overrides);

  logger.level = settings.logLevel;
  return { configManager, settings };
}

function fail(err: unknown): never {
  if (err instanceof StorageCorruptionError) {
    logger.fatal({ path: err.path, err: err.message }, 'Proxy configuration is corrupt');
    process.exit(2);
  }
  logger.fatal({ err: errorMessage(err) }, 'Agent failed');
  process.exit(1);
}

const program = new Command();

program.name('xray-agent').description('Per-node control agent for an XRay proxy').version(AGENT_VERSION);

// ── serve command ────────────────────────────────────────────────

program
  .command('serve', { isDefault: true })
  .description('Start the agent')
  .option('-c, --config <path>', 'Agent settings file')
  .option('--core-api-url <url>', 'Core API base URL')
  .option('--api-key <key>', 'Shared API key')
  .option('--server-id <id>', 'Server id assigned by the Core API', parseInteger)
  .option('--host <host>', 'Command endpoint bind address')
  .option('-p, --port <number>', 'Command endpoint port', parseInteger)
  .option('--agent-url <url>', 'URL the Core API uses to reach this agent')
  .option('--xray-config <path>', 'Live proxy configuration document')
  .option('--scratch-dir <path>', 'Directory for candidate documents')
  .option('--test-command <cmd>', 'Validate a candidate; {config} is its path')
  .option('--reload-command <cmd>', 'Reload the proxy in place')
  .option('--process-check-command <cmd>', 'Exit 0 when the proxy runs')
  .option('--stats-command <cmd>', 'Print the stats query reply as JSON')
  .option('--inbound-tag <tag>', 'Tag of the managed inbound')
  .option('--user-flow <flow>', 'Flow set on new users')
  .option('--operation-timeout <ms>', 'Bound on each external call', parseInteger)
  .option('--log-level <level>', 'Log level', parseLogLevel)
  .action(async (_options: unknown, cmd: Command) => {
    const { configManager, settings } = await loadSettings(cmd.opts<ServeFlags>());

    logger.info({ settingsPath: configManager.path }, 'Settings loaded');

    const controller = new ShellXrayController(settings.xray, settings.operationTimeoutMs);
    const agent = new XrayAgent({ settings, controller, logger });

    await agent.start();

    let shuttingDown = false;
    const shutdown = async () => {
      if (shuttingDown) return;
      shuttingDown = true;
      try {
        await agent.stop();
        process.exit(0);
      } catch (err) {
        logger.error({ err: errorMessage(err) }, 'Shutdown failed');
        process.exit(1);
      }
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());
  });

// ── config command ───────────────────────────────────────────────

program
  .command('config')
  .description('Print the effective settings (API key masked)')
  .option('-c, --config <path>', 'Agent settings file')
  .action(async (_options: unknown, cmd: Command) => {
    const { settings } = await loadSettings(cmd.opts<ServeFlags>());
    console.log(JSON.stringify(describeSettings(settings), null, 2));
  });

process.on('unhandledRejection', (reason) => fail(reason));
process.on('uncaughtException', (err) => fail(err));

program.parseAsync(process.argv).catch(fail);
