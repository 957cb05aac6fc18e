import { AGENT_VERSION, type StatusResponse } from '@xray-agent/protocol';
import { ApiKeyAuthProvider, type AuthProvider } from '../auth/index.js';
import type { AgentSettings } from '../config/ConfigManager.js';
import { errorMessage } from '../errors.js';
import { HealthMonitor } from '../monitor/HealthMonitor.js';
import { MetricsReporter } from '../monitor/MetricsReporter.js';
import { renderGauges } from '../monitor/prometheus.js';
import { CommandQueue } from '../reconcile/CommandQueue.js';
import { Reconciler } from '../reconcile/Reconciler.js';
import { CoreApiClient } from '../registry/CoreApiClient.js';
import { RegistrationManager } from '../registry/RegistrationManager.js';
import { CommandServer } from '../transport/CommandServer.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { Mutex } from '../utils/Mutex.js';
import { ConfigStore } from '../xray/ConfigStore.js';
import type { ProxyController } from '../xray/ProxyController.js';
import { ReloadExecutor } from '../xray/ReloadExecutor.js';
import type { InboundSelector } from '../xray/XrayConfigDocument.js';

export interface XrayAgentOptions {
  settings: Readonly<AgentSettings>;
  controller: ProxyController;
  /** Seed document for a missing live configuration. */
  templatePath?: string;
  authProvider?: AuthProvider;
  /** Overrides for tests. */
  registrationBackoff?: { baseDelayMs: number; maxDelayMs: number };
  loadAverage?: () => number;
  logger?: Logger;
}

/**
 * Wires the agent's components around one configuration store and one
 * mutation lock, and owns their start and shutdown order.
 */
export class XrayAgent {
  readonly store: ConfigStore;
  readonly reconciler: Reconciler;
  readonly queue: CommandQueue;
  readonly client: CoreApiClient;
  readonly registration: RegistrationManager;
  readonly health: HealthMonitor;
  readonly metrics: MetricsReporter;
  readonly server: CommandServer;

  private settings: Readonly<AgentSettings>;
  private logger: Logger;
  private boundPort: number | null = null;
  private stopping: Promise<void> | null = null;

  constructor(options: XrayAgentOptions) {
    const { settings, controller } = options;
    this.settings = settings;
    this.logger = options.logger ?? rootLogger;

    const selector: InboundSelector = settings.xray.inboundTag ? { tag: settings.xray.inboundTag } : {};
    const mutex = new Mutex();

    this.store = new ConfigStore({
      path: settings.xray.configPath,
      selector,
      templatePath: options.templatePath,
      logger: this.logger.child({ component: 'config-store' }),
    });

    const executor = new ReloadExecutor({
      controller,
      scratchDir: settings.xray.scratchDir,
      timeoutMs: settings.operationTimeoutMs,
      logger: this.logger.child({ component: 'reload-executor' }),
    });

    this.reconciler = new Reconciler({
      store: this.store,
      executor,
      mutex,
      selector,
      userFlow: settings.xray.userFlow,
      logger: this.logger.child({ component: 'reconciler' }),
    });

    this.client = new CoreApiClient({
      baseUrl: settings.coreApiUrl,
      apiKey: settings.apiKey,
      serverId: settings.serverId,
      timeoutMs: settings.operationTimeoutMs,
      logger: this.logger.child({ component: 'core-api' }),
    });

    this.queue = new CommandQueue({
      reconciler: this.reconciler,
      reporter: this.client,
      logger: this.logger.child({ component: 'command-queue' }),
    });

    this.health = new HealthMonitor({
      controller,
      reporter: this.client,
      intervalMs: settings.healthIntervalMs,
      failureThreshold: settings.healthFailureThreshold,
      probeTimeoutMs: settings.operationTimeoutMs,
      logger: this.logger.child({ component: 'health-monitor' }),
    });

    this.metrics = new MetricsReporter({
      controller,
      reporter: this.client,
      health: this.health,
      usersCount: () => this.store.usersCount(),
      intervalMs: settings.metricsIntervalMs,
      queryTimeoutMs: settings.operationTimeoutMs,
      loadAverage: options.loadAverage,
      logger: this.logger.child({ component: 'metrics-reporter' }),
    });

    this.registration = new RegistrationManager({
      client: this.client,
      agentUrl: settings.agentUrl,
      version: AGENT_VERSION,
      reRegisterAfterMs: settings.reRegisterAfterMs,
      baseDelayMs: options.registrationBackoff?.baseDelayMs,
      maxDelayMs: options.registrationBackoff?.maxDelayMs,
      logger: this.logger.child({ component: 'registration' }),
    });
    this.registration.on('failed', () => this.health.setRegistrationHealthy(false));
    this.registration.on('registered', () => this.health.setRegistrationHealthy(true));

    this.server = new CommandServer({
      authProvider: options.authProvider ?? new ApiKeyAuthProvider(settings.apiKey),
      queue: this.queue,
      status: () => this.getStatus(),
      metrics: () => this.renderMetrics(),
      logger: this.logger.child({ component: 'command-server' }),
    });
  }

  get port(): number | null {
    return this.boundPort;
  }

  /**
   * Verify the live document, hand it to the proxy, open the command
   * endpoint, then start the background loops. Registration runs in the
   * background.
   *
   * @throws StorageCorruptionError when the live document is unusable
   */
  async start(): Promise<void> {
    const verified = await this.store.verify();
    this.logger.info(
      { configPath: this.store.path, seeded: verified.seeded, usersCount: verified.usersCount },
      'Proxy configuration verified'
    );

    try {
      await this.reconciler.resync();
    } catch (err) {
      this.logger.warn({ err: errorMessage(err) }, 'Proxy did not load the committed configuration');
    }

    this.boundPort = await this.server.start(this.settings.port, this.settings.host);

    this.registration.start();
    this.health.start();
    this.metrics.start();

    this.logger.info(
      {
        port: this.boundPort,
        serverId: this.settings.serverId,
        coreApiUrl: this.settings.coreApiUrl,
        version: AGENT_VERSION,
      },
      'Agent started'
    );
  }

  /**
   * Stop accepting commands, stop the loops, and let a reconciliation in
   * progress finish before returning.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  getStatus(): StatusResponse {
    const status = this.health.status;
    const lastProbe = this.health.lastProbeAt;
    const lastMetrics = this.metrics.lastSampleAt;

    return {
      agent_version: AGENT_VERSION,
      server_id: this.settings.serverId,
      agent_url: this.settings.agentUrl,
      registered: this.registration.registered,
      xray: {
        status,
        running: status === 'up' || status === 'degraded',
        users_count: this.store.usersCount(),
        last_probe_at: lastProbe === null ? null : new Date(lastProbe).toISOString(),
      },
      last_metrics_at: lastMetrics === null ? null : new Date(lastMetrics).toISOString(),
      queue_depth: this.queue.depth,
    };
  }

  renderMetrics(): string {
    const latest = this.metrics.latest;
    const status = this.health.status;

    return renderGauges([
      { name: 'xray_agent_users_count', help: 'Users in the managed inbound', value: this.store.usersCount() },
      {
        name: 'xray_agent_xray_running',
        help: 'Whether the proxy process is running',
        value: status === 'up' || status === 'degraded' ? 1 : 0,
      },
      { name: 'xray_agent_system_load', help: 'One-minute load average', value: latest?.load ?? 0 },
      { name: 'xray_agent_queue_depth', help: 'Commands waiting or running', value: this.queue.depth },
    ]);
  }

  private async shutdown(): Promise<void> {
    this.logger.info('Shutting down gracefully...');

    await this.server.close();
    await Promise.all([this.health.stop(), this.metrics.stop()]);
    await this.queue.close();
    await this.registration.stop();

    this.logger.info('Agent stopped');
  }
}
