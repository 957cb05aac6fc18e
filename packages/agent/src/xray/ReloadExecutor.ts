import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { ReloadError, TimeoutError, ValidationError, errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { withTimeout } from '../utils/retry.js';
import type { ProxyController } from './ProxyController.js';
import { serializeDocument, type XrayConfigDocument } from './XrayConfigDocument.js';

export interface ReloadExecutorOptions {
  controller: ProxyController;
  scratchDir: string;
  /** Bound on each external call (validate, reload). */
  timeoutMs: number;
  logger?: Logger;
}

/**
 * Validates a candidate document with the proxy's test facility and, only
 * when it passes, signals the running proxy to reload in place. The live
 * document is never touched here; committing it is the caller's job once
 * `reload` resolves.
 */
export class ReloadExecutor {
  private controller: ProxyController;
  private scratchDir: string;
  private timeoutMs: number;
  private logger: Logger;
  private seq = 0;

  constructor(options: ReloadExecutorOptions) {
    this.controller = options.controller;
    this.scratchDir = options.scratchDir;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? rootLogger.child({ component: 'reload-executor' });
  }

  /**
   * @throws ValidationError when the proxy rejects the candidate (nothing was signaled)
   * @throws ReloadError when the reload signal fails
   * @throws TimeoutError when either external call exceeds the timeout
   */
  async reload(candidate: XrayConfigDocument): Promise<void> {
    const scratchPath = path.join(this.scratchDir, `xray-candidate-${process.pid}-${++this.seq}.json`);
    await fs.mkdir(this.scratchDir, { recursive: true });
    await fs.writeFile(scratchPath, serializeDocument(candidate), 'utf-8');

    try {
      const outcome = await withTimeout(
        this.controller.validate(scratchPath),
        this.timeoutMs,
        'Configuration validation'
      );

      if (!outcome.valid) {
        this.logger.warn({ output: outcome.output }, 'Candidate configuration rejected by proxy');
        throw new ValidationError('Proxy rejected the candidate configuration', outcome.output);
      }

      try {
        await withTimeout(this.controller.reload(scratchPath), this.timeoutMs, 'Proxy reload');
      } catch (err) {
        if (err instanceof TimeoutError) throw err;
        throw new ReloadError(errorMessage(err));
      }

      this.logger.info('Proxy reloaded with validated configuration');
    } finally {
      await fs.rm(scratchPath, { force: true }).catch((err: unknown) => {
        this.logger.warn({ scratchPath, err: errorMessage(err) }, 'Failed to remove scratch file');
      });
    }
  }
}
