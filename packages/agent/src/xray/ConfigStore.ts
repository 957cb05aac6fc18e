import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { StorageCorruptionError, errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import {
  DocumentShapeError,
  findManagedInbound,
  listUsers,
  parseDocument,
  serializeDocument,
  type InboundSelector,
  type XrayConfigDocument,
} from './XrayConfigDocument.js';

export const DEFAULT_TEMPLATE_PATH = fileURLToPath(
  new URL('../../templates/default-config.json', import.meta.url)
);

export interface ConfigStoreOptions {
  path: string;
  selector?: InboundSelector;
  /** Seed document written when the live document does not exist yet. */
  templatePath?: string;
  logger?: Logger;
}

export interface VerifyResult {
  seeded: boolean;
  usersCount: number;
}

/**
 * Sole owner of the proxy's live configuration document.
 *
 * `commit` writes to a sibling temp file, fsyncs it and renames it over the
 * live path, so a crash never leaves a half-written live document. Callers
 * serialize commits through the reconciler's mutation lock; the store keeps
 * no state besides the last document it read or committed.
 */
export class ConfigStore {
  readonly path: string;
  private selector: InboundSelector;
  private templatePath: string;
  private logger: Logger;
  private lastSnapshot: XrayConfigDocument | null = null;
  private tempSeq = 0;

  constructor(options: ConfigStoreOptions) {
    this.path = path.resolve(options.path);
    this.selector = options.selector ?? {};
    this.templatePath = options.templatePath ?? DEFAULT_TEMPLATE_PATH;
    this.logger = options.logger ?? rootLogger.child({ component: 'config-store' });
  }

  /**
   * Read and parse the live document. I/O errors propagate as-is so the
   * caller can retry them; an unparseable document is a StorageCorruptionError.
   */
  async read(): Promise<XrayConfigDocument> {
    const raw = await fs.readFile(this.path, 'utf-8');
    const doc = this.parse(raw);
    this.lastSnapshot = doc;
    return doc;
  }

  async commit(doc: XrayConfigDocument): Promise<void> {
    const data = serializeDocument(doc);
    const dir = path.dirname(this.path);
    const tempPath = path.join(dir, `.${path.basename(this.path)}.${process.pid}.${++this.tempSeq}.tmp`);

    await fs.mkdir(dir, { recursive: true });

    try {
      const handle = await fs.open(tempPath, 'w', 0o644);
      try {
        await handle.writeFile(data, 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tempPath, this.path);
    } catch (err) {
      await fs.rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
        this.logger.warn({ tempPath, err: errorMessage(cleanupErr) }, 'Failed to remove temp file');
      });
      throw err;
    }

    this.lastSnapshot = doc;
    this.logger.debug({ path: this.path, bytes: data.length }, 'Configuration committed');
  }

  /** Last document read or committed, without touching the disk. */
  snapshot(): XrayConfigDocument | null {
    return this.lastSnapshot;
  }

  usersCount(): number {
    if (!this.lastSnapshot) return 0;
    try {
      return listUsers(this.lastSnapshot, this.selector).length;
    } catch {
      return 0;
    }
  }

  /**
   * Startup check: seed the live document from the template when it is
   * missing, then require that it parses and has a managed inbound.
   */
  async verify(): Promise<VerifyResult> {
    let seeded = false;

    try {
      await fs.access(this.path);
    } catch {
      const template = await fs.readFile(this.templatePath, 'utf-8');
      await this.commit(this.parse(template));
      seeded = true;
      this.logger.warn({ path: this.path }, 'Configuration not found, seeded from default template');
    }

    const doc = await this.read();
    try {
      findManagedInbound(doc, this.selector);
    } catch (err) {
      throw new StorageCorruptionError(errorMessage(err), this.path);
    }

    return { seeded, usersCount: this.usersCount() };
  }

  private parse(raw: string): XrayConfigDocument {
    try {
      return parseDocument(raw);
    } catch (err) {
      const reason = err instanceof DocumentShapeError ? err.message : `invalid JSON (${errorMessage(err)})`;
      throw new StorageCorruptionError(`Configuration ${this.path} is corrupt: ${reason}`, this.path);
    }
  }
}
