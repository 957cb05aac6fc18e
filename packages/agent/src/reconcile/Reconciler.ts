import { CommandKind, type Command, type CommandKindValue } from '@xray-agent/protocol';
import {
  ReconcileError,
  ReloadError,
  StorageCorruptionError,
  TimeoutError,
  ValidationError,
  errorMessage,
} from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { Mutex } from '../utils/Mutex.js';
import { withRetry } from '../utils/retry.js';
import type { ConfigStore } from '../xray/ConfigStore.js';
import type { ReloadExecutor } from '../xray/ReloadExecutor.js';
import {
  DocumentShapeError,
  listUsers,
  withUserAdded,
  withUserRemoved,
  withUserReplaced,
  type InboundSelector,
  type MutationResult,
  type XrayConfigDocument,
} from '../xray/XrayConfigDocument.js';

export interface Applied {
  kind: CommandKindValue;
  userUuid: string;
  /** False when the command was already in effect (idempotent no-op). */
  changed: boolean;
  usersCount: number;
}

export interface ReconcilerOptions {
  store: ConfigStore;
  executor: ReloadExecutor;
  /** The single mutation lock guarding the store. */
  mutex?: Mutex;
  selector?: InboundSelector;
  userFlow?: string;
  storageRetries?: number;
  storageRetryDelayMs?: number;
  logger?: Logger;
}

/**
 * Turns a command into a validated, committed configuration change.
 *
 * The whole sequence (read, compute candidate, validate, reload, commit)
 * runs under one mutation lock, so at most one command is reconciled at a
 * time. Commands are idempotent by user uuid: adding a present user,
 * removing an absent one, or regenerating a user already swapped succeeds
 * without reloading the proxy.
 */
export class Reconciler {
  private store: ConfigStore;
  private executor: ReloadExecutor;
  private mutex: Mutex;
  private selector: InboundSelector;
  private userFlow: string;
  private storageRetries: number;
  private storageRetryDelayMs: number;
  private logger: Logger;

  constructor(options: ReconcilerOptions) {
    this.store = options.store;
    this.executor = options.executor;
    this.mutex = options.mutex ?? new Mutex();
    this.selector = options.selector ?? {};
    this.userFlow = options.userFlow ?? '';
    this.storageRetries = options.storageRetries ?? 3;
    this.storageRetryDelayMs = options.storageRetryDelayMs ?? 100;
    this.logger = options.logger ?? rootLogger.child({ component: 'reconciler' });
  }

  apply(command: Command): Promise<Applied> {
    return this.mutex.runExclusive(() => this.reconcile(command));
  }

  /**
   * Hand the committed document to the proxy again. Run at startup so a
   * process left on a candidate whose commit never happened is brought back
   * to what the disk holds.
   */
  resync(): Promise<void> {
    return this.mutex.runExclusive(async () => {
      const current = await this.withStorageRetry('read', () => this.store.read());
      try {
        await this.executor.reload(current);
      } catch (err) {
        throw this.toReconcileError(err);
      }
      this.logger.info(
        { usersCount: listUsers(current, this.selector).length },
        'Proxy loaded the committed configuration'
      );
    });
  }

  private async reconcile(command: Command): Promise<Applied> {
    const log = this.logger.child({
      kind: command.kind,
      userUuid: command.userUuid,
      ...(command.previousUuid ? { previousUuid: command.previousUuid } : {}),
    });

    const current = await this.withStorageRetry('read', () => this.store.read());
    const mutation = this.mutate(current, command);

    if (!mutation.changed) {
      log.info('Command already in effect, nothing to apply');
      return this.applied(command, false, current);
    }

    try {
      await this.executor.reload(mutation.document);
    } catch (err) {
      throw this.toReconcileError(err);
    }

    try {
      await this.withStorageRetry('commit', () => this.store.commit(mutation.document));
    } catch (err) {
      // The proxy already runs the candidate; re-applying the command
      // re-derives the same document, so the next attempt converges.
      log.error({ err: errorMessage(err) }, 'Proxy reloaded but commit failed');
      throw err;
    }

    log.info('Command applied');
    return this.applied(command, true, mutation.document);
  }

  private mutate(doc: XrayConfigDocument, command: Command): MutationResult {
    try {
      const user = { uuid: command.userUuid, email: command.email, flow: this.userFlow };
      switch (command.kind) {
        case CommandKind.ADD_USER:
          return withUserAdded(doc, user, this.selector);
        case CommandKind.REMOVE_USER:
          return withUserRemoved(doc, command.userUuid, this.selector);
        case CommandKind.REGENERATE_USER:
          if (!command.previousUuid) {
            throw new ReconcileError('invalid_config', 'regenerate_user needs the uuid it replaces');
          }
          return withUserReplaced(doc, command.previousUuid, user, this.selector);
      }
    } catch (err) {
      if (err instanceof DocumentShapeError) {
        throw new ReconcileError('invalid_config', err.message, { cause: err });
      }
      throw err;
    }
  }

  private applied(command: Command, changed: boolean, doc: XrayConfigDocument): Applied {
    return {
      kind: command.kind,
      userUuid: command.userUuid,
      changed,
      usersCount: listUsers(doc, this.selector).length,
    };
  }

  private async withStorageRetry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withRetry(fn, {
        maxRetries: this.storageRetries - 1,
        baseDelayMs: this.storageRetryDelayMs,
        maxDelayMs: this.storageRetryDelayMs * 8,
        isRetryable: (err) => !(err instanceof StorageCorruptionError),
        onRetry: (attempt, err, delayMs) =>
          this.logger.warn({ operation, attempt, delayMs, err: err.message }, 'Storage operation failed, retrying'),
      });
    } catch (err) {
      throw new ReconcileError('storage_unavailable', `Configuration ${operation} failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  private toReconcileError(err: unknown): ReconcileError {
    if (err instanceof ValidationError) {
      return new ReconcileError('invalid_config', err.output ? `${err.message}: ${err.output}` : err.message, {
        cause: err,
      });
    }
    if (err instanceof ReloadError) {
      return new ReconcileError('invalid_config', `Proxy did not load the candidate: ${err.message}`, { cause: err });
    }
    if (err instanceof TimeoutError) {
      return new ReconcileError('timeout', err.message, { cause: err });
    }
    return new ReconcileError('storage_unavailable', `Scratch write failed: ${errorMessage(err)}`, { cause: err });
  }
}
