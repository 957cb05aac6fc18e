import { EventEmitter } from 'node:events';
import { randomUUID } from 'node:crypto';
import {
  AgentEvent,
  CommandKind,
  type Command,
  type CommandResultResponse,
  type CommandStatus,
} from '@xray-agent/protocol';
import { AgentError, ReconcileError, ShuttingDownError, errorMessage } from '../errors.js';
import type { EventReporter } from '../registry/EventReporter.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { Applied, Reconciler } from './Reconciler.js';

export interface CommandRecord {
  id: string;
  command: Command;
  status: CommandStatus;
  enqueuedAt: number;
  finishedAt?: number;
  changed?: boolean;
  error?: { code: string; message: string };
}

export interface EnqueueResult {
  id: string;
  /** 1 when nothing is ahead of this command. */
  position: number;
}

export interface CommandQueueOptions {
  reconciler: Pick<Reconciler, 'apply'>;
  reporter?: EventReporter;
  /** How many finished commands stay queryable by id. */
  historySize?: number;
  logger?: Logger;
}

interface CommandQueueEvents {
  applied: [record: CommandRecord, applied: Applied];
  failed: [record: CommandRecord, error: AgentError];
}

/**
 * In-process ordered channel between the command endpoint and the
 * reconciler. Commands are applied one at a time in arrival order.
 */
export class CommandQueue extends EventEmitter<CommandQueueEvents> {
  private reconciler: Pick<Reconciler, 'apply'>;
  private reporter?: EventReporter;
  private historySize: number;
  private logger: Logger;
  private pending: CommandRecord[] = [];
  private records = new Map<string, CommandRecord>();
  private current: Promise<void> | null = null;
  private closed = false;

  constructor(options: CommandQueueOptions) {
    super();
    this.reconciler = options.reconciler;
    this.reporter = options.reporter;
    this.historySize = options.historySize ?? 200;
    this.logger = options.logger ?? rootLogger.child({ component: 'command-queue' });
  }

  /** Commands waiting or running. */
  get depth(): number {
    return this.pending.length + (this.current ? 1 : 0);
  }

  enqueue(command: Command): EnqueueResult {
    if (this.closed) {
      throw new ShuttingDownError();
    }

    const record: CommandRecord = {
      id: randomUUID(),
      command,
      status: 'queued',
      enqueuedAt: Date.now(),
    };

    this.pending.push(record);
    this.remember(record);
    const position = this.depth;

    this.logger.info(
      {
        commandId: record.id,
        kind: command.kind,
        userUuid: command.userUuid,
        previousUuid: command.previousUuid,
        position,
      },
      'Command queued'
    );

    this.pump();
    return { id: record.id, position };
  }

  get(id: string): CommandRecord | undefined {
    return this.records.get(id);
  }

  /**
   * Stop accepting commands and wait for the running one to finish.
   * Commands still waiting are dropped; the Core API redelivers them.
   */
  async close(): Promise<void> {
    this.closed = true;

    const dropped = this.pending.splice(0);
    for (const record of dropped) {
      this.finish(record, 'failed', { error: { code: 'E_SHUTTING_DOWN', message: 'Agent is shutting down' } });
    }
    if (dropped.length > 0) {
      this.logger.warn({ dropped: dropped.length }, 'Dropped queued commands on shutdown');
    }

    if (this.current) {
      await this.current;
    }
  }

  /** Resolves when the queue has nothing waiting or running. */
  async drained(): Promise<void> {
    while (this.current) {
      await this.current;
    }
  }

  private pump(): void {
    if (this.current) return;

    const record = this.pending.shift();
    if (!record) return;

    this.current = this.run(record)
      .catch((err: unknown) => {
        this.logger.error({ commandId: record.id, err: errorMessage(err) }, 'Command listener failed');
      })
      .finally(() => {
        this.current = null;
        this.pump();
      });
  }

  private async run(record: CommandRecord): Promise<void> {
    record.status = 'running';
    const { command } = record;

    try {
      const applied = await this.reconciler.apply(command);
      this.finish(record, 'applied', { changed: applied.changed });
      this.emit('applied', record, applied);

      if (applied.changed) {
        this.reportChange(record);
      }
    } catch (err) {
      const error =
        err instanceof AgentError ? err : new ReconcileError('storage_unavailable', errorMessage(err), { cause: err });
      this.finish(record, 'failed', { error: { code: error.code, message: error.message } });

      this.logger.error(
        { commandId: record.id, kind: command.kind, userUuid: command.userUuid, code: error.code, err: error.message },
        'Command failed'
      );
      this.emit('failed', record, error);

      this.reporter?.report(AgentEvent.COMMAND_FAILED, {
        command_id: record.id,
        command: command.kind,
        user_uuid: command.userUuid,
        ...(command.previousUuid ? { old_user_uuid: command.previousUuid } : {}),
        reason: error instanceof ReconcileError ? error.reason : error.code,
        message: error.message,
      });
    }
  }

  private reportChange(record: CommandRecord): void {
    const { command } = record;
    const data = {
      command_id: record.id,
      user_uuid: command.userUuid,
      ...(command.email ? { email: command.email } : {}),
    };

    if (command.kind === CommandKind.REGENERATE_USER && command.previousUuid) {
      this.reporter?.report(AgentEvent.USER_REGENERATED, { ...data, old_user_uuid: command.previousUuid });
    } else if (command.kind === CommandKind.REMOVE_USER) {
      this.reporter?.report(AgentEvent.USER_REMOVED, data);
    } else {
      this.reporter?.report(AgentEvent.USER_ADDED, data);
    }
  }

  private finish(record: CommandRecord, status: CommandStatus, result: Partial<CommandRecord>): void {
    Object.assign(record, result, { status, finishedAt: Date.now() });
  }

  private remember(record: CommandRecord): void {
    this.records.set(record.id, record);
    while (this.records.size > this.historySize) {
      const oldest = this.records.keys().next();
      if (oldest.done) break;
      const candidate = this.records.get(oldest.value);
      // Never evict a command that has not finished yet.
      if (candidate && (candidate.status === 'queued' || candidate.status === 'running')) break;
      this.records.delete(oldest.value);
    }
  }
}

export function toCommandResult(record: CommandRecord): CommandResultResponse {
  const result: CommandResultResponse = {
    command_id: record.id,
    command: record.command.kind,
    user_uuid: record.command.userUuid,
    status: record.status,
  };
  if (record.command.previousUuid) result.old_user_uuid = record.command.previousUuid;
  if (record.changed !== undefined) result.changed = record.changed;
  if (record.error) result.error = record.error;
  return result;
}
