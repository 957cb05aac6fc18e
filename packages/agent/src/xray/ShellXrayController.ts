import { exec } from 'node:child_process';
import { promisify } from 'node:util';
import { StatsQueryReplySchema } from '@xray-agent/protocol';
import { CONFIG_PLACEHOLDER, type XraySettings } from '../config/ConfigManager.js';
import type { ProcessProbe, ProxyController, ValidationOutcome } from './ProxyController.js';

const execAsync = promisify(exec);

const MAX_OUTPUT_BYTES = 1024 * 1024;

export type ShellCommands = Pick<
  XraySettings,
  'testCommand' | 'reloadCommand' | 'processCheckCommand' | 'statsCommand'
>;

export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function renderCommand(template: string, configPath: string): string {
  return template.split(CONFIG_PLACEHOLDER).join(shellQuote(configPath));
}

/**
 * Drives a local xray through shell commands: `xray run -test` for
 * validation, installing the candidate where the process reads it and
 * sending HUP for reload, and `xray api statsquery` as the management
 * interface.
 */
export class ShellXrayController implements ProxyController {
  constructor(
    private commands: ShellCommands,
    private timeoutMs: number = 10_000
  ) {}

  async validate(candidatePath: string): Promise<ValidationOutcome> {
    try {
      const { stdout, stderr } = await this.run(renderCommand(this.commands.testCommand, candidatePath));
      return { valid: true, output: (stdout || stderr).trim() };
    } catch (err) {
      return { valid: false, output: failureOutput(err) };
    }
  }

  async reload(candidatePath: string): Promise<void> {
    try {
      await this.run(renderCommand(this.commands.reloadCommand, candidatePath));
    } catch (err) {
      throw new Error(`Reload command failed: ${failureOutput(err)}`);
    }
  }

  async probe(): Promise<ProcessProbe> {
    try {
      await this.run(this.commands.processCheckCommand);
    } catch (err) {
      return { running: false, managementReachable: false, detail: failureOutput(err) };
    }

    try {
      await this.queryStats();
      return { running: true, managementReachable: true };
    } catch (err) {
      return { running: true, managementReachable: false, detail: failureOutput(err) };
    }
  }

  async queryStats(): Promise<Record<string, number>> {
    const { stdout } = await this.run(this.commands.statsCommand);
    const reply = StatsQueryReplySchema.parse(JSON.parse(stdout || '{}'));

    const counters: Record<string, number> = {};
    for (const stat of reply.stat ?? []) {
      const value = Number(stat.value ?? 0);
      counters[stat.name] = Number.isFinite(value) ? value : 0;
    }
    return counters;
  }

  private run(command: string): Promise<{ stdout: string; stderr: string }> {
    return execAsync(command, { timeout: this.timeoutMs, maxBuffer: MAX_OUTPUT_BYTES });
  }
}

function failureOutput(err: unknown): string {
  if (typeof err === 'object' && err !== null) {
    const stderr = 'stderr' in err && typeof err.stderr === 'string' ? err.stderr.trim() : '';
    const stdout = 'stdout' in err && typeof err.stdout === 'string' ? err.stdout.trim() : '';
    if (stderr || stdout) return stderr || stdout;
  }
  return err instanceof Error ? err.message : String(err);
}
