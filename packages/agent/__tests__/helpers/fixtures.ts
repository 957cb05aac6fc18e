import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { parseDocument, type JsonObject, type XrayConfigDocument } from '../../src/xray/XrayConfigDocument.js';
import type { AgentSettings } from '../../src/config/ConfigManager.js';

export const UUID_A = '3f2504e0-4f89-41d3-9a0c-0305e82c3301';
export const UUID_B = '9b2c7a10-1d4e-4b6f-8a3c-5e7d9f0a1b2c';
export const UUID_C = 'c56a4180-65aa-42ec-a945-5fd21dec0538';

/** A proxy document with an api inbound ahead of the managed vless inbound. */
export function sampleDocument(clients: JsonObject[] = []): XrayConfigDocument {
  return {
    log: { loglevel: 'warning' },
    inbounds: [
      { tag: 'api', port: 10085, protocol: 'dokodemo-door', settings: { address: '127.0.0.1' } },
      {
        tag: 'vless-in',
        port: 443,
        protocol: 'vless',
        settings: { clients, decryption: 'none' },
        streamSettings: { network: 'tcp', security: 'reality' },
      },
    ],
    outbounds: [{ protocol: 'freedom', tag: 'direct' }],
  };
}

export async function makeTempDir(prefix = 'xray-agent-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeDocument(filePath: string, doc: XrayConfigDocument): Promise<void> {
  await fs.writeFile(filePath, `${JSON.stringify(doc, null, 2)}\n`, 'utf-8');
}

export async function readDocument(filePath: string): Promise<XrayConfigDocument> {
  return parseDocument(await fs.readFile(filePath, 'utf-8'));
}

export function testSettings(dir: string, overrides: Partial<AgentSettings> = {}): AgentSettings {
  return {
    coreApiUrl: 'http://core.test',
    apiKey: 'test-secret',
    serverId: 7,
    host: '127.0.0.1',
    port: 0,
    agentUrl: 'http://agent.test:8080',
    xray: {
      configPath: path.join(dir, 'config.json'),
      scratchDir: path.join(dir, 'scratch'),
      testCommand: 'true',
      reloadCommand: 'true',
      processCheckCommand: 'true',
      statsCommand: 'echo {}',
      userFlow: 'xtls-rprx-vision',
    },
    operationTimeoutMs: 1000,
    healthIntervalMs: 10_000,
    healthFailureThreshold: 2,
    metricsIntervalMs: 30_000,
    reRegisterAfterMs: 300_000,
    logLevel: 'silent',
    ...overrides,
  };
}
