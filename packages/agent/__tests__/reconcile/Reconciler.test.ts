import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Command } from '@xray-agent/protocol';
import { ReconcileError } from '../../src/errors.js';
import { Reconciler } from '../../src/reconcile/Reconciler.js';
import { Mutex } from '../../src/utils/Mutex.js';
import { ConfigStore } from '../../src/xray/ConfigStore.js';
import { ReloadExecutor } from '../../src/xray/ReloadExecutor.js';
import { listUsers, type XrayConfigDocument } from '../../src/xray/XrayConfigDocument.js';
import { FakeProxyController } from '../helpers/FakeProxyController.js';
import { UUID_A, makeTempDir, readDocument, sampleDocument, writeDocument } from '../helpers/fixtures.js';

class FlakyStore extends ConfigStore {
  readFailures = 0;
  commitFailures = 0;

  override async read(): Promise<XrayConfigDocument> {
    if (this.readFailures > 0) {
      this.readFailures--;
      throw Object.assign(new Error('EIO: i/o error, read'), { code: 'EIO' });
    }
    return super.read();
  }

  override async commit(doc: XrayConfigDocument): Promise<void> {
    if (this.commitFailures > 0) {
      this.commitFailures--;
      throw Object.assign(new Error('ENOSPC: no space left on device'), { code: 'ENOSPC' });
    }
    return super.commit(doc);
  }
}

const add = (userUuid: string, email?: string): Command => ({ kind: 'add_user', userUuid, email });
const remove = (userUuid: string): Command => ({ kind: 'remove_user', userUuid });
const regenerate = (previousUuid: string, userUuid: string, email?: string): Command => ({
  kind: 'regenerate_user',
  userUuid,
  previousUuid,
  email,
});

describe('Reconciler', () => {
  let dir: string;
  let configPath: string;
  let controller: FakeProxyController;
  let store: FlakyStore;

  const createReconciler = (target: ConfigStore = store, timeoutMs = 1000) =>
    new Reconciler({
      store: target,
      executor: new ReloadExecutor({ controller, scratchDir: path.join(dir, 'scratch'), timeoutMs }),
      userFlow: 'xtls-rprx-vision',
      storageRetryDelayMs: 1,
    });

  beforeEach(async () => {
    dir = await makeTempDir();
    configPath = path.join(dir, 'config.json');
    await writeDocument(configPath, sampleDocument());
    controller = new FakeProxyController();
    store = new FlakyStore({ path: configPath });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('adds a user to an empty configuration', async () => {
    const reconciler = createReconciler();

    const applied = await reconciler.apply(add('a1', 'x@y.com'));

    expect(applied).toEqual({ kind: 'add_user', userUuid: 'a1', changed: true, usersCount: 1 });
    expect(listUsers(await readDocument(configPath))).toEqual([
      { id: 'a1', email: 'x@y.com', flow: 'xtls-rprx-vision' },
    ]);
    expect(controller.reloaded).toHaveLength(1);
  });

  it('keeps a single entry when the same add arrives twice', async () => {
    const reconciler = createReconciler();

    await reconciler.apply(add('a1'));
    const second = await reconciler.apply(add('a1'));

    expect(second.changed).toBe(false);
    expect(listUsers(await readDocument(configPath)).map((user) => user.id)).toEqual(['a1']);
    expect(controller.reloaded).toHaveLength(1);
  });

  it('treats removing an absent user as success without touching the document', async () => {
    const before = await fs.readFile(configPath, 'utf-8');
    const reconciler = createReconciler();

    const applied = await reconciler.apply(remove('a1'));

    expect(applied).toEqual({ kind: 'remove_user', userUuid: 'a1', changed: false, usersCount: 0 });
    expect(await fs.readFile(configPath, 'utf-8')).toBe(before);
    expect(controller.validated).toEqual([]);
  });

  it('removes a present user', async () => {
    await writeDocument(configPath, sampleDocument([{ id: UUID_A, email: 'a@example.com' }]));
    const reconciler = createReconciler();

    const applied = await reconciler.apply(remove(UUID_A));

    expect(applied.changed).toBe(true);
    expect(listUsers(await readDocument(configPath))).toEqual([]);
  });

  it('regenerates a user with a single reload', async () => {
    await writeDocument(configPath, sampleDocument([{ id: 'a1', email: 'a@example.com' }]));
    const reconciler = createReconciler();

    const applied = await reconciler.apply(regenerate('a1', 'b2'));

    expect(applied).toEqual({ kind: 'regenerate_user', userUuid: 'b2', changed: true, usersCount: 1 });
    expect(listUsers(await readDocument(configPath))).toEqual([
      { id: 'b2', email: 'user-b2', flow: 'xtls-rprx-vision' },
    ]);
    expect(controller.validated).toHaveLength(1);
    expect(controller.reloaded).toHaveLength(1);
  });

  it('treats a repeated regenerate as already in effect', async () => {
    await writeDocument(configPath, sampleDocument([{ id: 'a1', email: 'a@example.com' }]));
    const reconciler = createReconciler();

    await reconciler.apply(regenerate('a1', 'b2', 'b@example.com'));
    const second = await reconciler.apply(regenerate('a1', 'b2', 'b@example.com'));

    expect(second.changed).toBe(false);
    expect(listUsers(await readDocument(configPath)).map((user) => user.id)).toEqual(['b2']);
    expect(controller.reloaded).toHaveLength(1);
  });

  it('adds the new user when the one being replaced is already gone', async () => {
    const reconciler = createReconciler();

    const applied = await reconciler.apply(regenerate('a1', 'b2'));

    expect(applied.changed).toBe(true);
    expect(listUsers(await readDocument(configPath)).map((user) => user.id)).toEqual(['b2']);
  });

  it('keeps the old user when a regenerate fails validation', async () => {
    await writeDocument(configPath, sampleDocument([{ id: 'a1', email: 'a@example.com' }]));
    const before = await fs.readFile(configPath, 'utf-8');
    controller.valid = false;
    const reconciler = createReconciler();

    await expect(reconciler.apply(regenerate('a1', 'b2'))).rejects.toMatchObject({ reason: 'invalid_config' });

    expect(await fs.readFile(configPath, 'utf-8')).toBe(before);
    expect(controller.reloaded).toEqual([]);
  });

  it('resync hands the committed document to the proxy', async () => {
    await writeDocument(configPath, sampleDocument([{ id: UUID_A, email: 'a@example.com' }]));
    const committed = await fs.readFile(configPath, 'utf-8');

    await createReconciler().resync();

    expect(controller.reloaded).toEqual([committed]);
    expect(await fs.readFile(configPath, 'utf-8')).toBe(committed);
  });

  it('leaves the document byte-identical and the proxy unsignaled when validation fails', async () => {
    const before = await fs.readFile(configPath, 'utf-8');
    controller.valid = false;
    controller.validationOutput = 'failed to parse clients';
    const reconciler = createReconciler();

    const error = await reconciler.apply(add('a1')).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ReconcileError);
    expect(error).toMatchObject({ reason: 'invalid_config', code: 'E_INVALID_CONFIG' });
    expect(await fs.readFile(configPath, 'utf-8')).toBe(before);
    expect(controller.reloaded).toEqual([]);
  });

  it('maps a failed reload signal to invalid_config and does not commit', async () => {
    const before = await fs.readFile(configPath, 'utf-8');
    controller.reloadError = new Error('kill failed');
    const reconciler = createReconciler();

    await expect(reconciler.apply(add('a1'))).rejects.toMatchObject({ reason: 'invalid_config' });
    expect(await fs.readFile(configPath, 'utf-8')).toBe(before);
  });

  it('reports a timeout and leaves the document unchanged', async () => {
    const before = await fs.readFile(configPath, 'utf-8');
    controller.hangValidation = true;
    const reconciler = createReconciler(store, 30);

    await expect(reconciler.apply(add('a1'))).rejects.toMatchObject({ reason: 'timeout', code: 'E_TIMEOUT' });
    expect(await fs.readFile(configPath, 'utf-8')).toBe(before);
  });

  it('retries transient read failures', async () => {
    store.readFailures = 2;
    const reconciler = createReconciler();

    const applied = await reconciler.apply(add('a1'));

    expect(applied.changed).toBe(true);
    expect(store.readFailures).toBe(0);
  });

  it('surfaces storage_unavailable after three failed reads', async () => {
    store.readFailures = 3;
    const reconciler = createReconciler();

    await expect(reconciler.apply(add('a1'))).rejects.toMatchObject({
      reason: 'storage_unavailable',
      code: 'E_STORAGE_UNAVAILABLE',
    });
    expect(controller.validated).toEqual([]);
  });

  it('does not retry a corrupt document', async () => {
    await fs.writeFile(configPath, '{"inbounds": ', 'utf-8');
    const reconciler = createReconciler();

    await expect(reconciler.apply(add('a1'))).rejects.toMatchObject({ reason: 'storage_unavailable' });
  });

  it('reports a document without the managed inbound as invalid_config', async () => {
    await writeDocument(configPath, { inbounds: [] });
    const reconciler = createReconciler();

    await expect(reconciler.apply(add('a1'))).rejects.toMatchObject({ reason: 'invalid_config' });
  });

  it('converges after a crash between reload and commit', async () => {
    store.commitFailures = 3;
    const crashed = createReconciler();

    await expect(crashed.apply(add('a1', 'x@y.com'))).rejects.toMatchObject({ reason: 'storage_unavailable' });
    expect(controller.reloaded).toHaveLength(1);
    expect(listUsers(await readDocument(configPath))).toEqual([]);

    // Restart: fresh store and reconciler over the same file.
    const restarted = createReconciler(new ConfigStore({ path: configPath }));
    await restarted.apply(add('a1', 'x@y.com'));
    const again = await restarted.apply(add('a1', 'x@y.com'));

    expect(again.changed).toBe(false);
    expect(listUsers(await readDocument(configPath)).map((user) => user.id)).toEqual(['a1']);
    expect(controller.reloaded).toHaveLength(2);
  });

  it('serializes concurrent applies through the mutation lock', async () => {
    const mutex = new Mutex();
    const reconciler = new Reconciler({
      store,
      executor: new ReloadExecutor({ controller, scratchDir: path.join(dir, 'scratch'), timeoutMs: 1000 }),
      mutex,
      storageRetryDelayMs: 1,
    });

    const results = await Promise.all([
      reconciler.apply(add('a1')),
      reconciler.apply(add('b2')),
      reconciler.apply(remove('a1')),
    ]);

    expect(results.map((result) => result.usersCount)).toEqual([1, 2, 1]);
    expect(listUsers(await readDocument(configPath)).map((user) => user.id)).toEqual(['b2']);
    expect(mutex.isLocked).toBe(false);
  });
});
