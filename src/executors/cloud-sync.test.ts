import { describe, it, expect, vi, beforeEach } from 'vitest';
import { CloudSyncExecutor } from './cloud-sync';
import type { CloudSyncProvider, CloudSyncProviderFactory } from '../cloud-sync/provider';
import type { CloudSyncConfig } from '../types';
import { buildJob, recordingContext, taskOf, TEST_REPOSITORY } from '../testing/fixtures';
import { createProcessHarness } from '../testing/runtime';

const S3_CONFIG: CloudSyncConfig = {
  id: 7,
  name: 'offsite',
  provider: 's3',
  enabled: true,
  pathPrefix: 'borg/primary',
  settings: {},
};

function setup(sync: CloudSyncProvider['sync'] = async () => ({ success: true })) {
  const harness = createProcessHarness();
  harness.store.cloudSyncConfigs.set(S3_CONFIG.id, { ...S3_CONFIG });
  const provider = { sync: vi.fn(sync) };
  const factory = vi.fn<CloudSyncProviderFactory>(() => provider);
  const executor = new CloudSyncExecutor({
    persistence: harness.persistence,
    providers: new Map([['s3', factory]]),
  });
  return { ...harness, executor, provider, factory };
}

describe('CloudSyncExecutor', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('syncs the repository through the configured provider', async () => {
    const { executor, provider, factory } = setup(async (_path, _prefix, onLine) => {
      await onLine('Transferred: 12 MiB');
      return { success: true };
    });
    const job = buildJob([{ name: 'sync', kind: 'cloud_sync' }], { cloud_sync_config_id: 7 });
    const task = taskOf(job, 0, 'cloud_sync');
    const { context, lines } = recordingContext();

    const ok = await executor.execute(job, task, 0, context);

    expect(ok).toBe(true);
    expect(task.status).toBe('completed');
    expect(factory).toHaveBeenCalledWith(S3_CONFIG);
    expect(provider.sync.mock.calls[0].slice(0, 2)).toEqual(['/srv/borg/primary', 'borg/primary']);
    expect(lines).toEqual([
      'Starting cloud sync to offsite (s3)...',
      'Transferred: 12 MiB',
      'Cloud sync completed successfully',
    ]);
  });

  it('prefers the configuration named on the task', async () => {
    const { executor, store, factory } = setup();
    store.cloudSyncConfigs.set(8, { ...S3_CONFIG, id: 8, name: 'archive' });
    const job = buildJob([{ name: 'sync', kind: 'cloud_sync', parameters: { cloud_sync_config_id: 8 } }], {
      cloud_sync_config_id: 7,
    });

    await executor.execute(job, taskOf(job, 0, 'cloud_sync'), 0, recordingContext().context);

    expect(factory.mock.calls[0][0].name).toBe('archive');
  });

  it.each([
    ['no configuration', undefined, 'Cloud sync skipped - no configuration'],
    ['a missing configuration', 99, 'Cloud sync skipped - configuration 99 not found'],
  ])('completes without syncing given %s', async (_label, configId, line) => {
    const { executor, provider } = setup();
    const job = buildJob([{ name: 'sync', kind: 'cloud_sync' }], { cloud_sync_config_id: configId ?? null });
    const task = taskOf(job, 0, 'cloud_sync');
    const { context, lines } = recordingContext();

    const ok = await executor.execute(job, task, 0, context);

    expect(ok).toBe(true);
    expect(task.status).toBe('completed');
    expect(lines).toEqual([line]);
    expect(provider.sync).not.toHaveBeenCalled();
  });

  it('completes without syncing when the configuration is disabled', async () => {
    const { executor, store, provider } = setup();
    store.cloudSyncConfigs.set(7, { ...S3_CONFIG, enabled: false });
    const job = buildJob([{ name: 'sync', kind: 'cloud_sync' }], { cloud_sync_config_id: 7 });
    const { context, lines } = recordingContext();

    const ok = await executor.execute(job, taskOf(job, 0, 'cloud_sync'), 0, context);

    expect(ok).toBe(true);
    expect(lines).toEqual(["Cloud sync skipped - configuration 'offsite' is disabled"]);
    expect(provider.sync).not.toHaveBeenCalled();
  });

  it('fails on a provider it does not know', async () => {
    const { executor, store } = setup();
    store.cloudSyncConfigs.set(7, { ...S3_CONFIG, provider: 'tape' });
    const job = buildJob([{ name: 'sync', kind: 'cloud_sync' }], { cloud_sync_config_id: 7 });
    const task = taskOf(job, 0, 'cloud_sync');

    const ok = await executor.execute(job, task, 0, recordingContext().context);

    expect(ok).toBe(false);
    expect(task).toMatchObject({ status: 'failed', returnCode: 1, error: 'Unknown cloud provider: tape' });
  });

  it('needs the repository passphrase', async () => {
    const { executor, store, provider } = setup();
    store.repositories.set(1, { ...TEST_REPOSITORY, passphrase: '' });
    const job = buildJob([{ name: 'sync', kind: 'cloud_sync' }], { cloud_sync_config_id: 7 });
    const task = taskOf(job, 0, 'cloud_sync');

    await executor.execute(job, task, 0, recordingContext().context);

    expect(task.error).toBe('Repository passphrase is required for cloud sync');
    expect(provider.sync).not.toHaveBeenCalled();
  });

  it('fails with the error the provider reports', async () => {
    const { executor } = setup(async () => ({ success: false, error: 'rclone exited with code 7' }));
    const job = buildJob([{ name: 'sync', kind: 'cloud_sync' }], { cloud_sync_config_id: 7 });
    const task = taskOf(job, 0, 'cloud_sync');

    const ok = await executor.execute(job, task, 0, recordingContext().context);

    expect(ok).toBe(false);
    expect(task.error).toBe('rclone exited with code 7');
  });

  it('returns -1 when the provider throws', async () => {
    const { executor, factory } = setup();
    factory.mockImplementation(() => {
      throw new Error("Invalid rclone settings for 'offsite': remote: Required");
    });
    const job = buildJob([{ name: 'sync', kind: 'cloud_sync' }], { cloud_sync_config_id: 7 });
    const task = taskOf(job, 0, 'cloud_sync');

    await executor.execute(job, task, 0, recordingContext().context);

    expect(task).toMatchObject({
      returnCode: -1,
      error: "Cloud sync task failed: Invalid rclone settings for 'offsite': remote: Required",
    });
  });
});
