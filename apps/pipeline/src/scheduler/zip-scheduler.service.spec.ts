import { ConfigurationError, InvalidZipError } from '@weatherscape/common';
import { createPipelineHarness, type PipelineHarness } from '../../test/pipeline-harness';

describe('ZipSchedulerService', () => {
  let harness: PipelineHarness;

  beforeEach(async () => {
    harness = await createPipelineHarness();
    await harness.store.put('active_zips', JSON.stringify(['78729', '10001', '94103']));
  });

  it('queues one fetch job per active ZIP, each with its own root trace', async () => {
    const summary = await harness.scheduler.tick();

    expect(summary).toEqual({ total: 3, successCount: 3, errorCount: 0, errors: [] });
    const jobs = harness.queues.fetch.added;
    expect(jobs.map((job) => job.name)).toEqual(['fetch', 'fetch', 'fetch']);
    expect(jobs.map((job) => job.data.zip)).toEqual(['78729', '10001', '94103']);
    expect(jobs.every((job) => job.data.scheduledAt === '2026-10-19T12:00:00.000Z')).toBe(true);
    expect(jobs.every((job) => job.data.trace.parentSpanId === null)).toBe(true);
    expect(new Set(jobs.map((job) => job.data.trace.traceId)).size).toBe(3);
  });

  it('mints new trace ids on every tick', async () => {
    await harness.scheduler.tick();
    await harness.scheduler.tick();

    expect(new Set(harness.queues.fetch.added.map((job) => job.data.trace.traceId)).size).toBe(6);
  });

  it('keeps going when one enqueue fails', async () => {
    harness.queues.fetch.failAfterJobs(1, new Error('connection reset'));

    const summary = await harness.scheduler.tick();

    expect(summary.successCount).toBe(1);
    expect(summary.errorCount).toBe(2);
    expect(summary.errors.map((error) => error.zip)).toEqual(['10001', '94103']);
    expect(summary.errors[0]).toMatchObject({ kind: 'unexpected', message: 'connection reset' });
  });

  it('records the run', async () => {
    await harness.scheduler.tick();

    await expect(harness.status.read('scheduler')).resolves.toMatchObject({
      stage: 'scheduler',
      lastRunAt: '2026-10-19T12:00:00.000Z',
      totalZips: 3,
      enqueued: 3,
      errorCount: 0,
    });
  });

  it('seeds the default ZIPs on first run', async () => {
    harness.store.delete('active_zips');

    await harness.scheduler.tick();

    expect(harness.queues.fetch.added.map((job) => job.data.zip)).toEqual(['78729']);
  });

  it('queues nothing for an empty set', async () => {
    await harness.store.put('active_zips', '[]');

    await expect(harness.scheduler.tick()).resolves.toEqual({ total: 0, successCount: 0, errorCount: 0, errors: [] });
    expect(harness.queues.fetch.added).toHaveLength(0);
  });

  it('fails the tick on a corrupt ZIP set and records why', async () => {
    await harness.store.put('active_zips', 'oops');

    await expect(harness.scheduler.tick()).rejects.toThrow(ConfigurationError);
    await expect(harness.status.read('scheduler')).resolves.toMatchObject({
      errorCount: 1,
      errors: [{ messageId: 'active_zips', kind: 'configuration' }],
    });
  });

  describe('scheduleZip', () => {
    it('queues a single refresh', async () => {
      const job = await harness.scheduler.scheduleZip('10001');

      expect(harness.queues.fetch.added).toHaveLength(1);
      expect(harness.queues.fetch.added[0].data).toEqual(job);
      expect(job.trace.parentSpanId).toBeNull();
    });

    it('rejects malformed ZIPs', async () => {
      await expect(harness.scheduler.scheduleZip('1000')).rejects.toThrow(InvalidZipError);
      expect(harness.queues.fetch.added).toHaveLength(0);
    });
  });
});
