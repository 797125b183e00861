import { QueueMessage, type WeatherReadyEventData } from '@weatherscape/queue-jobs';
import { createChildTrace, createRootTrace } from '@weatherscape/tracing';
import { createPipelineHarness, type PipelineHarness } from '../../test/pipeline-harness';

function readyEvent(zip: string): WeatherReadyEventData {
  return {
    zip,
    lat: 30.4521,
    lon: -97.7688,
    fetchedAt: '2026-10-19T11:59:30.000Z',
    trace: createChildTrace(createRootTrace()),
  };
}

function message(id: string, body: WeatherReadyEventData): QueueMessage {
  return new QueueMessage(id, JSON.parse(JSON.stringify(body)));
}

describe('JobDispatcherService', () => {
  let harness: PipelineHarness;

  beforeEach(async () => {
    harness = await createPipelineHarness();
  });

  it('fans out one generation job per enabled format', async () => {
    await harness.store.put('formats:78729', JSON.stringify(['rgb_light', 'bw']));
    const event = readyEvent('78729');

    const summary = await harness.dispatcher.handleBatch([message('1', event)]);

    expect(summary.successCount).toBe(1);
    const jobs = harness.queues.landscape.added;
    expect(jobs.map((job) => job.data.format)).toEqual(['rgb_light', 'bw']);
    expect(jobs.map((job) => job.id)).toEqual([
      `${event.trace.traceId}_78729_rgb_light`,
      `${event.trace.traceId}_78729_bw`,
    ]);
    for (const job of jobs) {
      expect(job.name).toBe('generate');
      expect(job.data).toMatchObject({ zip: '78729', lat: 30.4521, lon: -97.7688, enqueuedAt: '2026-10-19T12:00:00.000Z' });
      expect(job.data.trace.traceId).toBe(event.trace.traceId);
      expect(job.data.trace.parentSpanId).toBe(event.trace.spanId);
    }
    expect(jobs[0].data.trace.spanId).not.toBe(jobs[1].data.trace.spanId);
  });

  it('uses the default format when none are configured', async () => {
    await harness.dispatcher.handleBatch([message('1', readyEvent('78729'))]);

    expect(harness.queues.landscape.added.map((job) => job.data.format)).toEqual(['rgb_light']);
  });

  it('fails the event when the fan-out stops part way', async () => {
    await harness.store.put('formats:78729', JSON.stringify(['rgb_light', 'bw', 'eink']));
    harness.queues.landscape.failAfterJobs(2);
    const msg = message('1', readyEvent('78729'));

    const summary = await harness.dispatcher.handleBatch([msg]);

    expect(msg.state).toBe('retry-requested');
    expect(summary.errors[0]).toMatchObject({
      kind: 'fan_out',
      message: 'Fan-out for 78729 stopped after 2/3 jobs',
      zip: '78729',
    });
  });

  it('does not duplicate jobs when the event is redelivered', async () => {
    await harness.store.put('formats:78729', JSON.stringify(['rgb_light', 'bw', 'eink']));
    const event = readyEvent('78729');
    harness.queues.landscape.failAfterJobs(2);
    await harness.dispatcher.handleBatch([message('1', event)]);

    harness.queues.landscape.failAfterJobs(null);
    const redelivered = message('1', event);
    await harness.dispatcher.handleBatch([redelivered]);

    expect(redelivered.state).toBe('acked');
    expect(harness.queues.landscape.added.map((job) => job.data.format)).toEqual(['rgb_light', 'bw', 'eink']);
  });

  it('records the batch', async () => {
    await harness.dispatcher.handleBatch([message('1', readyEvent('78729')), message('2', readyEvent('10001'))]);

    await expect(harness.status.read('dispatcher')).resolves.toMatchObject({
      stage: 'dispatcher',
      total: 2,
      successCount: 2,
      errorCount: 0,
    });
  });
});
