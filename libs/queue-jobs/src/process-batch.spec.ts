import { ConfigurationError, StalePipelineError } from '@weatherscape/common';
import { processBatch, retryBatch } from './process-batch';
import { QueueMessage } from './queue-message';

describe('processBatch', () => {
  it('acks successful messages and retries failed ones independently', async () => {
    const messages = [new QueueMessage('a', 1), new QueueMessage('b', 2), new QueueMessage('c', 3)];

    const summary = await processBatch(messages, async (message, context) => {
      context.zip = `0000${String(message.body)}`;
      if (message.body === 2) {
        throw new StalePipelineError('00002');
      }
    });

    expect(messages.map((m) => m.state)).toEqual(['acked', 'retry-requested', 'acked']);
    expect(summary).toEqual({
      total: 3,
      successCount: 2,
      errorCount: 1,
      errors: [
        {
          messageId: 'b',
          kind: 'stale_pipeline',
          message: 'Stale pipeline: no cached weather data for 00002',
          zip: '00002',
          traceId: undefined,
        },
      ],
    });
  });

  it('labels non-pipeline errors as unexpected', async () => {
    const summary = await processBatch([new QueueMessage('a', {})], async () => {
      throw new TypeError('boom');
    });

    expect(summary.errors[0].kind).toBe('unexpected');
    expect(summary.errors[0].message).toBe('boom');
  });

  it('summarises an empty batch', async () => {
    await expect(processBatch([], async () => undefined)).resolves.toEqual({
      total: 0,
      successCount: 0,
      errorCount: 0,
      errors: [],
    });
  });
});

describe('retryBatch', () => {
  it('requests redelivery of every message', () => {
    const messages = [new QueueMessage('a', {}), new QueueMessage('b', {})];
    const reason = new ConfigurationError('OPENWEATHERMAP_API_KEY is not set');

    const summary = retryBatch(messages, reason);

    expect(messages.every((m) => m.state === 'retry-requested' && m.retryReason === reason)).toBe(true);
    expect(summary.errorCount).toBe(2);
    expect(summary.errors[1]).toEqual({
      messageId: 'b',
      kind: 'configuration',
      message: 'OPENWEATHERMAP_API_KEY is not set',
    });
  });
});
