import { errorKind, errorMessage, type PipelineErrorKind } from '@weatherscape/common';
import type { QueueMessage } from './queue-message';

export interface MessageFailure {
  messageId: string;
  kind: PipelineErrorKind | 'unexpected';
  message: string;
  zip?: string;
  traceId?: string;
}

export interface BatchSummary {
  total: number;
  successCount: number;
  errorCount: number;
  errors: MessageFailure[];
}

/**
 * Context a handler can attach to its failure before it propagates, so the
 * status record can name the ZIP and trace that failed.
 */
export class MessageContext {
  zip?: string;
  traceId?: string;
}

export type MessageHandler = (message: QueueMessage, context: MessageContext) => Promise<void>;

/**
 * Runs `handler` for every message of a batch concurrently. A message is
 * acknowledged only when its handler resolves; a rejection requests its
 * redelivery and never affects the other messages.
 */
export async function processBatch(
  messages: readonly QueueMessage[],
  handler: MessageHandler,
): Promise<BatchSummary> {
  const outcomes = await Promise.all(
    messages.map(async (message): Promise<MessageFailure | null> => {
      const context = new MessageContext();
      message.begin();
      try {
        await handler(message, context);
        message.ack();
        return null;
      } catch (error) {
        message.retry(error);
        return {
          messageId: message.id,
          kind: errorKind(error),
          message: errorMessage(error),
          zip: context.zip,
          traceId: context.traceId,
        };
      }
    }),
  );

  const errors = outcomes.filter((outcome): outcome is MessageFailure => outcome !== null);
  return {
    total: messages.length,
    successCount: messages.length - errors.length,
    errorCount: errors.length,
    errors,
  };
}

/**
 * Requests redelivery of a whole batch without processing it.
 */
export function retryBatch(messages: readonly QueueMessage[], reason: unknown): BatchSummary {
  for (const message of messages) {
    message.retry(reason);
  }
  return {
    total: messages.length,
    successCount: 0,
    errorCount: messages.length,
    errors: messages.map((message) => ({
      messageId: message.id,
      kind: errorKind(reason),
      message: errorMessage(reason),
    })),
  };
}
