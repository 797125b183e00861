import { Logger } from '@nestjs/common';
import type { BatchSummary } from '@weatherscape/queue-jobs';

export function logBatchSummary(logger: Logger, summary: BatchSummary): void {
  if (summary.total === 0) return;

  const text = `Batch done: ${summary.successCount}/${summary.total} succeeded`;
  if (summary.errorCount === 0) {
    logger.log(text);
    return;
  }

  const details = summary.errors.map((error) => `${error.messageId} [${error.kind}] ${error.message}`);
  logger.warn(`${text}; ${details.join('; ')}`);
}
