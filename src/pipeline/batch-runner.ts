import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { errorMessage, errorStack, ServiceError } from '../common/errors';
import {
  BatchSummary,
  DEFAULT_SUMMARY_LABELS,
  EnrichmentStage,
  ItemOutcome,
  StageRunOptions,
} from './pipeline.types';

const logger = new Logger('BatchRunner');

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Runs one stage over its candidates, sequentially.
 *
 * Each item is isolated: a ServiceError from one item is logged and counted as failed,
 * and the batch moves on. Any other error aborts the batch. The inter-item delay only
 * follows items that were not skipped.
 */
export async function runBatch<TItem>(
  stage: EnrichmentStage<TItem>,
  options: StageRunOptions,
  wait: Sleep = sleep,
): Promise<BatchSummary> {
  const batchId = uuidv4();
  const startedAt = new Date().toISOString();
  const tag = `[${stage.name}:${batchId.slice(0, 8)}]`;
  const itemOptions = { force: options.force, persist: !options.dryRun, sandbox: options.sandbox };

  const candidates = (await stage.selectCandidates({ force: options.force, limit: options.limit })).slice(
    0,
    options.limit,
  );
  logger.log(
    `${tag} Starting batch over ${candidates.length} item(s) (limit=${options.limit}, force=${options.force}, dryRun=${options.dryRun})`,
  );

  const summary: BatchSummary = {
    batchId,
    stage: stage.name,
    dryRun: options.dryRun,
    sandbox: options.sandbox,
    labels: stage.summaryLabels ?? DEFAULT_SUMMARY_LABELS,
    total: candidates.length,
    succeeded: 0,
    skipped: 0,
    failed: 0,
    succeededCodes: [],
    startedAt,
    finishedAt: startedAt,
  };

  for (const [index, item] of candidates.entries()) {
    const identity = stage.describe(item);
    let result: ItemOutcome;
    try {
      result = await stage.processOne(item, itemOptions);
    } catch (error) {
      if (!(error instanceof ServiceError)) {
        logger.error(`${tag} Unexpected error on ${identity}; aborting batch`, errorStack(error));
        throw error;
      }
      logger.error(`${tag} ${stage.name} failed for ${identity}: ${errorMessage(error)}`, errorStack(error));
      result = { status: 'failed', saved: false, detail: error.message };
    }

    switch (result.status) {
      case 'generated':
        summary.succeeded += 1;
        summary.succeededCodes.push(identity);
        break;
      case 'skipped':
        summary.skipped += 1;
        logger.debug(`${tag} Skipped ${identity}`);
        break;
      case 'failed':
        summary.failed += 1;
        break;
    }

    const hasNext = index < candidates.length - 1;
    if (hasNext && result.status !== 'skipped' && options.delaySeconds > 0) {
      await wait(options.delaySeconds * 1000);
    }
  }

  summary.finishedAt = new Date().toISOString();
  logger.log(
    `${tag} Finished${options.dryRun ? ' (dry run)' : ''}: ${summary.labels.succeeded}=${summary.succeeded}, ` +
      `${summary.labels.skipped}=${summary.skipped}, ${summary.labels.failed}=${summary.failed}`,
  );
  return summary;
}
