import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigurationError } from '../common/errors';
import { assertConfigured, PIPELINE_SETTINGS, PipelineSettings } from '../config/pipeline-settings';
import { NotificationSink } from '../notifications/notification-sink';
import { runBatch, sleep, Sleep } from '../pipeline/batch-runner';
import { BatchSummary, EnrichmentStage, StageName, StageRunOptions } from '../pipeline/pipeline.types';

export const ENRICHMENT_STAGES = Symbol('ENRICHMENT_STAGES');
export const BATCH_SLEEP = Symbol('BATCH_SLEEP');

/**
 * Entry point shared by the scheduler and the CLI: resolves run options,
 * checks the stage's settings before touching any item, runs the batch and
 * forwards the summary to the notification sink.
 */
@Injectable()
export class StageRunnerService {
  private readonly logger = new Logger(StageRunnerService.name);

  constructor(
    @Inject(ENRICHMENT_STAGES) private readonly stages: ReadonlyArray<EnrichmentStage<unknown>>,
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
    private readonly notifications: NotificationSink,
    @Inject(BATCH_SLEEP) private readonly wait: Sleep = sleep,
  ) {}

  resolveOptions(name: StageName, overrides: Partial<StageRunOptions> = {}): StageRunOptions {
    const { batch } = this.settings;
    return {
      force: overrides.force ?? false,
      dryRun: overrides.dryRun ?? false,
      sandbox: overrides.sandbox ?? false,
      limit: overrides.limit ?? (name === 'gtin' ? batch.gtinLimit : batch.defaultLimit),
      delaySeconds: overrides.delaySeconds ?? batch.delaySeconds,
    };
  }

  async run(name: StageName, overrides: Partial<StageRunOptions> = {}): Promise<BatchSummary> {
    const stage = this.stages.find((s) => s.name === name);
    if (!stage) {
      throw new ConfigurationError(`Stage ${name} is not registered`);
    }
    const options = this.resolveOptions(name, overrides);
    if (!Number.isInteger(options.limit) || options.limit < 1) {
      throw new ConfigurationError(`Batch limit must be a positive integer, got ${options.limit}`);
    }
    if (options.delaySeconds < 0) {
      throw new ConfigurationError(`Item delay cannot be negative, got ${options.delaySeconds}`);
    }
    assertConfigured(this.settings, stage.requiredSettings, name);

    const summary = await runBatch(stage, options, this.wait);
    const delivered = await this.notifications.send(summary);
    if (!delivered) {
      this.logger.debug(`Summary for batch ${summary.batchId} was not delivered`);
    }
    return summary;
  }
}
