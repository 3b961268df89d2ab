import { Inject, Injectable, Logger } from '@nestjs/common';
import { Cron } from '@nestjs/schedule';
import { errorMessage, errorStack } from '../common/errors';
import { PIPELINE_SETTINGS, PipelineSettings } from '../config/pipeline-settings';
import { StageName } from '../pipeline/pipeline.types';
import { StageRunnerService } from './stage-runner.service';

/** Hourly schedule. Each stage runs after the one that produces its input. */
@Injectable()
export class TasksService {
  private readonly logger = new Logger(TasksService.name);
  private readonly running = new Set<StageName>();

  constructor(
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
    private readonly runner: StageRunnerService,
  ) {}

  @Cron('0 5 * * * *', { name: 'details' })
  handleDetails(): Promise<void> {
    return this.runScheduled('details');
  }

  @Cron('0 15 * * * *', { name: 'specs' })
  handleSpecs(): Promise<void> {
    return this.runScheduled('specs');
  }

  @Cron('0 25 * * * *', { name: 'content' })
  handleContent(): Promise<void> {
    return this.runScheduled('content');
  }

  @Cron('0 35 * * * *', { name: 'gtin' })
  handleGtin(): Promise<void> {
    return this.runScheduled('gtin');
  }

  @Cron('0 45 * * * *', { name: 'images' })
  handleImages(): Promise<void> {
    return this.runScheduled('images');
  }

  @Cron('0 50 * * * *', { name: 'listings' })
  handleListings(): Promise<void> {
    return this.runScheduled('listings');
  }

  @Cron('0 55 * * * *', { name: 'publish' })
  handlePublish(): Promise<void> {
    return this.runScheduled('publish');
  }

  async runScheduled(stage: StageName): Promise<void> {
    if (!this.settings.schedulerEnabled) {
      this.logger.debug(`[CRON - ${stage}] Disabled via SCHEDULER_ENABLED=false`);
      return;
    }
    if (this.running.has(stage)) {
      this.logger.warn(`[CRON - ${stage}] Previous run still in progress; skipping this tick`);
      return;
    }

    this.running.add(stage);
    try {
      // Scheduled runs always persist and never force.
      const summary = await this.runner.run(stage, { force: false, dryRun: false });
      this.logger.log(`[CRON - ${stage}] Done: ${summary.succeeded}/${summary.total} ${summary.labels.succeeded}`);
    } catch (error) {
      this.logger.error(`[CRON - ${stage}] Run failed: ${errorMessage(error)}`, errorStack(error));
    } finally {
      this.running.delete(stage);
    }
  }
}
