import { SettingKey } from '../config/pipeline-settings';

export type StageName = 'details' | 'specs' | 'content' | 'gtin' | 'images' | 'listings' | 'publish';

export const STAGE_NAMES: readonly StageName[] = ['details', 'specs', 'content', 'gtin', 'images', 'listings', 'publish'];

export function isStageName(value: string): value is StageName {
  return STAGE_NAMES.some((name) => name === value);
}

export type ItemStatus = 'generated' | 'skipped' | 'failed';

export interface ItemOutcome {
  status: ItemStatus;
  /** False for dry-run results and for failures whose fallback was not written. */
  saved: boolean;
  detail?: string;
}

export interface StageItemOptions {
  force: boolean;
  persist: boolean;
  sandbox: boolean;
}

export interface CandidateQuery {
  force: boolean;
  limit: number;
}

export interface StageRunOptions {
  force: boolean;
  dryRun: boolean;
  sandbox: boolean;
  limit: number;
  delaySeconds: number;
}

export interface SummaryLabels {
  succeeded: string;
  failed: string;
  skipped: string;
}

export const DEFAULT_SUMMARY_LABELS: SummaryLabels = {
  succeeded: 'generated',
  failed: 'failed',
  skipped: 'skipped',
};

/**
 * One enrichment stage as seen by the batch runner.
 */
export interface EnrichmentStage<TItem> {
  readonly name: StageName;
  readonly requiredSettings: readonly SettingKey[];
  readonly summaryLabels?: SummaryLabels;
  selectCandidates(query: CandidateQuery): Promise<TItem[]>;
  processOne(item: TItem, options: StageItemOptions): Promise<ItemOutcome>;
  /** Stable identity used in logs and summaries. */
  describe(item: TItem): string;
}

export interface BatchSummary {
  batchId: string;
  stage: StageName;
  dryRun: boolean;
  sandbox: boolean;
  labels: SummaryLabels;
  total: number;
  succeeded: number;
  skipped: number;
  failed: number;
  succeededCodes: string[];
  startedAt: string;
  finishedAt: string;
}

export function outcome(status: ItemStatus, saved: boolean, detail?: string): ItemOutcome {
  return detail === undefined ? { status, saved } : { status, saved, detail };
}
