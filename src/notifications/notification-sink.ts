import { BatchSummary } from '../pipeline/pipeline.types';

export abstract class NotificationSink {
  /** Best effort. Resolves false when the summary was not delivered; never rejects. */
  abstract send(summary: BatchSummary): Promise<boolean>;
}
