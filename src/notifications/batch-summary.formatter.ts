import { BatchSummary } from '../pipeline/pipeline.types';

const MAX_LISTED_CODES = 20;

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/** Telegram HTML message for one finished batch. */
export function formatBatchSummary(summary: BatchSummary): string {
  const { labels } = summary;
  const lines: string[] = [];
  if (summary.dryRun) {
    lines.push('<b>DRY RUN</b> - nothing was saved');
  }
  lines.push(
    `<b>Stage:</b> ${escapeHtml(summary.stage)}`,
    `<b>Mode:</b> ${summary.sandbox ? 'SANDBOX' : 'PRODUCTION'}`,
    `<b>Total:</b> ${summary.total}`,
    `${labels.succeeded}: ${summary.succeeded}`,
    `${labels.skipped}: ${summary.skipped}`,
    `${labels.failed}: ${summary.failed}`,
  );

  const codes = summary.succeededCodes;
  if (codes.length > 0) {
    const listed = codes.slice(0, MAX_LISTED_CODES).map(escapeHtml).join(', ');
    const remaining = codes.length - MAX_LISTED_CODES;
    lines.push(`<b>Codes:</b> ${listed}${remaining > 0 ? ` ...and ${remaining} more` : ''}`);
  }
  lines.push(`<i>Batch ${escapeHtml(summary.batchId)}</i>`);
  return lines.join('\n');
}
