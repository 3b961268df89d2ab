import { buildSummary } from '../pipeline/testing/build-summary';
import { formatBatchSummary } from './batch-summary.formatter';

describe('formatBatchSummary', () => {
  it('formats a production batch', () => {
    expect(formatBatchSummary(buildSummary())).toBe(
      [
        '<b>Stage:</b> content',
        '<b>Mode:</b> PRODUCTION',
        '<b>Total:</b> 5',
        'generated: 4',
        'skipped: 0',
        'failed: 1',
        '<b>Codes:</b> P1, P2, P4, P5',
        '<i>Batch batch-1</i>',
      ].join('\n'),
    );
  });

  it('labels dry runs and sandbox publishing distinctly', () => {
    const text = formatBatchSummary(
      buildSummary({
        stage: 'publish',
        dryRun: true,
        sandbox: true,
        labels: { succeeded: 'published', failed: 'errors', skipped: 'skipped' },
        succeededCodes: [],
      }),
    );

    expect(text.split('\n').slice(0, 4)).toEqual([
      '<b>DRY RUN</b> - nothing was saved',
      '<b>Stage:</b> publish',
      '<b>Mode:</b> SANDBOX',
      '<b>Total:</b> 5',
    ]);
    expect(text).toContain('published: 4\nskipped: 0\nerrors: 1');
    expect(text).not.toContain('<b>Codes:</b>');
  });

  it('lists at most 20 codes and escapes them', () => {
    const codes = Array.from({ length: 23 }, (_, i) => `C${i + 1}`);
    codes[0] = 'A<B>&C';

    const text = formatBatchSummary(buildSummary({ succeededCodes: codes }));

    const listed = ['A&lt;B&gt;&amp;C', ...codes.slice(1, 20)].join(', ');
    expect(text).toContain(`<b>Codes:</b> ${listed} ...and 3 more`);
  });
});
