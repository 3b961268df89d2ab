import { CandidateRejectedError } from '../common/errors';

export const MAX_TITLE_LENGTH = 60;

/**
 * Terms the marketplace does not allow in listing titles. Matched case-insensitively as whole
 * words, plural forms included; a word that merely contains a term is left alone.
 */
export const FORBIDDEN_TITLE_TERMS: readonly string[] = [
  'envío gratis',
  'envio gratis',
  'free shipping',
  'reacondicionado',
  'refurbished',
  'brand new',
  'promoción',
  'promocion',
  'descuento',
  'garantía',
  'garantia',
  'oferta',
  'nuevo',
  'nueva',
  'usado',
  'usada',
];

const escapeRegExp = (text: string) => text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const FORBIDDEN_PATTERN = new RegExp(
  `(?<![\\p{L}\\p{N}])(?:${FORBIDDEN_TITLE_TERMS.map(escapeRegExp).join('|')})(?:e?s)?(?![\\p{L}\\p{N}])`,
  'giu',
);

export class TitlePolicy {
  constructor(private readonly maxLength = MAX_TITLE_LENGTH) {}

  /**
   * Returns the accepted form of a generated title.
   * Throws CandidateRejectedError when nothing usable remains.
   */
  apply(raw: string): string {
    const title = this.clean(raw);
    if (!title) {
      throw new CandidateRejectedError('Generated title is empty after applying title rules', { raw });
    }
    return title;
  }

  /** Title derived from the supplier description, used when generation fails. */
  fallback(description: string): string {
    return this.clean(description);
  }

  private clean(raw: string): string {
    let text = raw.replace(/\s+/g, ' ');
    // Removing one term can bring the words of a multi-word term together.
    for (let previous = ''; previous !== text; ) {
      previous = text;
      text = text.replace(FORBIDDEN_PATTERN, '').replace(/\s+/g, ' ');
    }
    text = trimSeparators(text);
    return this.truncate(text);
  }

  private truncate(text: string): string {
    if (text.length <= this.maxLength) return text;
    const window = text.slice(0, this.maxLength + 1);
    const lastSpace = window.lastIndexOf(' ');
    const cut = lastSpace > 0 ? text.slice(0, lastSpace) : text.slice(0, this.maxLength);
    return trimSeparators(cut);
  }
}

function trimSeparators(text: string): string {
  return text.replace(/^[\s\-|,;:/]+|[\s\-|,;:/]+$/g, '');
}
