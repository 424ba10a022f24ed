/**
 * Document Segmentation
 *
 * Splits document text into labelled lines ("Policy Number: POL123456") and
 * sentences. Every strategy works on the same segments.
 */

import { containsPhrase, escapeRegExp, foldTerm } from '../text';

export interface Segment {
  text: string;
  /** Text before the colon of a "Label: value" line */
  label: string | null;
  /** Text after the colon of a "Label: value" line */
  value: string | null;
  /** 1.0 for the first segment of a document, falling to 0.5 for the last */
  positionWeight: number;
}

const LABELED_LINE = /^([A-Za-z][A-Za-z0-9 ()/#._'&-]{0,80}?)\s*:\s*(.+)$/;
const SENTENCE_BREAK = /(?<=[.!?;])\s+/;
const LEADING_CONNECTORS = /^(?:\s*(?:[:=-]|(?:is|was|are|were|of|shall be|will be|reads)\b))+\s*/i;
const TRAILING_PUNCTUATION = /[\s.;,]+$/;

/**
 * Segment document content. Empty lines are dropped.
 */
export function segmentDocument(content: string): Segment[] {
  const pieces: Array<{ text: string; label: string | null; value: string | null }> = [];

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    const labeled = line.match(LABELED_LINE);
    if (labeled) {
      pieces.push({ text: line, label: labeled[1].trim(), value: labeled[2].trim() });
      continue;
    }

    for (const sentence of line.split(SENTENCE_BREAK)) {
      const text = sentence.trim();
      if (text) pieces.push({ text, label: null, value: null });
    }
  }

  const last = Math.max(1, pieces.length - 1);
  return pieces.map((piece, i) => ({
    ...piece,
    positionWeight: pieces.length === 1 ? 1 : 1 - 0.5 * (i / last),
  }));
}

/**
 * Whether the segment's label is one of the given variants
 */
export function labelMatches(segment: Segment, foldedVariants: ReadonlySet<string>): boolean {
  return segment.label !== null && foldedVariants.has(foldTerm(segment.label));
}

/**
 * Whether the segment names one of the variants, in its label or its text
 */
export function mentionsVariant(segment: Segment, variants: readonly string[]): boolean {
  return variants.some((variant) => containsPhrase(segment.label ?? segment.text, variant));
}

/**
 * Value carried by a segment for a variant: the labelled value, or the text
 * after the variant phrase in a sentence with leading connectors removed.
 * Falls back to the whole sentence.
 */
export function segmentValue(segment: Segment, variant?: string): string {
  if (segment.value !== null) return segment.value;
  if (!variant) return segment.text;

  const folded = foldTerm(variant);
  if (!folded) return segment.text;

  const words = folded.split(' ');
  const phrase = new RegExp(`(?<![\\p{L}\\p{N}])${words.map(escapeRegExp).join('[^\\p{L}\\p{N}]+')}(?![\\p{L}\\p{N}])`, 'iu');
  const found = phrase.exec(segment.text);
  if (!found) return segment.text;

  const rest = segment.text
    .slice(found.index + found[0].length)
    .replace(LEADING_CONNECTORS, '')
    .replace(TRAILING_PUNCTUATION, '');
  return rest || segment.text;
}
