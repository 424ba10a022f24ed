/**
 * Keyword Strategy
 *
 * Last resort of the cascade: Jaccard overlap between the field's tokens and
 * each segment's tokens, weighted by the segment's position in its document
 * and by whether the document category fits the field.
 */

import { categoriesAlign } from '../../knowledge/terms';
import { containsPhrase, jaccard, roundScore, tokenSet } from '../../text';
import { segmentValue } from '../segments';
import type { RetrievalStrategy, StrategyInput, StrategyOutcome } from '../types';

const ALIGNED_CATEGORY_WEIGHT = 1.0;
const OTHER_CATEGORY_WEIGHT = 0.9;

function run(input: StrategyInput): StrategyOutcome {
  const fieldTokens = tokenSet([input.field.name, input.field.context ?? '', input.canonical].join(' '));
  if (fieldTokens.size === 0) {
    return { status: 'no_match', reasoning: 'field name has no searchable tokens' };
  }

  let best: { confidence: number; value: string; overlap: string[]; documentIndex: number } | null = null;

  for (const prepared of input.documents) {
    const categoryWeight = categoriesAlign(prepared.document.category, input.category)
      ? ALIGNED_CATEGORY_WEIGHT
      : OTHER_CATEGORY_WEIGHT;

    for (const segment of prepared.segments) {
      const segmentTokens = tokenSet(segment.text);
      const similarity = jaccard(fieldTokens, segmentTokens);
      if (similarity === 0) continue;

      const confidence = Math.min(1, similarity * segment.positionWeight * categoryWeight);
      if (best === null || confidence > best.confidence) {
        const variant = input.variants.find((v) => containsPhrase(segment.text, v));
        best = {
          confidence,
          value: segmentValue(segment, variant),
          overlap: [...fieldTokens].filter((token) => segmentTokens.has(token)),
          documentIndex: prepared.index,
        };
      }
    }
  }

  if (best === null) {
    return { status: 'no_match', reasoning: 'no segment shares a token with the field' };
  }

  const confidence = roundScore(best.confidence);
  return {
    status: 'matched',
    value: best.value,
    confidence,
    reasoning: `keyword overlap {${best.overlap.join(', ')}} scored ${confidence}`,
    documentIndex: best.documentIndex,
  };
}

export const keywordStrategy: RetrievalStrategy = {
  name: 'keyword',
  run,
};
