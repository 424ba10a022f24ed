/**
 * Lexical-Semantic Strategy
 *
 * Compares the field's variants with segment labels (or whole sentences when a
 * segment has no label) as bags of stemmed unigrams and bigrams. Confidence is
 * the best cosine similarity found.
 */

import { cosineSimilarity, ngramVector, roundScore } from '../../text';
import { segmentValue } from '../segments';
import type { RetrievalStrategy, StrategyInput, StrategyOutcome } from '../types';

interface Best {
  score: number;
  variant: string;
  compared: string;
  value: string;
  documentIndex: number;
}

function run(input: StrategyInput): StrategyOutcome {
  const variantVectors = input.variants.map((variant) => ({ variant, vector: ngramVector(variant) }));
  let best: Best | null = null;

  for (const prepared of input.documents) {
    for (const segment of prepared.segments) {
      const compared = segment.label ?? segment.text;
      const segmentVector = ngramVector(compared);

      for (const { variant, vector } of variantVectors) {
        const score = cosineSimilarity(vector, segmentVector);
        if (score > 0 && (best === null || score > best.score)) {
          best = {
            score,
            variant,
            compared,
            value: segmentValue(segment, variant),
            documentIndex: prepared.index,
          };
        }
      }
    }
  }

  if (best === null) {
    return { status: 'no_match', reasoning: 'no segment shares a term with the field' };
  }

  const confidence = roundScore(best.score);
  return {
    status: 'matched',
    value: best.value,
    confidence,
    reasoning: `similarity ${confidence} between "${best.variant}" and "${best.compared}"`,
    documentIndex: best.documentIndex,
  };
}

export const lexicalSemanticStrategy: RetrievalStrategy = {
  name: 'lexical_semantic',
  run,
};
