/**
 * Entity Strategy
 *
 * Scans segments with the domain's structural patterns (addresses, amounts,
 * dates, identifiers). Only patterns whose categories or keywords fit the
 * field are tried. A span found outside a segment that names the field is
 * scaled down.
 */

import { config } from '../../config';
import type { EntityPattern } from '../../knowledge/types';
import { compilePattern, containsPhrase, foldTerm, roundScore } from '../../text';
import { checkUnitInterval } from '../confidence';
import { labelMatches, mentionsVariant } from '../segments';
import type { RetrievalStrategy, StrategyInput, StrategyOutcome } from '../types';

export interface EntityStrategyOptions {
  /** Factor applied when the span is not in a segment naming the field */
  unlabeledFactor?: number;
}

function applicablePatterns(input: StrategyInput): Readonly<EntityPattern>[] {
  return input.kb.entityPatterns
    .filter(
      (pattern) =>
        pattern.categories.includes(input.category) ||
        pattern.keywords.some((keyword) => containsPhrase(input.field.name, keyword))
    )
    .sort((a, b) => b.specificity - a.specificity);
}

export function createEntityStrategy(options: EntityStrategyOptions = {}): RetrievalStrategy {
  const unlabeledFactor = options.unlabeledFactor ?? config.entityUnlabeledFactor;
  checkUnitInterval(unlabeledFactor, 'unlabeledFactor');

  return {
    name: 'entity',
    run(input: StrategyInput): StrategyOutcome {
      const patterns = applicablePatterns(input);
      if (patterns.length === 0) {
        return { status: 'skipped', reasoning: `no entity pattern applies to category "${input.category}"` };
      }

      const foldedVariants = new Set(input.variants.map(foldTerm));
      let best: { confidence: number; value: string; pattern: string; labeled: boolean; documentIndex: number } | null =
        null;

      for (const prepared of input.documents) {
        for (const segment of prepared.segments) {
          const labeled = segment.label !== null ? labelMatches(segment, foldedVariants) : mentionsVariant(segment, input.variants);
          const target = segment.value ?? segment.text;

          for (const pattern of patterns) {
            const found = compilePattern(pattern.pattern, pattern.flags).exec(target);
            if (!found || !found[0].trim()) continue;

            const confidence = pattern.specificity * (labeled ? 1 : unlabeledFactor);
            if (best === null || confidence > best.confidence) {
              best = {
                confidence,
                value: found[0].trim(),
                pattern: pattern.name,
                labeled,
                documentIndex: prepared.index,
              };
            }
          }
        }
      }

      if (best === null) {
        return { status: 'no_match', reasoning: `no span matched ${patterns.map((p) => p.name).join(', ')}` };
      }

      const confidence = roundScore(best.confidence);
      return {
        status: 'matched',
        value: best.value,
        confidence,
        reasoning: `pattern ${best.pattern} matched ${best.labeled ? 'in a segment naming the field' : 'without a field label'}`,
        documentIndex: best.documentIndex,
      };
    },
  };
}
