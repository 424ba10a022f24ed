/**
 * Domain-Rule Strategy
 *
 * Applies the domain's extraction rules for the canonical term:
 * - pattern rules run over every segment and yield their capture group;
 * - labelled values come from segments whose label is a variant of the term or
 *   one of the rule's extra labels;
 * - regex validation rules for the field double as value shapes, tried only in
 *   segments that name the field.
 * Each kind carries a fixed confidence.
 */

import { config } from '../../config';
import { fieldRulesFor } from '../../knowledge/terms';
import type { RegexRule } from '../../knowledge/types';
import { compilePattern, foldTerm } from '../../text';
import { checkUnitInterval } from '../confidence';
import { labelMatches, mentionsVariant } from '../segments';
import type { RetrievalStrategy, StrategyInput, StrategyOutcome } from '../types';

export interface DomainRuleStrategyOptions {
  patternConfidence?: number;
  labeledValueConfidence?: number;
  validationShapeConfidence?: number;
}

interface Candidate {
  confidence: number;
  value: string;
  reasoning: string;
  documentIndex: number;
}

/**
 * Drop ^ and $ anchors so a full-value shape can be searched for inside text
 */
function unanchored(rule: Readonly<RegexRule>): RegExp {
  const source = rule.pattern.replace(/^\^/, '').replace(/(?<!\\)\$$/, '');
  return compilePattern(`(?<![\\w-])(?:${source})(?![\\w-])`, rule.flags);
}

export function createDomainRuleStrategy(options: DomainRuleStrategyOptions = {}): RetrievalStrategy {
  const patternConfidence = options.patternConfidence ?? config.domainRulePatternConfidence;
  const labeledValueConfidence = options.labeledValueConfidence ?? config.domainRuleLabeledValueConfidence;
  const validationShapeConfidence =
    options.validationShapeConfidence ?? config.domainRuleValidationShapeConfidence;
  checkUnitInterval(patternConfidence, 'patternConfidence');
  checkUnitInterval(labeledValueConfidence, 'labeledValueConfidence');
  checkUnitInterval(validationShapeConfidence, 'validationShapeConfidence');

  return {
    name: 'domain_rule',
    run(input: StrategyInput): StrategyOutcome {
      const rules = input.kb.extractionRules.filter((rule) => rule.term === input.canonical);
      const shapes = fieldRulesFor(input.kb, input.canonical).filter(
        (rule): rule is Readonly<RegexRule> => rule.kind === 'regex'
      );

      const labels = new Set(input.variants.map(foldTerm));
      for (const rule of rules) {
        if (rule.kind === 'label') rule.labels.forEach((label) => labels.add(foldTerm(label)));
      }

      const candidates: Candidate[] = [];

      for (const prepared of input.documents) {
        for (const segment of prepared.segments) {
          for (const rule of rules) {
            if (rule.kind !== 'pattern') continue;
            const found = compilePattern(rule.pattern, rule.flags).exec(segment.text);
            const value = found?.[rule.group ?? 0]?.trim();
            if (value) {
              candidates.push({
                confidence: patternConfidence,
                value,
                reasoning: `extraction rule ${rule.name} matched`,
                documentIndex: prepared.index,
              });
            }
          }

          if (segment.value && labelMatches(segment, labels)) {
            candidates.push({
              confidence: labeledValueConfidence,
              value: segment.value,
              reasoning: `labelled value under "${segment.label}"`,
              documentIndex: prepared.index,
            });
          }

          if (shapes.length > 0 && mentionsVariant(segment, input.variants)) {
            const target = segment.value ?? segment.text;
            for (const shape of shapes) {
              const found = unanchored(shape).exec(target);
              if (found && found[0].trim()) {
                candidates.push({
                  confidence: validationShapeConfidence,
                  value: found[0].trim(),
                  reasoning: `value shape of rule ${shape.name}`,
                  documentIndex: prepared.index,
                });
              }
            }
          }
        }
      }

      // Earliest candidate wins among equal confidences
      const winner = candidates.reduce<Candidate | null>(
        (best, candidate) => (best === null || candidate.confidence > best.confidence ? candidate : best),
        null
      );
      if (winner === null) {
        return { status: 'no_match', reasoning: `no extraction rule or labelled value for "${input.canonical}"` };
      }

      return {
        status: 'matched',
        value: winner.value,
        confidence: winner.confidence,
        reasoning: winner.reasoning,
        documentIndex: winner.documentIndex,
      };
    },
  };
}
