/**
 * Field Retriever
 *
 * Runs an ordered cascade of strategies for one field over a list of
 * documents. The first matched outcome at or above the acceptance threshold
 * stops the cascade; otherwise the most confident match wins, earlier
 * strategies first on equal confidence.
 */

import { config } from '../config';
import { getKnowledgeBase } from '../knowledge/registry';
import { categorizeField, normalizeTerm, termVariants } from '../knowledge/terms';
import type { KnowledgeBase } from '../knowledge/types';
import { logger } from '../logger';
import { ambiguousSelectionsCounter, retrievalConfidenceHistogram, retrievalsCounter } from '../metrics';
import { foldTerm, roundScore } from '../text';
import type {
  FieldDescriptor,
  RetrievalMatch,
  RetrievalSummary,
  SourceDocument,
  StrategyAttempt,
  StrategyName,
} from '../types';
import { checkUnitInterval } from './confidence';
import { segmentDocument } from './segments';
import { createDomainRuleStrategy } from './strategies/domain-rule';
import { createEntityStrategy } from './strategies/entity';
import { keywordStrategy } from './strategies/keyword';
import { lexicalSemanticStrategy } from './strategies/lexical-semantic';
import type { PreparedDocument, RetrievalStrategy, RetrieverOptions, StrategyInput } from './types';

/**
 * The default cascade: lexical-semantic, entity, domain-rule, keyword
 */
export function defaultStrategies(): RetrievalStrategy[] {
  return [lexicalSemanticStrategy, createEntityStrategy(), createDomainRuleStrategy(), keywordStrategy];
}

function toDescriptor(field: FieldDescriptor | string): FieldDescriptor {
  return typeof field === 'string' ? { name: field } : field;
}

function prepareDocuments(
  descriptor: FieldDescriptor,
  documents: readonly SourceDocument[],
  kb: KnowledgeBase,
  options: RetrieverOptions
): PreparedDocument[] {
  const all = documents.map((document, index) => ({ index, document }));

  let selected = all;
  if (options.mapper && documents.length > 0) {
    const ranked = options.mapper.rankDocumentsForField(descriptor, documents, kb, options.topK);
    if (ranked.length > 0) {
      selected = ranked.map((candidate) => all[candidate.document_index]);
    }
    if (options.mapper.selectSourceDocument(ranked).kind === 'ambiguous') {
      ambiguousSelectionsCounter.inc({ domain: kb.domain });
    }
  }

  return selected.map(({ index, document }) => ({
    index,
    document,
    segments: segmentDocument(document.content),
  }));
}

/**
 * Retrieve the best value for one field.
 *
 * @throws UnknownDomainError if the domain has no knowledge base
 * @throws InvalidConfigurationError for an acceptance threshold outside [0, 1]
 */
export function retrieve(
  field: FieldDescriptor | string,
  domain: string,
  documents: readonly SourceDocument[],
  options: RetrieverOptions = {}
): RetrievalMatch {
  const kb = getKnowledgeBase(domain);
  const descriptor = toDescriptor(field);
  const threshold = options.acceptanceThreshold ?? config.acceptanceThreshold;
  checkUnitInterval(threshold, 'acceptanceThreshold');

  const canonical = normalizeTerm(kb, descriptor.name);
  const input: StrategyInput = {
    field: descriptor,
    canonical,
    variants: termVariants(kb, descriptor.name).filter((variant) => foldTerm(variant).length >= 2),
    category: categorizeField(kb, descriptor.name, descriptor.category),
    kb,
    documents: prepareDocuments(descriptor, documents, kb, options),
  };

  const strategies = options.strategies ?? defaultStrategies();
  const attempts: StrategyAttempt[] = [];
  const reasons: string[] = [];
  let winner: { strategy: StrategyName; value: string; confidence: number; reasoning: string; documentIndex: number } | null =
    null;

  for (const strategy of strategies) {
    const outcome = strategy.run(input);
    const confidence = outcome.status === 'matched' ? Math.min(1, Math.max(0, outcome.confidence)) : 0;
    attempts.push(Object.freeze({ strategy: strategy.name, status: outcome.status, confidence }));
    reasons.push(`${strategy.name}: ${outcome.reasoning}`);

    if (outcome.status !== 'matched') continue;

    if (winner === null || confidence > winner.confidence) {
      winner = {
        strategy: strategy.name,
        value: outcome.value,
        confidence,
        reasoning: outcome.reasoning,
        documentIndex: outcome.documentIndex,
      };
    }
    if (confidence >= threshold) break;
  }

  Object.freeze(attempts);
  const match: RetrievalMatch =
    winner === null
      ? {
          field_name: descriptor.name,
          canonical_term: canonical,
          value: null,
          confidence: 0,
          strategy: 'keyword',
          reasoning: `No strategy matched (${reasons.join('; ')})`,
          domain: kb.domain,
          source_document: null,
          attempts,
        }
      : {
          field_name: descriptor.name,
          canonical_term: canonical,
          value: winner.value,
          confidence: roundScore(winner.confidence),
          strategy: winner.strategy,
          reasoning: `${winner.strategy} won with confidence ${roundScore(winner.confidence)}: ${winner.reasoning}`,
          domain: kb.domain,
          source_document: Object.freeze({
            index: winner.documentIndex,
            id: documents[winner.documentIndex]?.id ?? null,
          }),
          attempts,
        };

  retrievalsCounter.inc({
    domain: kb.domain,
    strategy: match.strategy,
    outcome: match.value === null ? 'no_match' : 'matched',
  });
  if (match.value !== null) {
    retrievalConfidenceHistogram.observe({ domain: kb.domain, strategy: match.strategy }, match.confidence);
  }

  logger.debug('Field retrieved', {
    field: descriptor.name,
    canonical_term: canonical,
    strategy: match.strategy,
    confidence: match.confidence,
    matched: match.value !== null,
  });

  return Object.freeze(match);
}

/**
 * Retrieve every field, in field order
 */
export function retrieveAll(
  fields: ReadonlyArray<FieldDescriptor | string>,
  domain: string,
  documents: readonly SourceDocument[],
  options: RetrieverOptions = {}
): RetrievalMatch[] {
  return fields.map((field) => retrieve(field, domain, documents, options));
}

/**
 * Aggregate statistics over a set of matches. Strategy counts and mean
 * confidence cover retrieved fields only.
 */
export function summarizeMatches(matches: readonly RetrievalMatch[]): RetrievalSummary {
  const by_strategy: Record<StrategyName, number> = {
    lexical_semantic: 0,
    entity: 0,
    domain_rule: 0,
    keyword: 0,
  };

  const retrieved = matches.filter((match) => match.value !== null);
  for (const match of retrieved) {
    by_strategy[match.strategy] += 1;
  }

  const total = matches.length;
  const confidenceSum = retrieved.reduce((sum, match) => sum + match.confidence, 0);

  return {
    total_fields: total,
    retrieved: retrieved.length,
    retrieval_rate: total === 0 ? 0 : roundScore((retrieved.length / total) * 100),
    by_strategy,
    mean_confidence: retrieved.length === 0 ? 0 : roundScore(confidenceSum / retrieved.length),
  };
}
