/**
 * Field Mapper
 *
 * Ranks candidate documents for a field with a weighted five-factor score:
 *
 *   composite = w1 * token_overlap + w2 * category_match + w3 * domain_keyword
 *             + w4 * metadata + w5 * knowledge_base
 *
 * Every sub-score is in [0, 100] and the composite is clamped to [0, 100].
 * Weights are not normalized, so raising any weight never lowers a score.
 */

import { config } from '../config';
import { InvalidConfigurationError } from '../errors';
import { logger } from '../logger';
import {
  categoriesAlign,
  categorizeField,
  domainKeywords,
  isKnownTerm,
  normalizeTerm,
  relatedTerms,
  termVariants,
} from '../knowledge/terms';
import type { KnowledgeBase } from '../knowledge/types';
import { containsPhrase, jaccard, roundScore, tokenize, tokenSet } from '../text';
import type {
  FieldDescriptor,
  RankedCandidate,
  SourceDocument,
  SourceSelection,
  SubScores,
} from '../types';
import { parseDate } from '../validation/values';

// ============================================================================
// Configuration
// ============================================================================

export type MapperWeights = SubScores;

export interface FieldMapperConfig {
  weights: MapperWeights;
  /** Candidates within this distance of the top score are tied */
  tieEpsilon: number;
  defaultTopK: number;
  /** Date distance at which the date part of the metadata score reaches zero */
  maxDateDistanceDays: number;
}

export interface FieldMapperOverrides {
  weights?: Partial<MapperWeights>;
  tieEpsilon?: number;
  defaultTopK?: number;
  maxDateDistanceDays?: number;
}

export function defaultMapperConfig(): FieldMapperConfig {
  return {
    weights: {
      token_overlap: config.mapperWeightTokenOverlap,
      category_match: config.mapperWeightCategoryMatch,
      domain_keyword: config.mapperWeightDomainKeyword,
      metadata: config.mapperWeightMetadata,
      knowledge_base: config.mapperWeightKnowledgeBase,
    },
    tieEpsilon: config.mapperTieEpsilon,
    defaultTopK: config.mapperDefaultTopK,
    maxDateDistanceDays: config.mapperMaxDateDistanceDays,
  };
}

function checkConfig(mapperConfig: FieldMapperConfig): void {
  for (const [factor, weight] of Object.entries(mapperConfig.weights)) {
    if (!Number.isFinite(weight) || weight < 0) {
      throw new InvalidConfigurationError(`Weight for ${factor} must be a non-negative number, got ${weight}`, `weights.${factor}`);
    }
  }
  if (!Number.isFinite(mapperConfig.tieEpsilon) || mapperConfig.tieEpsilon < 0) {
    throw new InvalidConfigurationError(
      `tieEpsilon must be a non-negative number, got ${mapperConfig.tieEpsilon}`,
      'tieEpsilon'
    );
  }
  checkTopK(mapperConfig.defaultTopK, 'defaultTopK');
  if (!Number.isFinite(mapperConfig.maxDateDistanceDays) || mapperConfig.maxDateDistanceDays <= 0) {
    throw new InvalidConfigurationError(
      `maxDateDistanceDays must be a positive number, got ${mapperConfig.maxDateDistanceDays}`,
      'maxDateDistanceDays'
    );
  }
}

function checkTopK(topK: number, setting: string): void {
  if (!Number.isInteger(topK) || topK < 1) {
    throw new InvalidConfigurationError(`${setting} must be a positive integer, got ${topK}`, setting);
  }
}

// ============================================================================
// Mapper
// ============================================================================

export interface FieldFeatures {
  tokens: string[];
  token_count: number;
  has_numbers: boolean;
  has_special_chars: boolean;
  category: string;
  domain_keywords: string[];
}

export interface DocumentScore {
  score: number;
  sub_scores: SubScores;
}

export interface FieldMapper {
  readonly config: Readonly<FieldMapperConfig>;
  extractFeatures(field: FieldDescriptor | string, kb: KnowledgeBase): FieldFeatures;
  scoreDocument(field: FieldDescriptor | string, document: SourceDocument, kb: KnowledgeBase): DocumentScore;
  rankDocumentsForField(
    field: FieldDescriptor | string,
    documents: readonly SourceDocument[],
    kb: KnowledgeBase,
    topK?: number
  ): RankedCandidate[];
  selectSourceDocument(candidates: readonly RankedCandidate[]): SourceSelection;
  disambiguateField(name: string, candidates: readonly string[]): string | null;
}

const MS_PER_DAY = 24 * 60 * 60 * 1000;

function toDescriptor(field: FieldDescriptor | string): FieldDescriptor {
  return typeof field === 'string' ? { name: field } : field;
}

/** Share of `items` satisfying `present`, scaled to [0, 100]; 0 for an empty list */
function share<T>(items: readonly T[], present: (item: T) => boolean): number {
  if (items.length === 0) return 0;
  return (items.filter(present).length / items.length) * 100;
}

function sharesToken(a: ReadonlySet<string>, text: string | undefined): boolean {
  if (!text) return false;
  for (const token of tokenSet(text)) {
    if (a.has(token)) return true;
  }
  return false;
}

export function createFieldMapper(overrides: FieldMapperOverrides = {}): FieldMapper {
  const defaults = defaultMapperConfig();
  const mapperConfig: FieldMapperConfig = {
    weights: { ...defaults.weights, ...overrides.weights },
    tieEpsilon: overrides.tieEpsilon ?? defaults.tieEpsilon,
    defaultTopK: overrides.defaultTopK ?? defaults.defaultTopK,
    maxDateDistanceDays: overrides.maxDateDistanceDays ?? defaults.maxDateDistanceDays,
  };
  checkConfig(mapperConfig);
  Object.freeze(mapperConfig.weights);
  Object.freeze(mapperConfig);

  function extractFeatures(field: FieldDescriptor | string, kb: KnowledgeBase): FieldFeatures {
    const descriptor = toDescriptor(field);
    const tokens = tokenize(descriptor.name);
    return {
      tokens,
      token_count: tokens.length,
      has_numbers: /\d/.test(descriptor.name),
      has_special_chars: /[^A-Za-z0-9\s]/.test(descriptor.name),
      category: categorizeField(kb, descriptor.name, descriptor.category),
      domain_keywords: domainKeywords(kb, descriptor.name),
    };
  }

  function categoryScore(kb: KnowledgeBase, document: SourceDocument, category: string): number {
    if (document.category) {
      return categoriesAlign(document.category, category) ? 100 : 0;
    }
    const keywords = Object.prototype.hasOwnProperty.call(kb.categories, category) ? kb.categories[category] : [];
    return share(keywords, (keyword) => containsPhrase(document.content, keyword));
  }

  function metadataScore(
    descriptor: FieldDescriptor,
    document: SourceDocument,
    fieldTokens: ReadonlySet<string>,
    category: string
  ): number {
    const typeFit =
      categoriesAlign(document.category, category) ||
      sharesToken(fieldTokens, document.category) ||
      sharesToken(fieldTokens, document.section);

    const sourceFit = descriptor.expected_source
      ? containsPhrase(document.source ?? '', descriptor.expected_source)
      : sharesToken(fieldTokens, document.source) || sharesToken(fieldTokens, document.section);

    let dateFit = 0;
    const documentDate = document.date ? parseDate(document.date) : null;
    if (documentDate) {
      const referenceDate = descriptor.reference_date ? parseDate(descriptor.reference_date) : null;
      if (!descriptor.reference_date) {
        dateFit = 1;
      } else if (referenceDate) {
        const days = Math.abs(documentDate.getTime() - referenceDate.getTime()) / MS_PER_DAY;
        dateFit = Math.max(0, 1 - days / mapperConfig.maxDateDistanceDays);
      }
    }

    return (typeFit ? 50 : 0) + (sourceFit ? 25 : 0) + 25 * dateFit;
  }

  function knowledgeBaseScore(kb: KnowledgeBase, name: string, content: string): number {
    if (!isKnownTerm(kb, name)) return 0;

    const canonical = normalizeTerm(kb, name);
    if (containsPhrase(content, canonical)) return 100;

    const variants = termVariants(kb, canonical).filter((variant) => variant !== canonical);
    if (variants.some((variant) => containsPhrase(content, variant))) return 80;

    for (const related of relatedTerms(kb, canonical)) {
      if (containsPhrase(content, related)) return 50;
    }
    return 0;
  }

  function scoreDocument(field: FieldDescriptor | string, document: SourceDocument, kb: KnowledgeBase): DocumentScore {
    const descriptor = toDescriptor(field);
    const features = extractFeatures(descriptor, kb);
    const fieldTokens = new Set(features.tokens);
    const contentTokens = tokenSet(document.content);

    const sub_scores: SubScores = {
      token_overlap: roundScore(share(features.tokens, (token) => contentTokens.has(token))),
      category_match: roundScore(categoryScore(kb, document, features.category)),
      domain_keyword: roundScore(
        share(features.domain_keywords, (keyword) => containsPhrase(document.content, keyword))
      ),
      metadata: roundScore(metadataScore(descriptor, document, fieldTokens, features.category)),
      knowledge_base: knowledgeBaseScore(kb, descriptor.name, document.content),
    };

    const { weights } = mapperConfig;
    const composite =
      weights.token_overlap * sub_scores.token_overlap +
      weights.category_match * sub_scores.category_match +
      weights.domain_keyword * sub_scores.domain_keyword +
      weights.metadata * sub_scores.metadata +
      weights.knowledge_base * sub_scores.knowledge_base;

    return {
      score: Math.min(100, Math.max(0, roundScore(composite))),
      sub_scores,
    };
  }

  function rankDocumentsForField(
    field: FieldDescriptor | string,
    documents: readonly SourceDocument[],
    kb: KnowledgeBase,
    topK: number = mapperConfig.defaultTopK
  ): RankedCandidate[] {
    checkTopK(topK, 'topK');

    const scored = documents
      .map((document, index) => ({ document, index, ...scoreDocument(field, document, kb) }))
      .filter((entry) => entry.score > 0)
      // Array.prototype.sort is stable: equal scores keep input order
      .sort((a, b) => b.score - a.score);

    if (scored.length === 0) return [];

    const top = scored[0].score;
    const tiedCount = scored.filter((entry) => top - entry.score <= mapperConfig.tieEpsilon).length;

    const ranked = scored
      .map((entry): RankedCandidate => {
        const tied = tiedCount > 1 && top - entry.score <= mapperConfig.tieEpsilon;
        return Object.freeze({
          document_index: entry.index,
          document_id: entry.document.id ?? null,
          score: entry.score,
          sub_scores: Object.freeze(entry.sub_scores),
          tied_for_top: tied,
        });
      })
      .filter((candidate, position) => position < topK || candidate.tied_for_top);

    logger.debug('Ranked documents for field', {
      field: toDescriptor(field).name,
      documents: documents.length,
      candidates: ranked.length,
      tied: tiedCount > 1 ? tiedCount : 0,
    });

    return ranked;
  }

  function selectSourceDocument(candidates: readonly RankedCandidate[]): SourceSelection {
    if (candidates.length === 0) return { kind: 'none' };

    const tied = candidates.filter((candidate) => candidate.tied_for_top);
    if (tied.length > 1) {
      return {
        kind: 'ambiguous',
        candidates: [...tied].sort((a, b) => a.document_index - b.document_index),
      };
    }
    return { kind: 'unique', candidate: candidates[0] };
  }

  function disambiguateField(name: string, candidates: readonly string[]): string | null {
    const target = tokenSet(name);
    let best: { candidate: string; similarity: number } | null = null;

    for (const candidate of candidates) {
      const similarity = jaccard(target, tokenSet(candidate));
      if (similarity > 0 && (best === null || similarity > best.similarity)) {
        best = { candidate, similarity };
      }
    }
    return best === null ? null : best.candidate;
  }

  return {
    config: mapperConfig,
    extractFeatures,
    scoreDocument,
    rankDocumentsForField,
    selectSourceDocument,
    disambiguateField,
  };
}
