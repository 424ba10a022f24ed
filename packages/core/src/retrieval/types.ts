/**
 * Retrieval Types
 *
 * Strategies are plain values with a name and a synchronous `run`. The
 * retriever hands every strategy the same prepared input and reads back a
 * tagged outcome, so a stronger strategy can replace the lexical one without
 * touching the cascade.
 */

import type { KnowledgeBase } from '../knowledge/types';
import type { FieldMapper } from '../mapping/field-mapper';
import type { FieldDescriptor, SourceDocument, StrategyName } from '../types';
import type { Segment } from './segments';

/**
 * A document prepared for strategies: its position in the caller's list and
 * its segments
 */
export interface PreparedDocument {
  index: number;
  document: SourceDocument;
  segments: Segment[];
}

/**
 * Everything a strategy needs about the field being retrieved
 */
export interface StrategyInput {
  field: FieldDescriptor;
  /** Canonical glossary term, or the field name when the term is unknown */
  canonical: string;
  /** Raw name, canonical term, aliases and abbreviations of two or more characters */
  variants: string[];
  category: string;
  kb: KnowledgeBase;
  documents: PreparedDocument[];
}

export type StrategyOutcome =
  | {
      status: 'matched';
      value: string;
      confidence: number;
      reasoning: string;
      documentIndex: number;
    }
  | { status: 'no_match'; reasoning: string }
  | { status: 'skipped'; reasoning: string };

export interface RetrievalStrategy {
  readonly name: StrategyName;
  run(input: StrategyInput): StrategyOutcome;
}

export interface RetrieverOptions {
  /** Rank documents first and run the cascade over the ranked candidates only */
  mapper?: FieldMapper;
  /** Number of ranked candidates kept; tied leaders are always kept */
  topK?: number;
  /** Replaces the default cascade */
  strategies?: readonly RetrievalStrategy[];
  /** Confidence at or above which the cascade stops (default from config) */
  acceptanceThreshold?: number;
}
