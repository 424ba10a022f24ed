/**
 * Knowledge Base Types
 *
 * A knowledge base is data: glossary, term tables, relationships, patterns and
 * declarative validation rules for one domain. The definition shape matches
 * docs/contracts/knowledge_base.schema.json; `KnowledgeBase` is the frozen,
 * indexed record built from it.
 */

import type { Severity } from '../types';

// ============================================================================
// Glossary & Terms
// ============================================================================

export interface GlossaryEntry {
  definition: string;
  category: string;
  examples?: string[];
}

export type RelationKind = 'related' | 'counterpart' | 'component' | 'depends_on';

export interface TermRelationship {
  from: string;
  to: string;
  kind: RelationKind;
}

// ============================================================================
// Retrieval Data
// ============================================================================

export type EntityType = 'address' | 'person_name' | 'date' | 'money' | 'identifier' | 'phone' | 'code';

/**
 * Structural pattern used by the entity strategy. Specificity in [0, 1]:
 * tighter patterns carry higher specificity.
 */
export interface EntityPattern {
  name: string;
  entity_type: EntityType;
  pattern: string;
  flags?: string;
  specificity: number;
  /** Field categories for which this pattern is attempted */
  categories: string[];
  /** Field-name keywords for which this pattern is attempted */
  keywords: string[];
}

export interface LabelExtractionRule {
  name: string;
  kind: 'label';
  term: string;
  /** Extra labels, beyond aliases and abbreviations, that introduce the term's value */
  labels: string[];
}

export interface PatternExtractionRule {
  name: string;
  kind: 'pattern';
  term: string;
  pattern: string;
  flags?: string;
  /** Capture group holding the value; 0 for the whole match */
  group?: number;
}

export type ExtractionRule = LabelExtractionRule | PatternExtractionRule;

// ============================================================================
// Validation Rules
// ============================================================================

export type RuleKind = 'regex' | 'range' | 'date_format' | 'cross_field' | 'compliance';

interface RuleBase {
  name: string;
  /** Severity reported on failure. Field and cross-field rules default to CRITICAL. */
  severity?: Severity;
  message?: string;
}

export interface RegexRule extends RuleBase {
  kind: 'regex';
  field: string;
  pattern: string;
  flags?: string;
}

export interface RangeRule extends RuleBase {
  kind: 'range';
  field: string;
  min?: number;
  max?: number;
}

export interface DateFormatRule extends RuleBase {
  kind: 'date_format';
  field: string;
  formats: string[];
}

export type CrossFieldRelation =
  | 'less_than'
  | 'less_than_or_equal'
  | 'date_before'
  | 'date_on_or_before'
  | 'requires'
  | 'difference_equals'
  | 'ratio_at_most';

export interface CrossFieldRule extends RuleBase {
  kind: 'cross_field';
  relation: CrossFieldRelation;
  fields: string[];
  /** Fields whose absence is a failure rather than an INFO skip */
  mandatory?: string[];
  /** Allowed absolute error for difference_equals */
  tolerance?: number;
  /** Upper bound for ratio_at_most */
  max?: number;
  /** Accepted date formats for the date relations */
  formats?: string[];
}

export type CompliancePredicate = 'required_fields' | 'at_least_one_of' | 'disallowed_pattern';

export interface ComplianceRule extends RuleBase {
  kind: 'compliance';
  predicate: CompliancePredicate;
  severity: Severity;
  /** Fields the predicate covers; for disallowed_pattern, omitted means every field */
  fields?: string[];
  pattern?: string;
  flags?: string;
}

export type FieldRule = RegexRule | RangeRule | DateFormatRule;

export type ValidationRule = FieldRule | CrossFieldRule | ComplianceRule;

// ============================================================================
// Knowledge Base
// ============================================================================

/**
 * Knowledge base as written in a JSON definition file
 */
export interface KnowledgeBaseDefinition {
  domain: string;
  description?: string;
  glossary: Record<string, GlossaryEntry>;
  abbreviations: Record<string, string>;
  aliases: Record<string, string>;
  relationships: TermRelationship[];
  categories: Record<string, string[]>;
  entity_patterns: EntityPattern[];
  extraction_rules: ExtractionRule[];
  validation_rules: ValidationRule[];
}

/**
 * Lookup tables derived from a definition. All keys are folded terms.
 */
export interface TermIndex {
  readonly canonicalByFolded: ReadonlyMap<string, string>;
  readonly abbreviationByFolded: ReadonlyMap<string, string>;
  readonly aliasByFolded: ReadonlyMap<string, string>;
  /** Aliases and abbreviations of each canonical term, in definition order */
  readonly variantsByCanonical: ReadonlyMap<string, readonly string[]>;
  /** Terms linked to each term through a relationship, either direction */
  readonly relatedByTerm: ReadonlyMap<string, readonly string[]>;
}

export interface KnowledgeBase {
  readonly domain: string;
  readonly description: string;
  readonly glossary: Readonly<Record<string, Readonly<GlossaryEntry>>>;
  readonly abbreviations: Readonly<Record<string, string>>;
  readonly aliases: Readonly<Record<string, string>>;
  readonly relationships: readonly Readonly<TermRelationship>[];
  readonly categories: Readonly<Record<string, readonly string[]>>;
  readonly entityPatterns: readonly Readonly<EntityPattern>[];
  readonly extractionRules: readonly Readonly<ExtractionRule>[];
  readonly validationRules: readonly Readonly<ValidationRule>[];
  readonly index: TermIndex;
}
