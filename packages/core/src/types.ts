/**
 * Shared TypeScript Types
 *
 * Data model for field retrieval, document ranking and validation, matching
 * the JSON schemas in docs/contracts/
 */

// ============================================================================
// Domains
// ============================================================================

/** Domains shipped with a knowledge base. Others can be registered at startup. */
export type BuiltinDomain = 'real_estate' | 'medical' | 'insurance' | 'finance' | 'legal';

export const BUILTIN_DOMAINS: readonly BuiltinDomain[] = [
  'real_estate',
  'medical',
  'insurance',
  'finance',
  'legal',
];

// ============================================================================
// Inputs
// ============================================================================

export interface SourceDocument {
  id?: string;
  content: string;
  /** Document category, e.g. "deed" or "insurance_policy" */
  category?: string;
  /** Document date in any accepted date format */
  date?: string;
  /** Source identifier or type, e.g. "county_recorder" */
  source?: string;
  /** Section of a larger document the content was taken from */
  section?: string;
}

export interface FieldDescriptor {
  name: string;
  /** Expected category, e.g. "party" or "financial" */
  category?: string;
  /** Free-text hint appended to the field name for keyword scoring */
  context?: string;
  /** Date the field value should be close to, used by metadata scoring */
  reference_date?: string;
  /** Source type the value is expected to come from */
  expected_source?: string;
}

// ============================================================================
// Retrieval
// ============================================================================

export type StrategyName = 'lexical_semantic' | 'entity' | 'domain_rule' | 'keyword';

export type AttemptStatus = 'matched' | 'no_match' | 'skipped';

export interface StrategyAttempt {
  strategy: StrategyName;
  status: AttemptStatus;
  confidence: number;
}

export interface DocumentReference {
  index: number;
  id: string | null;
}

export interface RetrievalMatch {
  field_name: string;
  canonical_term: string;
  value: string | null;
  /** Confidence in [0, 1] */
  confidence: number;
  strategy: StrategyName;
  reasoning: string;
  domain: string;
  source_document: DocumentReference | null;
  attempts: StrategyAttempt[];
}

export interface RetrievalSummary {
  total_fields: number;
  retrieved: number;
  /** Share of fields with a non-null value, 0-100 */
  retrieval_rate: number;
  by_strategy: Record<StrategyName, number>;
  mean_confidence: number;
}

// ============================================================================
// Ranking
// ============================================================================

export interface SubScores {
  token_overlap: number;
  category_match: number;
  domain_keyword: number;
  metadata: number;
  knowledge_base: number;
}

export interface RankedCandidate {
  document_index: number;
  document_id: string | null;
  /** Composite score in [0, 100] */
  score: number;
  sub_scores: SubScores;
  tied_for_top: boolean;
}

export type SourceSelection =
  | { kind: 'unique'; candidate: RankedCandidate }
  | { kind: 'ambiguous'; candidates: RankedCandidate[] }
  | { kind: 'none' };

// ============================================================================
// Validation
// ============================================================================

export type Severity = 'CRITICAL' | 'WARNING' | 'INFO' | 'OPTIONAL';

export type ValidationStage = 'field' | 'cross_field' | 'compliance';

export type FieldValidationState =
  | 'UNVALIDATED'
  | 'FIELD_VALID'
  | 'FIELD_INVALID'
  | 'CROSS_VALID'
  | 'CROSS_INVALID';

export interface ValidationResult {
  field_name: string;
  is_valid: boolean;
  severity: Severity;
  message: string;
  rule_name: string;
  rule_kind: string;
  stage: ValidationStage;
  timestamp: string;
}

export type ComplianceStatus = 'COMPLIANT' | 'NON_COMPLIANT';

export interface ComplianceReport {
  domain: string;
  status: ComplianceStatus;
  results: ValidationResult[];
  critical_failures: number;
  warnings: number;
  field_states: Record<string, FieldValidationState>;
}

/** Field values of one form, keyed by field name as supplied */
export type FormValues = Record<string, string | null | undefined>;

// ============================================================================
// Form processing (core boundary)
// ============================================================================

export interface FormProcessingRequest {
  field_descriptors: FieldDescriptor[];
  domain: string;
  documents: SourceDocument[];
}

export interface FormProcessingResult {
  request_id: string;
  domain: string;
  matches: RetrievalMatch[];
  validations: ValidationResult[];
  compliance: ComplianceReport;
  summary: RetrievalSummary;
}
