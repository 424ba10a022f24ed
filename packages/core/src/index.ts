/**
 * Core Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  createRequestContext,
  asyncLocalStorage,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config } from './config';

// Errors
export {
  UnknownDomainError,
  KnowledgeBaseConfigError,
  InvalidConfigurationError,
  RequestValidationError,
} from './errors';

// Types
export * from './types';

// Text utilities
export { foldTerm, tokenize, jaccard, cosineSimilarity, ngramVector, roundScore } from './text';

// Knowledge registry
export * from './knowledge';

// Retrieval
export * from './retrieval';

// Field mapper
export {
  createFieldMapper,
  defaultMapperConfig,
  type FieldMapper,
  type FieldMapperConfig,
  type FieldMapperOverrides,
  type FieldFeatures,
  type DocumentScore,
  type MapperWeights,
} from './mapping/field-mapper';

// Validation
export * from './validation';

// Pipeline
export { processForm, formValuesFromMatches, type ProcessFormOptions } from './pipeline/process-form';

// Schemas
export { validateKnowledgeBaseDefinition, validateFormRequest, type SchemaCheck } from './schemas';

// Metrics
export {
  register,
  retrievalsCounter,
  retrievalConfidenceHistogram,
  ambiguousSelectionsCounter,
  validationResultsCounter,
  complianceReportsCounter,
  formDurationHistogram,
  getMetrics,
  getMetricsContentType,
} from './metrics';
