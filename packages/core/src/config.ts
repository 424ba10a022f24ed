/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables. The
 * thresholds and weights here are defaults; the retriever and field mapper
 * also accept them as explicit parameters.
 */

export interface Config {
  // Logging
  logLevel: string;

  // Knowledge bases
  knowledgeBaseDir: string;

  // Retrieval cascade
  acceptanceThreshold: number;
  domainRulePatternConfidence: number;
  domainRuleLabeledValueConfidence: number;
  domainRuleValidationShapeConfidence: number;
  entityUnlabeledFactor: number;

  // Field mapper
  mapperWeightTokenOverlap: number;
  mapperWeightCategoryMatch: number;
  mapperWeightDomainKeyword: number;
  mapperWeightMetadata: number;
  mapperWeightKnowledgeBase: number;
  mapperTieEpsilon: number;
  mapperDefaultTopK: number;
  mapperMaxDateDistanceDays: number;
}

export const config: Config = {
  // Logging
  logLevel: process.env.LOG_LEVEL || 'info',

  // Knowledge bases
  knowledgeBaseDir: process.env.KNOWLEDGE_BASE_DIR || '',

  // Retrieval cascade
  acceptanceThreshold: parseFloat(process.env.RETRIEVAL_ACCEPTANCE_THRESHOLD || '0.75'),
  domainRulePatternConfidence: parseFloat(process.env.DOMAIN_RULE_PATTERN_CONFIDENCE || '0.85'),
  domainRuleLabeledValueConfidence: parseFloat(
    process.env.DOMAIN_RULE_LABELED_VALUE_CONFIDENCE || '0.8'
  ),
  domainRuleValidationShapeConfidence: parseFloat(
    process.env.DOMAIN_RULE_VALIDATION_SHAPE_CONFIDENCE || '0.7'
  ),
  entityUnlabeledFactor: parseFloat(process.env.ENTITY_UNLABELED_FACTOR || '0.6'),

  // Field mapper
  mapperWeightTokenOverlap: parseFloat(process.env.MAPPER_WEIGHT_TOKEN_OVERLAP || '0.25'),
  mapperWeightCategoryMatch: parseFloat(process.env.MAPPER_WEIGHT_CATEGORY_MATCH || '0.25'),
  mapperWeightDomainKeyword: parseFloat(process.env.MAPPER_WEIGHT_DOMAIN_KEYWORD || '0.25'),
  mapperWeightMetadata: parseFloat(process.env.MAPPER_WEIGHT_METADATA || '0.15'),
  mapperWeightKnowledgeBase: parseFloat(process.env.MAPPER_WEIGHT_KNOWLEDGE_BASE || '0.10'),
  mapperTieEpsilon: parseFloat(process.env.MAPPER_TIE_EPSILON || '0.01'),
  mapperDefaultTopK: parseInt(process.env.MAPPER_DEFAULT_TOP_K || '3', 10),
  mapperMaxDateDistanceDays: parseInt(process.env.MAPPER_MAX_DATE_DISTANCE_DAYS || '365', 10),
};
