/**
 * Retrieval Index
 */

export * from './types';
export { segmentDocument, segmentValue } from './segments';
export type { Segment } from './segments';
export { lexicalSemanticStrategy } from './strategies/lexical-semantic';
export { createEntityStrategy } from './strategies/entity';
export type { EntityStrategyOptions } from './strategies/entity';
export { createDomainRuleStrategy } from './strategies/domain-rule';
export type { DomainRuleStrategyOptions } from './strategies/domain-rule';
export { keywordStrategy } from './strategies/keyword';
export { defaultStrategies, retrieve, retrieveAll, summarizeMatches } from './retriever';
