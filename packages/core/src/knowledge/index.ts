/**
 * Knowledge Registry Index
 */

export * from './types';
export { checkDefinition, createKnowledgeBase } from './knowledge-base';
export {
  normalizeTerm,
  isKnownTerm,
  relatedTerms,
  termVariants,
  categorizeField,
  categoriesAlign,
  domainKeywords,
  expandAbbreviations,
  rulesForField,
  fieldRulesFor,
} from './terms';
export {
  registerDomain,
  getKnowledgeBase,
  hasDomain,
  listDomains,
  clearRegistry,
  getRegistryStats,
} from './registry';
export { loadKnowledgeBase, registerBuiltinDomains } from './loader';
