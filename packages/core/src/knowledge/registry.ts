/**
 * Knowledge Base Registry
 *
 * Registry pattern for domain knowledge bases. Domains are registered once at
 * startup and only read afterwards.
 */

import { UnknownDomainError } from '../errors';
import { logger } from '../logger';
import type { KnowledgeBase } from './types';

/**
 * Map of domain identifiers to their knowledge bases
 */
const knowledgeBaseRegistry = new Map<string, KnowledgeBase>();

function domainKey(domain: string): string {
  return domain.trim().toLowerCase();
}

/**
 * Register a knowledge base for a domain.
 * Overwrites any existing knowledge base for that domain.
 *
 * @param domain - Domain identifier, matched case-insensitively
 * @param knowledgeBase - Knowledge base built with createKnowledgeBase
 */
export function registerDomain(domain: string, knowledgeBase: KnowledgeBase): void {
  knowledgeBaseRegistry.set(domainKey(domain), knowledgeBase);

  logger.debug('Registered knowledge base', {
    domain: domainKey(domain),
    glossary_terms: Object.keys(knowledgeBase.glossary).length,
    validation_rules: knowledgeBase.validationRules.length,
  });
}

/**
 * Get the knowledge base for a domain.
 *
 * @throws UnknownDomainError if no knowledge base is registered for that domain
 */
export function getKnowledgeBase(domain: string): KnowledgeBase {
  const knowledgeBase = knowledgeBaseRegistry.get(domainKey(domain));
  if (!knowledgeBase) {
    throw new UnknownDomainError(domain, listDomains());
  }
  return knowledgeBase;
}

/**
 * Check if a knowledge base is registered for a domain.
 */
export function hasDomain(domain: string): boolean {
  return knowledgeBaseRegistry.has(domainKey(domain));
}

/**
 * Get all registered domains, in registration order.
 */
export function listDomains(): string[] {
  return Array.from(knowledgeBaseRegistry.keys());
}

/**
 * Clear all registered knowledge bases.
 * Useful for testing.
 */
export function clearRegistry(): void {
  knowledgeBaseRegistry.clear();
}

/**
 * Get registry statistics
 */
export function getRegistryStats(): {
  totalDomains: number;
  byDomain: Record<
    string,
    { terms: number; aliases: number; abbreviations: number; relationships: number; rules: number }
  >;
} {
  const byDomain: ReturnType<typeof getRegistryStats>['byDomain'] = {};

  for (const [domain, kb] of knowledgeBaseRegistry) {
    byDomain[domain] = {
      terms: Object.keys(kb.glossary).length,
      aliases: Object.keys(kb.aliases).length,
      abbreviations: Object.keys(kb.abbreviations).length,
      relationships: kb.relationships.length,
      rules: kb.validationRules.length,
    };
  }

  return {
    totalDomains: knowledgeBaseRegistry.size,
    byDomain,
  };
}
