/**
 * Built-in Knowledge Bases
 *
 * Loads the domain definitions shipped in packages/core/knowledge/, checks
 * them against the knowledge-base contract and registers them.
 */

import fs from 'fs';
import path from 'path';
import { config } from '../config';
import { KnowledgeBaseConfigError } from '../errors';
import { logger } from '../logger';
import { validateKnowledgeBaseDefinition } from '../schemas';
import { BUILTIN_DOMAINS } from '../types';
import { createKnowledgeBase } from './knowledge-base';
import { registerDomain } from './registry';
import type { KnowledgeBase } from './types';

function resolveKnowledgeFile(domain: string): string {
  const fileName = `${domain}.json`;
  const possiblePaths = [
    // Explicit override
    ...(config.knowledgeBaseDir ? [path.join(config.knowledgeBaseDir, fileName)] : []),
    // Relative to core package sources
    path.join(__dirname, '../../knowledge', fileName),
    // Relative to core package dist
    path.join(__dirname, '../../../../../packages/core/knowledge', fileName),
    // Relative to project root
    path.join(process.cwd(), 'packages/core/knowledge', fileName),
  ];

  const found = possiblePaths.find((candidate) => fs.existsSync(candidate));
  if (!found) {
    throw new KnowledgeBaseConfigError('Knowledge base file not found', domain, possiblePaths);
  }
  return found;
}

/**
 * Read, validate and build the knowledge base for one built-in domain
 */
export function loadKnowledgeBase(domain: string): KnowledgeBase {
  const filePath = resolveKnowledgeFile(domain);
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));

  const check = validateKnowledgeBaseDefinition(raw);
  if (!check.valid) {
    throw new KnowledgeBaseConfigError('Knowledge base file does not match its schema', domain, check.errors);
  }

  return createKnowledgeBase(check.data);
}

/**
 * Register every built-in domain.
 * Safe to call more than once; later calls re-register the same definitions.
 */
export function registerBuiltinDomains(): void {
  for (const domain of BUILTIN_DOMAINS) {
    registerDomain(domain, loadKnowledgeBase(domain));
  }

  logger.info('Built-in knowledge bases registered', {
    domains: BUILTIN_DOMAINS.length,
  });
}
