/**
 * Knowledge Base Construction
 *
 * Turns a definition into an immutable, indexed record. Every invariant the
 * lookup functions rely on is checked here; a definition that breaks one is a
 * configuration error and is rejected as a whole.
 */

import { KnowledgeBaseConfigError } from '../errors';
import { compilePattern, foldTerm } from '../text';
import { isValidDateFormat } from '../validation/values';
import type {
  KnowledgeBase,
  KnowledgeBaseDefinition,
  TermIndex,
  ValidationRule,
} from './types';

const CROSS_FIELD_ARITY: Record<string, { min: number; max: number }> = {
  less_than: { min: 2, max: 2 },
  less_than_or_equal: { min: 2, max: 2 },
  date_before: { min: 2, max: 2 },
  date_on_or_before: { min: 2, max: 2 },
  requires: { min: 2, max: Number.POSITIVE_INFINITY },
  difference_equals: { min: 3, max: 3 },
  ratio_at_most: { min: 2, max: 2 },
};

function checkPattern(pattern: string, flags: string | undefined, where: string, problems: string[]): void {
  try {
    compilePattern(pattern, flags);
  } catch (error) {
    problems.push(`${where}: invalid pattern (${error instanceof Error ? error.message : String(error)})`);
  }
}

/**
 * Check one term table (aliases or abbreviations) against the glossary
 */
function checkTermTable(
  table: Record<string, string>,
  tableName: string,
  glossary: Record<string, unknown>,
  glossaryByFolded: Map<string, string>,
  seen: Map<string, { target: string; table: string }>,
  problems: string[]
): void {
  for (const [form, target] of Object.entries(table)) {
    const folded = foldTerm(form);

    if (!folded) {
      problems.push(`${tableName} "${form}" is empty after normalization`);
      continue;
    }
    if (!Object.prototype.hasOwnProperty.call(glossary, target)) {
      problems.push(`${tableName} "${form}" targets "${target}", which is not a glossary term`);
      continue;
    }

    const shadowed = glossaryByFolded.get(folded);
    if (shadowed !== undefined && shadowed !== target) {
      problems.push(`${tableName} "${form}" resolves to "${target}" but names glossary term "${shadowed}"`);
    }

    const previous = seen.get(folded);
    if (previous && previous.target !== target) {
      problems.push(
        `${tableName} "${form}" resolves to "${target}" but ${previous.table} entry resolves it to "${previous.target}"`
      );
    }
    seen.set(folded, { target, table: tableName });
  }
}

function checkValidationRule(rule: ValidationRule, problems: string[]): void {
  const where = `validation rule "${rule.name}"`;

  switch (rule.kind) {
    case 'regex':
      checkPattern(rule.pattern, rule.flags, where, problems);
      break;

    case 'range':
      if (rule.min === undefined && rule.max === undefined) {
        problems.push(`${where}: range needs min or max`);
      }
      if (rule.min !== undefined && rule.max !== undefined && rule.min > rule.max) {
        problems.push(`${where}: min ${rule.min} exceeds max ${rule.max}`);
      }
      break;

    case 'date_format':
      if (rule.formats.length === 0) {
        problems.push(`${where}: no accepted date formats`);
      }
      for (const format of rule.formats) {
        if (!isValidDateFormat(format)) problems.push(`${where}: invalid date format "${format}"`);
      }
      break;

    case 'cross_field': {
      const arity = CROSS_FIELD_ARITY[rule.relation];
      if (rule.fields.length < arity.min || rule.fields.length > arity.max) {
        problems.push(`${where}: ${rule.relation} takes ${arity.min} field(s), got ${rule.fields.length}`);
      }
      for (const field of rule.mandatory ?? []) {
        if (!rule.fields.includes(field)) problems.push(`${where}: mandatory field "${field}" is not in fields`);
      }
      if (rule.relation === 'ratio_at_most' && rule.max === undefined) {
        problems.push(`${where}: ratio_at_most needs max`);
      }
      for (const format of rule.formats ?? []) {
        if (!isValidDateFormat(format)) problems.push(`${where}: invalid date format "${format}"`);
      }
      break;
    }

    case 'compliance':
      if (rule.predicate === 'disallowed_pattern') {
        if (!rule.pattern) {
          problems.push(`${where}: disallowed_pattern needs a pattern`);
        } else {
          checkPattern(rule.pattern, rule.flags, where, problems);
        }
      } else if (!rule.fields || rule.fields.length === 0) {
        problems.push(`${where}: ${rule.predicate} needs at least one field`);
      }
      break;
  }
}

/**
 * Collect every invariant violation of a definition
 */
export function checkDefinition(definition: KnowledgeBaseDefinition): string[] {
  const problems: string[] = [];

  if (!definition.domain.trim()) {
    problems.push('domain name is empty');
  }

  const glossaryByFolded = new Map<string, string>();
  for (const term of Object.keys(definition.glossary)) {
    const folded = foldTerm(term);
    const existing = glossaryByFolded.get(folded);
    if (existing !== undefined) {
      problems.push(`glossary terms "${existing}" and "${term}" normalize to the same key`);
    }
    glossaryByFolded.set(folded, term);
  }

  const seen = new Map<string, { target: string; table: string }>();
  checkTermTable(definition.abbreviations, 'abbreviation', definition.glossary, glossaryByFolded, seen, problems);
  checkTermTable(definition.aliases, 'alias', definition.glossary, glossaryByFolded, seen, problems);

  for (const relationship of definition.relationships) {
    if (foldTerm(relationship.from) === foldTerm(relationship.to)) {
      problems.push(`relationship "${relationship.from}" -> "${relationship.to}" links a term to itself`);
    }
  }

  const patternNames = new Set<string>();
  for (const pattern of definition.entity_patterns) {
    if (patternNames.has(pattern.name)) problems.push(`entity pattern "${pattern.name}" is defined twice`);
    patternNames.add(pattern.name);
    checkPattern(pattern.pattern, pattern.flags, `entity pattern "${pattern.name}"`, problems);
    if (pattern.specificity < 0 || pattern.specificity > 1) {
      problems.push(`entity pattern "${pattern.name}": specificity must be within [0, 1]`);
    }
  }

  for (const rule of definition.extraction_rules) {
    if (!Object.prototype.hasOwnProperty.call(definition.glossary, rule.term)) {
      problems.push(`extraction rule "${rule.name}" targets "${rule.term}", which is not a glossary term`);
    }
    if (rule.kind === 'pattern') {
      checkPattern(rule.pattern, rule.flags, `extraction rule "${rule.name}"`, problems);
    }
  }

  const ruleNames = new Set<string>();
  for (const rule of definition.validation_rules) {
    if (ruleNames.has(rule.name)) problems.push(`validation rule "${rule.name}" is defined twice`);
    ruleNames.add(rule.name);
    checkValidationRule(rule, problems);
  }

  return problems;
}

function pushUnique(map: Map<string, string[]>, key: string, value: string): void {
  const list = map.get(key) ?? [];
  if (!list.some((existing) => foldTerm(existing) === foldTerm(value))) {
    list.push(value);
  }
  map.set(key, list);
}

function buildIndex(definition: KnowledgeBaseDefinition): TermIndex {
  const canonicalByFolded = new Map<string, string>();
  const abbreviationByFolded = new Map<string, string>();
  const aliasByFolded = new Map<string, string>();
  const variantsByCanonical = new Map<string, string[]>();
  const relatedByTerm = new Map<string, string[]>();

  for (const term of Object.keys(definition.glossary)) {
    canonicalByFolded.set(foldTerm(term), term);
    variantsByCanonical.set(term, []);
  }

  const addVariants = (table: Record<string, string>, target: Map<string, string>) => {
    for (const [form, canonical] of Object.entries(table)) {
      target.set(foldTerm(form), canonical);
      if (foldTerm(form) !== foldTerm(canonical)) {
        pushUnique(variantsByCanonical, canonical, form);
      }
    }
  };
  addVariants(definition.aliases, aliasByFolded);
  addVariants(definition.abbreviations, abbreviationByFolded);

  // Relationship ends are stored in canonical form where the term is known
  const canonicalOf = (term: string) =>
    canonicalByFolded.get(foldTerm(term)) ??
    aliasByFolded.get(foldTerm(term)) ??
    abbreviationByFolded.get(foldTerm(term)) ??
    term;

  for (const { from, to } of definition.relationships) {
    const a = canonicalOf(from);
    const b = canonicalOf(to);
    pushUnique(relatedByTerm, foldTerm(a), b);
    pushUnique(relatedByTerm, foldTerm(b), a);
  }

  return {
    canonicalByFolded,
    abbreviationByFolded,
    aliasByFolded,
    variantsByCanonical,
    relatedByTerm,
  };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const nested of Object.values(value)) deepFreeze(nested);
    return Object.freeze(value);
  }
  return value;
}

/**
 * Build an immutable knowledge base from a definition.
 *
 * @throws KnowledgeBaseConfigError listing every broken invariant
 */
export function createKnowledgeBase(definition: KnowledgeBaseDefinition): KnowledgeBase {
  const problems = checkDefinition(definition);
  if (problems.length > 0) {
    throw new KnowledgeBaseConfigError('Invalid knowledge base definition', definition.domain, problems);
  }

  // Copy first so freezing never reaches into the caller's objects
  const copy: KnowledgeBaseDefinition = JSON.parse(JSON.stringify(definition));

  return Object.freeze({
    domain: copy.domain.trim().toLowerCase(),
    description: copy.description ?? '',
    glossary: deepFreeze(copy.glossary),
    abbreviations: deepFreeze(copy.abbreviations),
    aliases: deepFreeze(copy.aliases),
    relationships: deepFreeze(copy.relationships),
    categories: deepFreeze(copy.categories),
    entityPatterns: deepFreeze(copy.entity_patterns),
    extractionRules: deepFreeze(copy.extraction_rules),
    validationRules: deepFreeze(copy.validation_rules),
    index: buildIndex(copy),
  });
}
