/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for knowledge-base definition files and
 * form-processing requests.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { logger } from './logger';
import type { KnowledgeBaseDefinition } from './knowledge/types';
import type { FormProcessingRequest } from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

// Compiled validators - lazy loaded on first use
let knowledgeBaseValidator: ValidateFunction<KnowledgeBaseDefinition> | null = null;
let formRequestValidator: ValidateFunction<FormProcessingRequest> | null = null;

function loadSchema(schemaName: string): object {
  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Relative to core package sources
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to core package dist
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const content = fs.readFileSync(schemaPath, 'utf-8');
      return JSON.parse(content);
    }
  }

  // Return a permissive schema if file not found
  logger.warn(`Schema file not found: ${schemaName}, using permissive validation`);
  return { type: 'object' };
}

function getKnowledgeBaseValidator(): ValidateFunction<KnowledgeBaseDefinition> {
  if (!knowledgeBaseValidator) {
    knowledgeBaseValidator = ajv.compile<KnowledgeBaseDefinition>(loadSchema('knowledge_base.schema.json'));
  }
  return knowledgeBaseValidator;
}

function getFormRequestValidator(): ValidateFunction<FormProcessingRequest> {
  if (!formRequestValidator) {
    formRequestValidator = ajv.compile<FormProcessingRequest>(
      loadSchema('form_processing_request.schema.json')
    );
  }
  return formRequestValidator;
}

function formatErrors(validate: ValidateFunction): string[] {
  return (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
}

export type SchemaCheck<T> = { valid: true; data: T } | { valid: false; errors: string[] };

/**
 * Validate a knowledge-base definition against knowledge_base.schema.json
 */
export function validateKnowledgeBaseDefinition(data: unknown): SchemaCheck<KnowledgeBaseDefinition> {
  const validate = getKnowledgeBaseValidator();

  if (!validate(data)) {
    const errors = formatErrors(validate);
    logger.warn('KnowledgeBaseDefinition validation failed', { errors });
    return { valid: false, errors };
  }

  return { valid: true, data };
}

/**
 * Validate a FormProcessingRequest against form_processing_request.schema.json
 */
export function validateFormRequest(data: unknown): SchemaCheck<FormProcessingRequest> {
  const validate = getFormRequestValidator();

  if (!validate(data)) {
    const errors = formatErrors(validate);
    logger.warn('FormProcessingRequest validation failed', { errors });
    return { valid: false, errors };
  }

  return { valid: true, data };
}
