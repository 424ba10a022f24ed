/**
 * Form Processing Pipeline
 *
 * The core boundary: a request naming fields, a domain and document text goes
 * in; matches, validation results, a compliance report and a retrieval
 * summary come out.
 *
 * Flow:
 * 1. Check the request against form_processing_request.schema.json
 * 2. Resolve the domain's knowledge base
 * 3. Retrieve every field
 * 4. Validate the retrieved values as one form
 */

import { createRequestContext, runWithContext } from '../context';
import { RequestValidationError } from '../errors';
import { getKnowledgeBase } from '../knowledge/registry';
import { logger } from '../logger';
import { formDurationHistogram } from '../metrics';
import { retrieveAll, summarizeMatches } from '../retrieval/retriever';
import type { RetrieverOptions } from '../retrieval/types';
import { validateFormRequest } from '../schemas';
import type { FormProcessingResult, FormValues, RetrievalMatch } from '../types';
import { validateForm } from '../validation/engine';

export interface ProcessFormOptions {
  /** Options passed to the retriever for every field */
  retrieval?: RetrieverOptions;
  /** Correlation ID of the caller's request, if it has one */
  correlationId?: string;
}

/**
 * Form values from the retrieved matches. Fields without a value are left out.
 */
export function formValuesFromMatches(matches: readonly RetrievalMatch[]): FormValues {
  const values: FormValues = {};
  for (const match of matches) {
    if (match.value !== null) values[match.field_name] = match.value;
  }
  return values;
}

/**
 * Process one form-filling request.
 *
 * @throws RequestValidationError when the request does not match its schema
 * @throws UnknownDomainError when the domain has no knowledge base
 */
export function processForm(request: unknown, options: ProcessFormOptions = {}): FormProcessingResult {
  const check = validateFormRequest(request);
  if (!check.valid) {
    throw new RequestValidationError('Invalid form processing request', check.errors);
  }
  const { field_descriptors, domain, documents } = check.data;

  const context = createRequestContext(domain, options.correlationId);

  return runWithContext(context, () => {
    const startTime = Date.now();

    logger.info('Processing form', {
      fields: field_descriptors.length,
      documents: documents.length,
    });

    try {
      const kb = getKnowledgeBase(domain);
      const matches = retrieveAll(field_descriptors, kb.domain, documents, options.retrieval);
      const compliance = validateForm(kb.domain, formValuesFromMatches(matches));
      const summary = summarizeMatches(matches);

      const durationMs = Date.now() - startTime;
      formDurationHistogram.observe({ domain: kb.domain, status: 'success' }, durationMs / 1000);

      logger.info('Form processed', {
        retrieved: summary.retrieved,
        retrieval_rate: summary.retrieval_rate,
        status: compliance.status,
        duration_ms: durationMs,
      });

      return {
        request_id: context.requestId,
        domain: kb.domain,
        matches,
        validations: compliance.results,
        compliance,
        summary,
      };
    } catch (error) {
      formDurationHistogram.observe({ domain, status: 'error' }, (Date.now() - startTime) / 1000);
      logger.error('Form processing failed', error, { fields: field_descriptors.length });
      throw error;
    }
  });
}
