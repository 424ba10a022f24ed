/**
 * Error Types
 *
 * Only configuration and input-shape problems are thrown. Data-quality
 * outcomes (no match, low confidence, failed validation) are returned as
 * structured results instead.
 */

export class UnknownDomainError extends Error {
  readonly code = 'UnknownDomain';
  constructor(readonly domain: string, readonly registeredDomains: string[]) {
    super(
      `No knowledge base registered for domain: ${domain}` +
        (registeredDomains.length > 0 ? ` (registered: ${registeredDomains.join(', ')})` : '')
    );
    this.name = 'UnknownDomainError';
  }
}

export class KnowledgeBaseConfigError extends Error {
  readonly code = 'KnowledgeBaseConfig';
  constructor(message: string, readonly domain: string, readonly problems: string[]) {
    super(`${message}: ${problems.join('; ')}`);
    this.name = 'KnowledgeBaseConfigError';
  }
}

export class InvalidConfigurationError extends Error {
  readonly code = 'InvalidConfiguration';
  constructor(message: string, readonly setting: string) {
    super(message);
    this.name = 'InvalidConfigurationError';
  }
}

export class RequestValidationError extends Error {
  readonly code = 'RequestValidation';
  constructor(message: string, readonly errors: string[]) {
    super(`${message}: ${errors.join('; ')}`);
    this.name = 'RequestValidationError';
  }
}
