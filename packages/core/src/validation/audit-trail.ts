/**
 * Audit Trail
 *
 * Append-only record of every validation check made for one form.
 */

import type { Severity, ValidationResult, ValidationStage } from '../types';

export class AuditTrail {
  private readonly entries: ValidationResult[] = [];

  /**
   * Append a result. The stored entry is a frozen copy.
   */
  record(result: ValidationResult): Readonly<ValidationResult> {
    const entry = Object.freeze({ ...result });
    this.entries.push(entry);
    return entry;
  }

  recordAll(results: readonly ValidationResult[]): void {
    for (const result of results) this.record(result);
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Frozen copy of the entries, in recording order
   */
  snapshot(): readonly Readonly<ValidationResult>[] {
    return Object.freeze([...this.entries]);
  }

  byStage(stage: ValidationStage): readonly Readonly<ValidationResult>[] {
    return Object.freeze(this.entries.filter((entry) => entry.stage === stage));
  }

  failures(severity?: Severity): readonly Readonly<ValidationResult>[] {
    return Object.freeze(
      this.entries.filter((entry) => !entry.is_valid && (severity === undefined || entry.severity === severity))
    );
  }
}

/**
 * Build a result stamped with the current time
 */
export function makeResult(fields: Omit<ValidationResult, 'timestamp'>): ValidationResult {
  return { ...fields, timestamp: new Date().toISOString() };
}
