/**
 * Error collector for parsing and verification
 */

import { AggregateIRError, type IRError } from "./ir_errors.js";

export class ErrorCollector {
  private errors: IRError[] = [];

  add(error: IRError): void {
    this.errors.push(error);
  }

  /** Take over a batch of errors, such as one verifier run's result. */
  addAll(errors: Iterable<IRError>): void {
    for (const error of errors) {
      this.errors.push(error);
    }
  }

  hasErrors(): boolean {
    return this.errors.length > 0;
  }

  getErrors(): IRError[] {
    return [...this.errors];
  }

  throwIfErrors(): void {
    if (this.errors.length > 0) {
      throw new AggregateIRError(this.errors);
    }
  }
}
