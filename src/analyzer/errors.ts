/**
 * Error taxonomy for the analyzer.
 *
 * Only ParseError is meant to reach callers of analyze(); the others are
 * either caught inside the rule pipeline or raised by configuration and
 * action resolution.
 */

import type { ZodIssue } from 'zod';

export class AnalyzerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AnalyzerError';
    Object.setPrototypeOf(this, AnalyzerError.prototype);
  }
}

/**
 * The statement could not be turned into a query model by any grammar.
 * Fatal to that statement only.
 */
export class ParseError extends AnalyzerError {
  constructor(
    message: string,
    public readonly sql: string,
    public readonly attempts: ReadonlyArray<{ dialect: string; message: string }> = [],
    public readonly suggestions: string[] = [],
  ) {
    super(message);
    this.name = 'ParseError';
    Object.setPrototypeOf(this, ParseError.prototype);
  }
}

/**
 * A rule lacked an optional input it needs. The pipeline records this as
 * the absence of a finding.
 */
export class RuleEvaluationSkipped extends AnalyzerError {
  constructor(
    public readonly rule: string,
    public readonly missing: string,
  ) {
    super(`${rule} skipped: missing ${missing}`);
    this.name = 'RuleEvaluationSkipped';
    Object.setPrototypeOf(this, RuleEvaluationSkipped.prototype);
  }
}

export class ConfigError extends AnalyzerError {
  constructor(
    message: string,
    public readonly issues: ZodIssue[] = [],
  ) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * A downstream consumer referenced an action id that was never built.
 */
export class UnknownActionError extends AnalyzerError {
  constructor(public readonly actionId: string) {
    super(`Unknown action id: ${actionId}`);
    this.name = 'UnknownActionError';
    Object.setPrototypeOf(this, UnknownActionError.prototype);
  }
}
