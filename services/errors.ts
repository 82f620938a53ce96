/**
 * SERVICE-LEVEL ERROR SYSTEM (Effect-TS)
 *
 * Errors are values, not exceptions. Composable, type-safe, structured.
 *
 * Two families live here:
 * - Configuration errors (window sizes, catalogs, environment). These are
 *   programmer/wiring mistakes and are the only errors ever thrown.
 * - Form issues (shape, unknown tag, conditional presence, range). These are
 *   collected during validation and surface as path-qualified messages.
 */

import { Data, ParseResult } from "effect";

/**
 * Render a field path for humans. The empty path is the payload itself.
 */
export const displayPath = (path: string): string => (path === "" ? "payload" : path);

/**
 * Flatten an Effect Schema parse failure into "path: message" lines
 */
export const formatParseError = (error: ParseResult.ParseError): string[] =>
  ParseResult.ArrayFormatter.formatErrorSync(error).map((issue) => {
    const path = issue.path.map(String).join(".");
    return path === "" ? issue.message : `${path}: ${issue.message}`;
  });

const describeCondition = (field: string, values: ReadonlyArray<unknown>): string =>
  `${field} is ${values.map((v) => JSON.stringify(v)).join(" or ")}`;

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

/**
 * WINDOW CONFIG ERROR - Invalid sliding-window parameters
 *
 * Raised by the ContextWindow constructor, never by generate().
 */
export class WindowConfigError extends Data.TaggedError("WindowConfigError")<{
  readonly parameter: "windowSize" | "overlap";
  readonly value: number;
  readonly constraint: string;
}> {
  get message(): string {
    return `${this.parameter} ${this.constraint} (got ${this.value})`;
  }

  get recoverable(): boolean {
    return false;
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      parameter: this.parameter,
      value: this.value,
      constraint: this.constraint,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * CATALOG ERROR - A form catalog is malformed or self-inconsistent
 *
 * Raised once, when the registry is compiled at startup.
 */
export class CatalogError extends Data.TaggedError("CatalogError")<{
  readonly catalog: string;
  readonly problems: ReadonlyArray<string>;
}> {
  get message(): string {
    return `Invalid form catalog "${this.catalog}": ${this.problems.join("; ")}`;
  }

  get recoverable(): boolean {
    return false;
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      catalog: this.catalog,
      problems: this.problems,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * CONFIG ERROR - Environment overrides failed to decode
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly problems: ReadonlyArray<string>;
}> {
  get message(): string {
    return `Invalid configuration: ${this.problems.join("; ")}`;
  }

  get recoverable(): boolean {
    return false;
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      problems: this.problems,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

// ============================================================================
// FORM ISSUES
// ============================================================================

/**
 * PAYLOAD SHAPE ERROR - Value is not the mapping/list/scalar expected here
 */
export class PayloadShapeError extends Data.TaggedError("PayloadShapeError")<{
  readonly path: string;
  readonly expected: string;
}> {
  get message(): string {
    if (this.path === "") return `payload must be ${this.expected}`;
    return `${this.path}: expected ${this.expected}`;
  }

  get recoverable(): boolean {
    return false;
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      path: this.path,
      expected: this.expected,
      recoverable: this.recoverable,
    };
  }
}

/**
 * UNKNOWN TAG ERROR - Discriminator or option outside its declared set
 *
 * `context` names the union (for variant tags) or the choice set.
 */
export class UnknownTagError extends Data.TaggedError("UnknownTagError")<{
  readonly path: string;
  readonly value: string;
  readonly context: string;
}> {
  get message(): string {
    return `${displayPath(this.path)}: unknown tag ${JSON.stringify(this.value)} for ${this.context}`;
  }

  get recoverable(): boolean {
    return false;
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      path: this.path,
      value: this.value,
      context: this.context,
      recoverable: this.recoverable,
    };
  }
}

export type PresenceRequirement =
  | { readonly kind: "required" }
  | { readonly kind: "requiredForTag"; readonly tag: string }
  | { readonly kind: "requiredWhen"; readonly field: string; readonly values: ReadonlyArray<unknown> }
  | { readonly kind: "absentUnless"; readonly field: string; readonly values: ReadonlyArray<unknown> }
  | { readonly kind: "anyOf"; readonly fields: ReadonlyArray<string> };

/**
 * CONDITIONAL PRESENCE ERROR - A sibling rule about presence was violated
 */
export class ConditionalPresenceError extends Data.TaggedError("ConditionalPresenceError")<{
  readonly path: string;
  readonly requirement: PresenceRequirement;
}> {
  get message(): string {
    const where = displayPath(this.path);
    const rule = this.requirement;
    switch (rule.kind) {
      case "required":
        return `${where}: is required`;
      case "requiredForTag":
        return `${where}: is required when kind is ${JSON.stringify(rule.tag)}`;
      case "requiredWhen":
        return `${where}: is required when ${describeCondition(rule.field, rule.values)}`;
      case "absentUnless":
        return `${where}: must be empty unless ${describeCondition(rule.field, rule.values)}`;
      case "anyOf":
        return `${where}: one of ${rule.fields.join(", ")} is required`;
    }
  }

  get recoverable(): boolean {
    return false;
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      path: this.path,
      requirement: this.requirement,
      recoverable: this.recoverable,
    };
  }
}

/**
 * RANGE VIOLATION ERROR - Numeric value or list length outside its bounds
 */
export class RangeViolationError extends Data.TaggedError("RangeViolationError")<{
  readonly path: string;
  readonly value?: number;
  readonly bound: "minimum" | "maximum" | "minItems";
  readonly limit: number;
  readonly condition?: { readonly field: string; readonly values: ReadonlyArray<unknown> };
}> {
  get message(): string {
    const where = displayPath(this.path);
    const suffix = this.condition
      ? ` when ${describeCondition(this.condition.field, this.condition.values)}`
      : "";
    switch (this.bound) {
      case "minimum":
        return `${where}: must be at least ${this.limit}${suffix}`;
      case "maximum":
        return `${where}: must be at most ${this.limit}${suffix}`;
      case "minItems":
        return `${where}: must contain at least ${this.limit} item(s)`;
    }
  }

  get recoverable(): boolean {
    return false;
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      path: this.path,
      value: this.value,
      bound: this.bound,
      limit: this.limit,
      recoverable: this.recoverable,
    };
  }
}

/**
 * Union of everything a validation pass can report
 */
export type FormIssue =
  | PayloadShapeError
  | UnknownTagError
  | ConditionalPresenceError
  | RangeViolationError;

/**
 * FORM VALIDATION ERROR - Aggregate failure of one validation pass
 */
export class FormValidationError extends Data.TaggedError("FormValidationError")<{
  readonly form: string;
  readonly errors: ReadonlyArray<string>;
}> {
  get message(): string {
    return `${this.form} failed validation with ${this.errors.length} error(s)`;
  }

  get recoverable(): boolean {
    return false;
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      form: this.form,
      errors: this.errors,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

// ============================================================================
// PIPELINE ERRORS
// ============================================================================

/**
 * MODEL INVOCATION ERROR - The injected language-model collaborator failed
 */
export class ModelInvocationError extends Data.TaggedError("ModelInvocationError")<{
  readonly stage: "reasoning" | "json";
  readonly reason: string;
}> {
  get message(): string {
    return `Model call failed during ${this.stage}: ${this.reason}`;
  }

  get recoverable(): boolean {
    return true; // Caller may retry with another model
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      stage: this.stage,
      reason: this.reason,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * JSON EXTRACTION ERROR - Generated text held no parseable JSON object
 */
export class JsonExtractionError extends Data.TaggedError("JsonExtractionError")<{
  readonly reason: string;
}> {
  get message(): string {
    return `Could not extract JSON from model output: ${this.reason}`;
  }

  get recoverable(): boolean {
    return true;
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      reason: this.reason,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * Union of all service errors (for type safety)
 */
export type ServiceError =
  | WindowConfigError
  | CatalogError
  | ConfigError
  | FormIssue
  | FormValidationError
  | ModelInvocationError
  | JsonExtractionError;

/**
 * Issue Collector (for accumulating every defect of one validation pass)
 */
export class IssueCollector {
  private issues: FormIssue[] = [];

  add(issue: FormIssue): void {
    this.issues.push(issue);
  }

  getAll(): FormIssue[] {
    return [...this.issues];
  }

  count(): number {
    return this.issues.length;
  }

  hasIssues(): boolean {
    return this.issues.length > 0;
  }

  messages(): string[] {
    return this.issues.map((issue) => issue.message);
  }

  clear(): void {
    this.issues = [];
  }

  toJSON() {
    return this.issues.map((issue) => issue.toJSON());
  }
}
