/**
 * FORM VALIDATION SERVICE - EFFECT-TS
 *
 * Validates untrusted payloads against the shipped form registries and
 * produces canonical records.
 *
 * Design:
 * - Every issue of a pass is reported, never just the first
 * - Messages are path-qualified ("tumor.size_extent.kind: is required")
 * - Catalog defects are thrown at registry compile time, not here
 */

import { Effect, Context, Layer } from "effect";
import { FormValidationError } from "./errors";
import { getFormRegistry, type FormName } from "./formCatalogs";
import {
  roundTripForm,
  validateWithRegistry,
  type FormRecord,
  type FormValidationResult,
} from "./formEngine";
import { runSyncResult } from "./runtime";

// ============================================================================
// SERVICE INTERFACE
// ============================================================================

export interface FormValidationService {
  /**
   * Validate a payload; succeeds with the canonical record
   */
  readonly validate: (
    form: FormName,
    payload: unknown
  ) => Effect.Effect<FormRecord, FormValidationError, never>;

  /**
   * Serialize a record and validate it again
   */
  readonly roundTrip: (
    form: FormName,
    record: FormRecord
  ) => Effect.Effect<FormRecord, FormValidationError, never>;
}

export const FormValidationService =
  Context.GenericTag<FormValidationService>("FormValidationService");

// ============================================================================
// SERVICE IMPLEMENTATION
// ============================================================================

class FormValidationServiceImpl implements FormValidationService {
  private settle(form: FormName, result: FormValidationResult) {
    return Effect.gen(function* (_) {
      if (result.record === null) {
        const errors = result.issues.map((issue) => issue.message);
        yield* _(Effect.logDebug("form_rejected").pipe(Effect.annotateLogs({ form, errors: errors.length })));
        return yield* _(Effect.fail(new FormValidationError({ form, errors })));
      }
      yield* _(Effect.logDebug("form_accepted").pipe(Effect.annotateLogs({ form })));
      return result.record;
    });
  }

  readonly validate = (form: FormName, payload: unknown) =>
    Effect.gen(this, function* (_) {
      const registry = getFormRegistry(form);
      const result = validateWithRegistry(registry, payload);
      return yield* _(this.settle(form, result));
    });

  readonly roundTrip = (form: FormName, record: FormRecord) =>
    Effect.gen(this, function* (_) {
      const registry = getFormRegistry(form);
      return yield* _(this.settle(form, roundTripForm(registry, record)));
    });
}

// ============================================================================
// SERVICE LAYER
// ============================================================================

export const FormValidationServiceLive = Layer.succeed(
  FormValidationService,
  new FormValidationServiceImpl()
);

// ============================================================================
// CONVENIENCE FUNCTIONS
// ============================================================================

export type ValidationOutcome =
  | { readonly ok: true; readonly record: FormRecord; readonly errors: readonly [] }
  | { readonly ok: false; readonly record: null; readonly errors: ReadonlyArray<string> };

/**
 * Validate a payload against a shipped form (standalone, synchronous)
 */
export const validateFormPayload = (form: FormName, payload: unknown): ValidationOutcome => {
  const program = Effect.gen(function* (_) {
    const service = yield* _(FormValidationService);
    return yield* _(service.validate(form, payload));
  }).pipe(Effect.provide(FormValidationServiceLive));

  const result = runSyncResult(program);
  return result.success
    ? { ok: true, record: result.data, errors: [] }
    : { ok: false, record: null, errors: result.error.errors };
};

/** Full CAP eCC resection form */
export const validateResectionForm = (payload: unknown): ValidationOutcome =>
  validateFormPayload("dcis-resection", payload);

/** Condensed registry summary */
export const validateSummaryForm = (payload: unknown): ValidationOutcome =>
  validateFormPayload("dcis-summary", payload);
