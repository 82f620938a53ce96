/**
 * FORM FILLING PIPELINE - EFFECT-TS
 *
 * Drives a caller-supplied language model through the two-phase extraction:
 * free reasoning up to JSON_START, then constrained JSON for the resection
 * form. No inference happens in this module; the model is a service.
 */

import { Effect, Context, Layer } from "effect";
import {
  buildCranePrompts,
  JSON_END,
  JSON_START,
  REASONING_INSTRUCTIONS,
  SYSTEM_PROMPT,
} from "./cranePrompts";
import { JsonExtractionError, type FormValidationError, type ModelInvocationError } from "./errors";
import type { FormRecord } from "./formEngine";
import { FormValidationService, FormValidationServiceLive } from "./formValidation.effect";
import { runPromise } from "./runtime";

// ============================================================================
// MODEL COLLABORATOR
// ============================================================================

export interface FormFillingModel {
  /**
   * Reason over the report; returns the generated text up to and including
   * the JSON_START sentinel
   */
  readonly reasonUntilJsonStart: (
    systemPrompt: string,
    userPrompt: string
  ) => Effect.Effect<string, ModelInvocationError, never>;

  /**
   * Emit a JSON object continuing `prefix` (which ends with JSON_START)
   */
  readonly generateJson: (prefix: string) => Effect.Effect<string, ModelInvocationError, never>;
}

export const FormFillingModel = Context.GenericTag<FormFillingModel>("FormFillingModel");

// ============================================================================
// PIPELINE
// ============================================================================

export const REASONING_SYSTEM_PROMPT = `${SYSTEM_PROMPT}\n${REASONING_INSTRUCTIONS}`;

/**
 * Reasoning prefix + JSON payload + JSON_END
 */
export const craneFill = (reportText: string) =>
  Effect.gen(function* (_) {
    const model = yield* _(FormFillingModel);
    const prompts = buildCranePrompts(reportText);

    const prefix = yield* _(model.reasonUntilJsonStart(REASONING_SYSTEM_PROMPT, prompts.reasoning));
    const json = yield* _(model.generateJson(`${prompts.jsonPrefix}${JSON_START}`));
    yield* _(
      Effect.logDebug("crane_fill_complete").pipe(
        Effect.annotateLogs({ prefixLength: prefix.length, jsonLength: json.length })
      )
    );
    return `${prefix}${json}${JSON_END}`;
  });

/**
 * Parse the object between the last JSON_START and the following JSON_END.
 * A missing JSON_END takes the rest of the text.
 */
export const extractJsonBlock = (text: string): Effect.Effect<unknown, JsonExtractionError, never> => {
  const start = text.lastIndexOf(JSON_START);
  if (start === -1) {
    return Effect.fail(new JsonExtractionError({ reason: `no ${JSON_START} sentinel` }));
  }
  const body = text.slice(start + JSON_START.length);
  const end = body.indexOf(JSON_END);
  const block = (end === -1 ? body : body.slice(0, end)).trim();
  if (block === "") {
    return Effect.fail(new JsonExtractionError({ reason: "empty JSON block" }));
  }
  return Effect.try({
    try: (): unknown => JSON.parse(block),
    catch: (error) =>
      new JsonExtractionError({ reason: error instanceof Error ? error.message : String(error) }),
  });
};

/**
 * Fill and validate the dcis-resection form for one report
 */
export const fillResectionForm = (
  reportText: string
): Effect.Effect<
  FormRecord,
  ModelInvocationError | JsonExtractionError | FormValidationError,
  FormFillingModel | FormValidationService
> =>
  Effect.gen(function* (_) {
    const output = yield* _(craneFill(reportText));
    const payload = yield* _(extractJsonBlock(output));
    const validator = yield* _(FormValidationService);
    return yield* _(validator.validate("dcis-resection", payload));
  });

// ============================================================================
// CONVENIENCE FUNCTIONS
// ============================================================================

/**
 * Fill one report with the given model layer (standalone, failures as values)
 */
export const runFormFilling = (reportText: string, model: Layer.Layer<FormFillingModel>) =>
  runPromise(
    fillResectionForm(reportText).pipe(Effect.provide(Layer.merge(model, FormValidationServiceLive)))
  );
