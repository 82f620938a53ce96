/**
 * FORM FILLING PIPELINE - TEST SUITE
 *
 * The model is a scripted in-process fake provided as a Layer.
 */

import { describe, it, expect } from "vitest";
import { Effect, Either, Layer, pipe } from "effect";
import { JSON_END, JSON_START } from "../services/cranePrompts";
import { ModelInvocationError } from "../services/errors";
import {
  craneFill,
  extractJsonBlock,
  fillResectionForm,
  FormFillingModel,
  REASONING_SYSTEM_PROMPT,
  runFormFilling,
} from "../services/formFilling.effect";
import { FormValidationServiceLive } from "../services/formValidation.effect";

// ============================================================================
// HELPERS
// ============================================================================

interface Calls {
  readonly reasoning: Array<{ system: string; user: string }>;
  readonly json: string[];
}

const scriptedModel = (reasoning: string, json: string, calls: Calls) =>
  Layer.succeed(FormFillingModel, {
    reasonUntilJsonStart: (system, user) => {
      calls.reasoning.push({ system, user });
      return Effect.succeed(reasoning);
    },
    generateJson: (prefix) => {
      calls.json.push(prefix);
      return Effect.succeed(json);
    },
  });

const newCalls = (): Calls => ({ reasoning: [], json: [] });

const EXCISION = "Excision (less than total mastectomy) (38394.100004300)";
const REPORT = "Synthetic report: excision of right breast, DCIS.";

const runExtract = (text: string) => Effect.runPromise(Effect.either(extractJsonBlock(text)));

// ============================================================================
// 1. craneFill
// ============================================================================

describe("1. craneFill", () => {
  it("should join reasoning, JSON and the end sentinel", async () => {
    const calls = newCalls();
    const output = await Effect.runPromise(
      pipe(craneFill(REPORT), Effect.provide(scriptedModel(`Thinking.\n${JSON_START}`, '{"a":1}', calls)))
    );

    expect(output).toBe(`Thinking.\n${JSON_START}{"a":1}${JSON_END}`);
    expect(calls.reasoning).toHaveLength(1);
    expect(calls.reasoning[0]?.system).toBe(REASONING_SYSTEM_PROMPT);
    expect(calls.reasoning[0]?.user).toContain(`Report:\n${REPORT}\n`);
    expect(calls.json[0]?.endsWith(JSON_START)).toBe(true);
  });
});

// ============================================================================
// 2. extractJsonBlock
// ============================================================================

describe("2. extractJsonBlock", () => {
  it("should read the block after the last start sentinel", async () => {
    const text = `draft ${JSON_START} {"x":1} ${JSON_END} retry ${JSON_START}{"y":2}${JSON_END} trailing`;
    expect(Either.getOrNull(await runExtract(text))).toEqual({ y: 2 });
  });

  it("should take the rest of the text when the end sentinel is missing", async () => {
    expect(Either.getOrNull(await runExtract(`${JSON_START} {"z": true} `))).toEqual({ z: true });
  });

  it("should fail without a start sentinel", async () => {
    const result = await runExtract('{"x":1}');
    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left.message).toBe(`Could not extract JSON from model output: no ${JSON_START} sentinel`);
    }
  });

  it("should fail on an empty block", async () => {
    const result = await runExtract(`${JSON_START}  ${JSON_END}`);
    expect(Either.isLeft(result) && result.left.reason).toBe("empty JSON block");
  });

  it("should fail on malformed JSON", async () => {
    const result = await runExtract(`${JSON_START}{"x":}${JSON_END}`);
    expect(Either.isLeft(result) && result.left._tag).toBe("JsonExtractionError");
  });
});

// ============================================================================
// 3. fillResectionForm
// ============================================================================

describe("3. fillResectionForm", () => {
  const runFill = (model: Layer.Layer<FormFillingModel>) =>
    Effect.runPromise(
      pipe(
        fillResectionForm(REPORT),
        Effect.either,
        Effect.provide(Layer.merge(model, FormValidationServiceLive))
      )
    );

  it("should return the validated record", async () => {
    const json = JSON.stringify({
      specimen: { procedure: { kind: EXCISION }, specimen_laterality: "Right (5423.100004300)" },
    });
    const result = await runFill(scriptedModel(`ok ${JSON_START}`, json, newCalls()));

    expect(Either.getOrNull(result)).toEqual({
      specimen: { procedure: { kind: EXCISION }, specimen_laterality: "Right (5423.100004300)" },
    });
  });

  it("should surface form errors", async () => {
    const json = JSON.stringify({ specimen: { procedure: { kind: "Biopsy" } } });
    const result = await runFill(scriptedModel(JSON_START, json, newCalls()));

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result) && result.left._tag === "FormValidationError") {
      expect(result.left.errors).toEqual(['specimen.procedure.kind: unknown tag "Biopsy" for procedure']);
    } else {
      expect.fail("expected a FormValidationError");
    }
  });

  it("should surface model failures", async () => {
    const failing = Layer.succeed(FormFillingModel, {
      reasonUntilJsonStart: () => Effect.fail(new ModelInvocationError({ stage: "reasoning", reason: "offline" })),
      generateJson: () => Effect.succeed("{}"),
    });
    const result = await runFill(failing);

    expect(Either.isLeft(result) && result.left.message).toBe("Model call failed during reasoning: offline");
  });
});

describe("4. runFormFilling", () => {
  it("should return failures as values", async () => {
    const result = await runFormFilling(REPORT, scriptedModel("no sentinel here", "{}", newCalls()));
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error._tag).toBe("JsonExtractionError");
    }
  });

  it("should return the record on success", async () => {
    const result = await runFormFilling(REPORT, scriptedModel(JSON_START, "{}", newCalls()));
    expect(result).toEqual({ success: true, data: {} });
  });
});
