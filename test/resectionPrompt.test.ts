import { describe, it, expect } from "vitest";
import { createPatientContext } from "../services/contextValidator";
import {
  buildCranePrompts,
  buildUserPrompt,
  JSON_END,
  JSON_START,
  REASONING_INSTRUCTIONS,
  SYSTEM_PROMPT,
} from "../services/cranePrompts";
import {
  buildResectionPrompt,
  DEFAULT_INSTRUCTIONS,
  DEFAULT_MODEL_NAME,
  DEFAULT_PROMPT,
} from "../services/resectionPrompt";

// ============================================================================
// 1. RESECTION PROMPT PAYLOAD
// ============================================================================

describe("1. buildResectionPrompt", () => {
  const context = createPatientContext(
    {
      patientId: "XYZ",
      clinicalHistory: "History of DCIS",
      reportDate: "2024-01-01",
      specimens: [{ identifier: "  A1  ", description: "Lumpectomy specimen" }],
    },
    { today: "2024-06-01" }
  );

  it("should merge the context with instructions and model name", () => {
    const payload = buildResectionPrompt(context, { modelName: "gpt-test" }).toPromptPayload();
    expect(payload).toEqual({
      patient_id: "XYZ",
      clinical_history: "History of DCIS",
      report_date: "2024-01-01",
      specimens: [{ identifier: "A1", description: "Lumpectomy specimen", margin_status: null }],
      instructions: DEFAULT_INSTRUCTIONS,
      model_name: "gpt-test",
    });
  });

  it("should default the model and instructions", () => {
    const prompt = buildResectionPrompt(context);
    expect(prompt.modelName).toBe(DEFAULT_MODEL_NAME);
    expect(prompt.toPromptPayload().model_name).toBe("gpt-4o");
    expect(prompt.instructions).toBe("Use the CAP protocol for ductal carcinoma in situ (DCIS) resection.");
  });

  it("should ship a template about DCIS resections", () => {
    expect(DEFAULT_PROMPT.startsWith("You are a pathology assistant")).toBe(true);
    expect(DEFAULT_PROMPT.endsWith("back to the pathologist.")).toBe(true);
  });
});

// ============================================================================
// 2. TWO-PHASE PROMPTS
// ============================================================================

describe("2. Two-phase prompts", () => {
  it("should name both sentinels in the system prompt", () => {
    expect(SYSTEM_PROMPT).toBe(
      "You are an assistant that must think step-by-step before responding. " +
        "Only emit JSON output between the delimiters <JSON_START> and <JSON_END>."
    );
    expect(REASONING_INSTRUCTIONS).toContain("<JSON_START>/<JSON_END>");
  });

  it("should embed the stripped report in the user prompt", () => {
    expect(buildUserPrompt("  Margins negative.  \n")).toBe(
      "Review the following report carefully. Do not produce any JSON output " +
        `until you explicitly encounter the token ${JSON_START}.\n\nReport:\nMargins negative.\n`
    );
  });

  it("should share the report preamble between reasoning and JSON prompts", () => {
    const prompts = buildCranePrompts(" Synthetic report text. ");
    const preamble =
      "You are a pathology assistant preparing the CAP DCIS Resection form.\n" +
      "Use the following pathology report to populate the structured data form.\n\n" +
      "Report:\nSynthetic report text.\n\n";

    expect(prompts.reasoning.startsWith(preamble)).toBe(true);
    expect(prompts.jsonPrefix.startsWith(preamble)).toBe(true);
    expect(prompts.reasoning.endsWith(`write ${JSON_START} on a new line. This signals the start of the JSON object.`)).toBe(
      true
    );
    expect(prompts.jsonPrefix).not.toContain(JSON_END);
  });
});
