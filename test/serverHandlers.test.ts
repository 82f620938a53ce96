import { describe, it, expect } from "vitest";
import { buildPrompt, health, validateForm } from "../server/handlers";
import { DEFAULT_PROMPT } from "../services/resectionPrompt";

describe("GET /health", () => {
  it("should report ok", () => {
    expect(health()).toEqual({ status: 200, body: { status: "ok" } });
  });
});

describe("POST /prompts", () => {
  it("should return the template and prompt payload", () => {
    const response = buildPrompt({ patient_id: "123", clinical_history: "History" }, { today: "2024-03-04" });
    expect(response).toEqual({
      status: 200,
      body: {
        template: DEFAULT_PROMPT,
        payload: {
          patient_id: "123",
          clinical_history: "History",
          report_date: "2024-03-04",
          specimens: [],
          instructions: "Use the CAP protocol for ductal carcinoma in situ (DCIS) resection.",
          model_name: "gpt-4o",
        },
      },
    });
  });

  it("should use the configured model name", () => {
    const response = buildPrompt({ patient_id: "123" }, { modelName: "local-test-model", today: "2024-03-04" });
    expect(response.status).toBe(200);
    expect("payload" in response.body && response.body.payload.model_name).toBe("local-test-model");
  });

  it("should answer 422 with the validation errors", () => {
    expect(buildPrompt({ patient_id: "" })).toEqual({
      status: 422,
      body: { detail: ["patient_id: must contain non-whitespace characters"] },
    });
  });
});

describe("POST /forms/:form/validate", () => {
  it("should return the canonical record", () => {
    expect(validateForm("dcis-resection", { comments: {} })).toEqual({ status: 200, body: { record: { comments: {} } } });
  });

  it("should answer 422 for an invalid form", () => {
    expect(validateForm("dcis-resection", { specimen: { specimen_laterality: "Up" } })).toEqual({
      status: 422,
      body: { detail: ['specimen.specimen_laterality: unknown tag "Up" for specimen_laterality'] },
    });
  });

  it("should answer 404 for an unknown form", () => {
    expect(validateForm("dcis-biopsy", {})).toEqual({
      status: 404,
      body: { detail: ['unknown form "dcis-biopsy"'] },
    });
  });
});
