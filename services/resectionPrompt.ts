/**
 * RESECTION PROMPT
 *
 * Pairs a validated patient context with the instructions and model name a
 * downstream generator needs.
 */

import type { PatientContext } from "../schemas/patientContext";
import { contextToPayload, type ContextPayload } from "./contextValidator";

export const DEFAULT_PROMPT = [
  "You are a pathology assistant helping to prepare a CAP compliant report for ductal carcinoma in situ",
  "(DCIS) breast resection specimens. Use the provided structured data to generate a concise, factual",
  "summary covering margin status, receptor testing, and any ancillary comments. Highlight missing data",
  "as actionable questions back to the pathologist.",
].join("\n");

export const DEFAULT_INSTRUCTIONS = "Use the CAP protocol for ductal carcinoma in situ (DCIS) resection.";

export const DEFAULT_MODEL_NAME = "gpt-4o";

export interface ResectionPromptOptions {
  readonly instructions?: string;
  readonly modelName?: string;
}

export interface PromptPayload extends ContextPayload {
  readonly instructions: string;
  readonly model_name: string;
}

export interface ResectionPrompt {
  readonly context: PatientContext;
  readonly instructions: string;
  readonly modelName: string;
  toPromptPayload(): PromptPayload;
}

export const buildResectionPrompt = (
  context: PatientContext,
  options: ResectionPromptOptions = {}
): ResectionPrompt => {
  const instructions = options.instructions ?? DEFAULT_INSTRUCTIONS;
  const modelName = options.modelName ?? DEFAULT_MODEL_NAME;
  return {
    context,
    instructions,
    modelName,
    toPromptPayload: () => ({
      ...contextToPayload(context),
      instructions,
      model_name: modelName,
    }),
  };
};
