/**
 * HTTP HANDLERS
 *
 * Framework-free request handlers: body in, { status, body } out.
 * server/app.ts adapts them to express routes.
 */

import { validateContext } from "../services/contextValidator";
import { isFormName } from "../services/formCatalogs";
import type { FormRecord } from "../services/formEngine";
import { validateFormPayload } from "../services/formValidation.effect";
import { buildResectionPrompt, DEFAULT_PROMPT, type PromptPayload } from "../services/resectionPrompt";

export interface HandlerResponse<B> {
  readonly status: number;
  readonly body: B;
}

export interface ErrorBody {
  readonly detail: ReadonlyArray<string>;
}

export interface HandlerOptions {
  /** Default model name for assembled prompts */
  readonly modelName?: string;
  /** Report-date fallback, YYYY-MM-DD */
  readonly today?: string;
}

export const health = (): HandlerResponse<{ status: "ok" }> => ({ status: 200, body: { status: "ok" } });

export const buildPrompt = (
  payload: unknown,
  options: HandlerOptions = {}
): HandlerResponse<{ template: string; payload: PromptPayload } | ErrorBody> => {
  const outcome = validateContext(payload, { today: options.today });
  if (!outcome.ok) {
    return { status: 422, body: { detail: outcome.errors } };
  }
  const prompt = buildResectionPrompt(outcome.context, { modelName: options.modelName });
  return { status: 200, body: { template: DEFAULT_PROMPT, payload: prompt.toPromptPayload() } };
};

export const validateForm = (
  form: string,
  payload: unknown
): HandlerResponse<{ record: FormRecord } | ErrorBody> => {
  if (!isFormName(form)) {
    return { status: 404, body: { detail: [`unknown form "${form}"`] } };
  }
  const outcome = validateFormPayload(form, payload);
  if (!outcome.ok) {
    return { status: 422, body: { detail: outcome.errors } };
  }
  return { status: 200, body: { record: outcome.record } };
};
