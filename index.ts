/**
 * DCIS RESECTION FORMS
 *
 * Library surface: windowing, form validation, context validation, prompts
 * and the form-filling pipeline.
 */

export { ContextWindow } from "./services/contextWindow";

export {
  buildRegistry,
  loadRegistry,
  registryStats,
  roundTripForm,
  serializeForm,
  validateWithRegistry,
} from "./services/formEngine";
export type { FormObject, FormRecord, FormRegistry, FormScalar, FormValidationResult, FormValue } from "./services/formEngine";
export { FORM_NAMES, getFormRegistry, isFormName } from "./services/formCatalogs";
export type { FormName } from "./services/formCatalogs";
export {
  FormValidationService,
  FormValidationServiceLive,
  validateFormPayload,
  validateResectionForm,
  validateSummaryForm,
} from "./services/formValidation.effect";
export type { ValidationOutcome } from "./services/formValidation.effect";
export { decodeFormCatalog, FormCatalogSchema } from "./schemas/formCatalog";
export type { FormCatalog } from "./schemas/formCatalog";

export {
  contextToPayload,
  createPatientContext,
  normalizeContextPayload,
  todayIso,
  validateContext,
} from "./services/contextValidator";
export type { ContextOutcome, ContextPayload, PatientContextParams } from "./services/contextValidator";
export type { PatientContext, SpecimenDetail } from "./schemas/patientContext";

export {
  buildResectionPrompt,
  DEFAULT_INSTRUCTIONS,
  DEFAULT_MODEL_NAME,
  DEFAULT_PROMPT,
} from "./services/resectionPrompt";
export type { PromptPayload, ResectionPrompt } from "./services/resectionPrompt";
export {
  buildCranePrompts,
  buildUserPrompt,
  JSON_END,
  JSON_START,
  REASONING_INSTRUCTIONS,
  SYSTEM_PROMPT,
} from "./services/cranePrompts";
export { craneFill, extractJsonBlock, fillResectionForm, FormFillingModel, runFormFilling } from "./services/formFilling.effect";

export * from "./services/errors";
export { AppConfigSchema, defaultAppConfig, loadAppConfig } from "./schemas/appConfig";
export type { AppConfig } from "./schemas/appConfig";
export { appLogger, setLogLevel } from "./services/appLogger";
