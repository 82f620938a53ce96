/**
 * CONTEXT VALIDATOR
 *
 * Boundary for patient/report context payloads (HTTP bodies, CLI flags).
 * All violations are reported together as "path: message" lines.
 */

import { Either, Schema as S } from "effect";
import { format } from "date-fns";
import {
  CALENDAR_DATE_FORMAT,
  makePatientContextSchema,
  type PatientContext,
  type SpecimenDetailInput,
} from "../schemas/patientContext";
import { FormValidationError, formatParseError } from "./errors";

export interface ContextOptions {
  /** Calendar date used when report_date is missing, YYYY-MM-DD */
  readonly today?: string;
}

export type ContextOutcome =
  | { readonly ok: true; readonly context: PatientContext; readonly errors: readonly [] }
  | { readonly ok: false; readonly context: null; readonly errors: ReadonlyArray<string> };

export const todayIso = (now: Date = new Date()): string => format(now, CALENDAR_DATE_FORMAT);

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const withoutNulls = (record: Record<string, unknown>): Record<string, unknown> =>
  Object.fromEntries(Object.entries(record).filter(([, value]) => value !== null && value !== undefined));

const isBlank = (value: unknown): boolean => typeof value === "string" && value.trim() === "";

/**
 * Null means absent, and a blank report_date falls back to today
 */
export const normalizeContextPayload = (payload: Record<string, unknown>): Record<string, unknown> => {
  const normalized = withoutNulls(payload);
  if (isBlank(normalized.report_date)) {
    delete normalized.report_date;
  }
  const specimens = normalized.specimens;
  if (Array.isArray(specimens)) {
    normalized.specimens = specimens.map((specimen: unknown) =>
      isPlainObject(specimen) ? withoutNulls(specimen) : specimen
    );
  }
  return normalized;
};

export const validateContext = (payload: unknown, options: ContextOptions = {}): ContextOutcome => {
  if (!isPlainObject(payload)) {
    return { ok: false, context: null, errors: ["payload must be an object"] };
  }
  const decode = S.decodeUnknownEither(makePatientContextSchema(options.today ?? todayIso()), {
    errors: "all",
  });
  const result = decode(normalizeContextPayload(payload));
  if (Either.isLeft(result)) {
    return { ok: false, context: null, errors: formatParseError(result.left) };
  }
  return { ok: true, context: result.right, errors: [] };
};

export interface PatientContextParams {
  readonly patientId: string;
  readonly clinicalHistory?: string;
  readonly reportDate?: string | null;
  readonly specimens?: ReadonlyArray<SpecimenDetailInput>;
}

/**
 * Typed construction path (CLI). Throws FormValidationError on violation.
 */
export const createPatientContext = (
  params: PatientContextParams,
  options: ContextOptions = {}
): PatientContext => {
  const outcome = validateContext(
    {
      patient_id: params.patientId,
      clinical_history: params.clinicalHistory,
      report_date: params.reportDate,
      specimens: params.specimens,
    },
    options
  );
  if (!outcome.ok) {
    throw new FormValidationError({ form: "context", errors: outcome.errors });
  }
  return outcome.context;
};

export interface ContextPayload {
  readonly patient_id: string;
  readonly clinical_history: string;
  readonly report_date: string;
  readonly specimens: ReadonlyArray<{
    readonly identifier: string;
    readonly description: string;
    readonly margin_status: string | null;
  }>;
}

export const contextToPayload = (context: PatientContext): ContextPayload => ({
  patient_id: context.patient_id,
  clinical_history: context.clinical_history,
  report_date: context.report_date,
  specimens: context.specimens.map((specimen) => ({
    identifier: specimen.identifier,
    description: specimen.description,
    margin_status: specimen.margin_status,
  })),
});
