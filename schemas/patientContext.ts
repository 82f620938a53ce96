/**
 * PATIENT / REPORT CONTEXT SCHEMAS
 *
 * The context a resection prompt is assembled from. Free text is trimmed on
 * decode; the report date falls back to "today", which callers inject so that
 * decoding stays deterministic.
 */

import { Schema as S } from "effect";
import { isValid, parse } from "date-fns";

export const CALENDAR_DATE_FORMAT = "yyyy-MM-dd";

const CALENDAR_DATE = /^\d{4}-\d{2}-\d{2}$/;

/** True for real YYYY-MM-DD dates (rejects 2024-02-30) */
export const isCalendarDate = (value: string): boolean =>
  CALENDAR_DATE.test(value) && isValid(parse(value, CALENDAR_DATE_FORMAT, new Date()));

const NonBlankText = S.Trim.pipe(
  S.minLength(1, { message: () => "must contain non-whitespace characters" })
);

/** Trimmed; blank becomes null */
const MarginStatusSchema = S.transform(S.String, S.NullOr(S.String), {
  strict: true,
  decode: (value) => {
    const trimmed = value.trim();
    return trimmed === "" ? null : trimmed;
  },
  encode: (value) => value ?? "",
});

// Optional keys are exact: null and blank values are dropped before decoding
// (see normalizeContextPayload), so each key reports only its own failure.

export const SpecimenDetailSchema = S.Struct({
  identifier: NonBlankText,
  description: S.optionalWith(S.String, { exact: true, default: () => "" }),
  margin_status: S.optionalWith(MarginStatusSchema, { exact: true, default: () => null }),
});
export type SpecimenDetail = S.Schema.Type<typeof SpecimenDetailSchema>;
export type SpecimenDetailInput = S.Schema.Encoded<typeof SpecimenDetailSchema>;

const CalendarDate = S.Trim.pipe(
  S.filter(isCalendarDate, { message: () => "must be a calendar date (YYYY-MM-DD)" })
);

/**
 * Build the context schema for a given "today" (YYYY-MM-DD)
 */
export const makePatientContextSchema = (today: string) =>
  S.Struct({
    patient_id: NonBlankText,
    clinical_history: S.optionalWith(S.Trim, { exact: true, default: () => "" }),
    report_date: S.optionalWith(CalendarDate, { exact: true, default: () => today }),
    specimens: S.optionalWith(S.Array(SpecimenDetailSchema), { exact: true, default: () => [] }),
  });

export type PatientContextSchema = ReturnType<typeof makePatientContextSchema>;
export type PatientContext = S.Schema.Type<PatientContextSchema>;
