import { describe, it, expect, vi, afterEach } from "vitest";
import { appLogger, getLogLevel, setLogLevel } from "../services/appLogger";
import { validateSummaryForm } from "../services/formValidation.effect";

describe("appLogger", () => {
  const initial = getLogLevel();

  afterEach(() => {
    setLogLevel(initial);
    vi.restoreAllMocks();
  });

  it("should redact clinical free text", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    setLogLevel("info");

    appLogger.info("context_checked", { clinical_history: "short", patient_id: "P-1", specimens: 2 });

    expect(warn).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(warn.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({
      level: "info",
      message: "context_checked",
      clinical_history: "[REDACTED]",
      patient_id: "[REDACTED]",
      specimens: 2,
    });
  });

  it("should drop long strings under any key", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    setLogLevel("debug");

    appLogger.debug("chunk", { note: "x".repeat(121) });

    expect(JSON.parse(String(warn.mock.calls[0]?.[0]))).toMatchObject({ note: "[REDACTED]" });
  });

  it("should filter below the threshold", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    setLogLevel("error");

    appLogger.info("hidden");
    appLogger.warn("hidden");
    appLogger.error("shown");

    expect(warn).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("should pass Effect debug logs through at the debug threshold", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    setLogLevel("debug");

    validateSummaryForm({});

    const messages = warn.mock.calls.map((call) => String(call[0]));
    expect(messages.some((line) => line.includes('"message":"form_rejected"'))).toBe(true);
  });

  it("should hold Effect debug logs back at the info threshold", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    setLogLevel("info");

    validateSummaryForm({});

    const messages = warn.mock.calls.map((call) => String(call[0]));
    expect(messages.some((line) => line.includes("form_rejected"))).toBe(false);
  });
});
