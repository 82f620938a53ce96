/**
 * DCIS CLI
 *
 *   window <path> [--window-size N] [--overlap N]
 *   assemble --patient-id ID --history TEXT [--model-name M] [--report-date YYYY-MM-DD] [--instructions TEXT]
 *   validate <path> [--form dcis-resection|dcis-summary|context]
 *   prompts <path>
 *
 * Exit codes: 0 ok, 1 invalid input data, 2 usage or configuration error.
 */

import { parseArgs } from "node:util";
import { Either } from "effect";
import { loadAppConfig, type AppConfig } from "../schemas/appConfig";
import { appLogger, setLogLevel } from "../services/appLogger";
import { buildCranePrompts, buildUserPrompt, SYSTEM_PROMPT } from "../services/cranePrompts";
import { ContextWindow } from "../services/contextWindow";
import { createPatientContext, contextToPayload, validateContext } from "../services/contextValidator";
import { CatalogError, ConfigError, FormValidationError, WindowConfigError } from "../services/errors";
import { isFormName } from "../services/formCatalogs";
import { validateFormPayload } from "../services/formValidation.effect";
import { buildResectionPrompt } from "../services/resectionPrompt";

export interface CliIO {
  readonly stdout: (line: string) => void;
  readonly stderr: (line: string) => void;
  readonly readFile: (path: string) => Promise<string>;
  readonly env?: Readonly<Record<string, string | undefined>>;
  /** Override for report_date defaults, YYYY-MM-DD */
  readonly today?: string;
}

export const USAGE = [
  "usage: dcis <command> [options]",
  "  window <path> [--window-size N] [--overlap N]",
  "  assemble --patient-id ID --history TEXT [--model-name M] [--report-date YYYY-MM-DD] [--instructions TEXT]",
  "  validate <path> [--form dcis-resection|dcis-summary|context]",
  "  prompts <path>",
].join("\n");

class UsageError extends Error {}

const OPTIONS = {
  "window-size": { type: "string" },
  overlap: { type: "string" },
  "patient-id": { type: "string" },
  history: { type: "string" },
  "model-name": { type: "string" },
  "report-date": { type: "string" },
  instructions: { type: "string" },
  form: { type: "string" },
} as const;

const parseOptions = (args: ReadonlyArray<string>) => {
  try {
    return parseArgs({ args: [...args], options: OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
};

const singlePath = (positionals: ReadonlyArray<string>, command: string): string => {
  const [path, ...extra] = positionals;
  if (path === undefined || extra.length > 0) {
    throw new UsageError(`${command} takes exactly one <path>`);
  }
  return path;
};

const readInput = async (io: CliIO, path: string): Promise<string> => {
  try {
    return await io.readFile(path);
  } catch (error) {
    throw new UsageError(`cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
};

const integerFlag = (raw: string | undefined, fallback: number): number =>
  raw === undefined ? fallback : Number(raw);

const parseJson = (text: string, path: string): Either.Either<unknown, string> =>
  Either.try({
    try: (): unknown => JSON.parse(text),
    catch: (error) => `${path}: not valid JSON (${error instanceof Error ? error.message : String(error)})`,
  });

const toJson = (value: unknown): string => JSON.stringify(value, null, 2);

export const runCli = async (argv: ReadonlyArray<string>, io: CliIO): Promise<number> => {
  try {
    const loaded = loadAppConfig(io.env ?? {});
    if (Either.isLeft(loaded)) throw loaded.left;
    const config: AppConfig = loaded.right;
    setLogLevel(config.logLevel);

    const [command, ...rest] = argv;
    if (command === "--help" || command === "-h") {
      io.stdout(USAGE);
      return 0;
    }
    if (command === undefined) {
      io.stderr(USAGE);
      return 2;
    }

    const { values, positionals } = parseOptions(rest);

    switch (command) {
      case "window": {
        const path = singlePath(positionals, command);
        const window = new ContextWindow(
          integerFlag(values["window-size"], config.windowSize),
          integerFlag(values.overlap, config.overlap)
        );
        const chunks = window.generate(await readInput(io, path));
        chunks.forEach((text, index) => io.stdout(JSON.stringify({ index: index + 1, text })));
        appLogger.info("cli_window", { windows: chunks.length, windowSize: window.windowSize });
        return 0;
      }

      case "assemble": {
        const patientId = values["patient-id"];
        const history = values.history;
        if (patientId === undefined || history === undefined) {
          throw new UsageError("assemble requires --patient-id and --history");
        }
        const context = createPatientContext(
          { patientId, clinicalHistory: history, reportDate: values["report-date"] },
          { today: io.today }
        );
        const prompt = buildResectionPrompt(context, {
          instructions: values.instructions,
          modelName: values["model-name"] ?? config.modelName,
        });
        io.stdout(toJson(prompt.toPromptPayload()));
        return 0;
      }

      case "validate": {
        const path = singlePath(positionals, command);
        const requested = values.form ?? "dcis-resection";
        const form = requested === "context" ? requested : isFormName(requested) ? requested : undefined;
        if (form === undefined) {
          throw new UsageError(`unknown form "${requested}"`);
        }
        const parsedJson = parseJson(await readInput(io, path), path);
        if (Either.isLeft(parsedJson)) {
          io.stderr(parsedJson.left);
          return 1;
        }
        const outcome =
          form === "context"
            ? validateContext(parsedJson.right, { today: io.today })
            : validateFormPayload(form, parsedJson.right);
        if (!outcome.ok) {
          outcome.errors.forEach((line) => io.stderr(line));
          return 1;
        }
        io.stdout(toJson("context" in outcome ? contextToPayload(outcome.context) : outcome.record));
        return 0;
      }

      case "prompts": {
        const report = await readInput(io, singlePath(positionals, command));
        const prompts = buildCranePrompts(report);
        io.stdout(
          toJson({
            system: SYSTEM_PROMPT,
            user: buildUserPrompt(report),
            reasoning: prompts.reasoning,
            json_prefix: prompts.jsonPrefix,
          })
        );
        return 0;
      }

      default:
        throw new UsageError(`unknown command "${command}"`);
    }
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`error: ${error.message}`);
      io.stderr(USAGE);
      return 2;
    }
    if (error instanceof FormValidationError) {
      error.errors.forEach((line) => io.stderr(line));
      return 1;
    }
    if (error instanceof WindowConfigError || error instanceof ConfigError || error instanceof CatalogError) {
      io.stderr(`error: ${error.message}`);
      return 2;
    }
    throw error;
  }
};
