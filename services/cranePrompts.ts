/**
 * TWO-PHASE EXTRACTION PROMPTS
 *
 * The model first reasons freely, then emits the form as JSON between the
 * JSON_START / JSON_END sentinels. Both prompts share one report preamble.
 */

export const JSON_START = "<JSON_START>";
export const JSON_END = "<JSON_END>";

export const SYSTEM_PROMPT =
  "You are an assistant that must think step-by-step before responding. " +
  `Only emit JSON output between the delimiters ${JSON_START} and ${JSON_END}.`;

export const REASONING_INSTRUCTIONS =
  "Use a scratchpad to reason about the report before generating JSON. " +
  `Ensure that intermediate thoughts stay outside the ${JSON_START}/${JSON_END} ` +
  "delimiters so that only the final structured answer is enclosed.";

export const buildUserPrompt = (reportText: string): string => {
  const reminder =
    "Review the following report carefully. Do not produce any JSON output " +
    `until you explicitly encounter the token ${JSON_START}.`;
  return `${reminder}\n\nReport:\n${reportText.trim()}\n`;
};

export interface CranePrompts {
  readonly reasoning: string;
  readonly jsonPrefix: string;
}

export const buildCranePrompts = (reportText: string): CranePrompts => {
  const shared =
    "You are a pathology assistant preparing the CAP DCIS Resection form.\n" +
    "Use the following pathology report to populate the structured data form.\n\n" +
    `Report:\n${reportText.trim()}\n\n`;

  return {
    reasoning:
      shared +
      "Think step by step about the report to decide on each form field.\n" +
      `When you are ready to emit the structured data, write ${JSON_START} on a new line.` +
      " This signals the start of the JSON object.",
    jsonPrefix:
      shared +
      "Now emit only the JSON representation of the DCIS Resection form." +
      " The JSON must follow the dcis-resection form catalog.\n",
  };
};
