import { isRecord } from "../../types/analysis";
import logger from "../../utils/logger";

export type ParseStrategy = "direct" | "cleaned" | "braces" | "fields";

export const PARSE_FAILURE_MESSAGE = "Failed to parse AI response";
export const RAW_SNIPPET_LENGTH = 200;

export type ParseOutcome =
  | { ok: true; value: Record<string, unknown>; strategy: ParseStrategy }
  | { ok: false; error: string; raw: string };

/** Fields recovered one by one when nothing else yields a JSON object. */
export const EXTRACTABLE_FIELDS = [
  "description",
  "impact",
  "recommendation",
  "fixed_code",
  "summary",
] as const;

const CODE_FIELDS: ReadonlySet<string> = new Set(["fixed_code"]);

export const stripCodeFence = (text: string): string => {
  let result = text.trim();
  if (result.startsWith("```json")) {
    result = result.slice(7);
  } else if (result.startsWith("```")) {
    result = result.slice(3);
  }
  if (result.endsWith("```")) {
    result = result.slice(0, -3);
  }
  return result.trim();
};

export const cleanControlCharacters = (text: string): string =>
  text
    .replace(/[\r\n\t]+/g, " ")
    .replace(/[\u0000-\u001f\u007f-\u009f]/g, "")
    .replace(/ {2,}/g, " ")
    .trim();

const tryParseObject = (text: string): Record<string, unknown> | null => {
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
};

const sliceBraces = (text: string): string | null => {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  return start !== -1 && end > start ? text.slice(start, end + 1) : null;
};

export const extractFields = (text: string): Record<string, string> => {
  const fields: Record<string, string> = {};
  for (const field of EXTRACTABLE_FIELDS) {
    const match = new RegExp(`"${field}"\\s*:\\s*"((?:[^"\\\\]|\\\\.)*)"`).exec(text);
    const value = match?.[1];
    if (value === undefined) continue;

    let unescaped = value.replace(/\\"/g, '"');
    if (CODE_FIELDS.has(field)) {
      unescaped = unescaped.replace(/\\n/g, "\n");
    }
    fields[field] = unescaped;
  }
  return fields;
};

const success = (value: Record<string, unknown>, strategy: ParseStrategy): ParseOutcome => {
  logger.debug({ strategy, keys: Object.keys(value) }, "Parsed model response");
  return { ok: true, value, strategy };
};

/**
 * Turns raw model output into a JSON object, trying progressively looser
 * strategies. Never throws: total failure yields the `ok: false` outcome with
 * the first characters of the raw text.
 */
export const parseModelResponse = (rawText: string): ParseOutcome => {
  logger.debug({ snippet: rawText.slice(0, RAW_SNIPPET_LENGTH) }, "Parsing model response");

  const unfenced = stripCodeFence(rawText);
  const direct = tryParseObject(unfenced);
  if (direct) return success(direct, "direct");

  logger.debug("Direct JSON parse failed, retrying on cleaned text");
  const cleaned = cleanControlCharacters(unfenced);
  const cleanedValue = tryParseObject(cleaned);
  if (cleanedValue) return success(cleanedValue, "cleaned");

  const slice = sliceBraces(cleaned);
  if (slice !== null) {
    logger.debug("Retrying on outermost braces");
    const sliced = tryParseObject(slice);
    if (sliced) return success(sliced, "braces");
  }

  logger.debug("Falling back to field-by-field extraction");
  const fields = extractFields(unfenced);
  if (Object.keys(fields).length > 0) return success(fields, "fields");

  logger.warn({ snippet: rawText.slice(0, RAW_SNIPPET_LENGTH) }, "Model response could not be parsed");
  return { ok: false, error: PARSE_FAILURE_MESSAGE, raw: rawText.slice(0, RAW_SNIPPET_LENGTH) };
};

export default parseModelResponse;
