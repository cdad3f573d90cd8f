import {
  ConfidenceLevel,
  ExplanationFields,
  FindingDraft,
  RawFinding,
  Severity,
  VulnerabilityCategory,
  isConfidenceLevel,
  isSeverity,
  isVulnerabilityCategory,
} from "../../types/analysis";

export const EMPTY_EXPLANATION: Readonly<ExplanationFields> = Object.freeze({
  description: null,
  impact: null,
  recommendation: null,
  fixedCode: null,
});

const lowerCased = (value: unknown): string | null =>
  typeof value === "string" ? value.toLowerCase() : null;

export const readText = (value: unknown): string | null =>
  typeof value === "string" && value.trim() !== "" ? value : null;

const readLine = (value: unknown): number | null => {
  const parsed = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  if (typeof parsed !== "number" || !Number.isFinite(parsed) || parsed <= 0) {
    return null;
  }
  return Math.trunc(parsed);
};

export const normalizeCategory = (value: unknown): VulnerabilityCategory => {
  const category = lowerCased(value);
  return category !== null && isVulnerabilityCategory(category) ? category : "other";
};

export const normalizeSeverity = (value: unknown): Severity => {
  const severity = lowerCased(value);
  return severity !== null && isSeverity(severity) ? severity : "medium";
};

export const normalizeConfidence = (value: unknown): ConfidenceLevel => {
  const confidence = lowerCased(value);
  return confidence !== null && isConfidenceLevel(confidence) ? confidence : "medium";
};

/**
 * Coerces one detected finding into a storable draft. Unknown vocabulary
 * values fall back to `other` / `medium` / `medium`.
 */
export const normalizeFinding = (raw: RawFinding): FindingDraft => ({
  category: normalizeCategory(raw.type ?? raw.category),
  severity: normalizeSeverity(raw.severity),
  confidence: normalizeConfidence(raw.confidence),
  lineStart: readLine(raw.line_start),
  lineEnd: readLine(raw.line_end),
  functionName: readText(raw.function_name),
  codeSnippet: readText(raw.vulnerable_code),
  briefReason: readText(raw.brief_reason),
  ...EMPTY_EXPLANATION,
  verified: false,
});

export const readExplanation = (value: Record<string, unknown>): ExplanationFields => ({
  description: readText(value.description),
  impact: readText(value.impact),
  recommendation: readText(value.recommendation),
  fixedCode: readText(value.fixed_code),
});

export const attachExplanation = (
  draft: FindingDraft,
  explanation: ExplanationFields
): FindingDraft => ({ ...draft, ...explanation });

export default normalizeFinding;
