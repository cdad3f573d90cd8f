import * as assert from "assert";
import {
  EMPTY_EXPLANATION,
  attachExplanation,
  normalizeCategory,
  normalizeConfidence,
  normalizeFinding,
  normalizeSeverity,
  readExplanation,
} from "../services/analysis/findingNormalizer";

suite("Finding normalizer", () => {
  test("lower-cases values from the closed sets", () => {
    const draft = normalizeFinding({ type: "Reentrancy", severity: "CRITICAL", confidence: "High" });

    assert.strictEqual(draft.category, "reentrancy");
    assert.strictEqual(draft.severity, "critical");
    assert.strictEqual(draft.confidence, "high");
  });

  test("defaults unknown values to other / medium / medium", () => {
    const draft = normalizeFinding({ type: "flash_loan", severity: "severe", confidence: "certain" });

    assert.strictEqual(draft.category, "other");
    assert.strictEqual(draft.severity, "medium");
    assert.strictEqual(draft.confidence, "medium");
  });

  test("treats non-string vocabulary values as absent", () => {
    assert.strictEqual(normalizeCategory(42), "other");
    assert.strictEqual(normalizeSeverity(null), "medium");
    assert.strictEqual(normalizeConfidence(["high"]), "medium");
  });

  test("reads the category key when type is missing", () => {
    assert.strictEqual(normalizeFinding({ category: "access_control" }).category, "access_control");
  });

  test("produces a complete draft from an empty finding", () => {
    assert.deepStrictEqual(normalizeFinding({}), {
      category: "other",
      severity: "medium",
      confidence: "medium",
      lineStart: null,
      lineEnd: null,
      functionName: null,
      codeSnippet: null,
      briefReason: null,
      description: null,
      impact: null,
      recommendation: null,
      fixedCode: null,
      verified: false,
    });
  });

  test("keeps location fields on a best-effort basis", () => {
    const draft = normalizeFinding({
      line_start: "12",
      line_end: 14.7,
      function_name: "withdraw",
      vulnerable_code: "msg.sender.call{value: amount}(\"\");",
      brief_reason: "",
    });

    assert.strictEqual(draft.lineStart, 12);
    assert.strictEqual(draft.lineEnd, 14);
    assert.strictEqual(draft.functionName, "withdraw");
    assert.strictEqual(draft.codeSnippet, 'msg.sender.call{value: amount}("");');
    assert.strictEqual(draft.briefReason, null);
  });

  test("rejects non-positive or non-numeric line numbers", () => {
    const draft = normalizeFinding({ line_start: -3, line_end: "abc" });

    assert.strictEqual(draft.lineStart, null);
    assert.strictEqual(draft.lineEnd, null);
  });

  test("attaches explanation fields read from the explanation response", () => {
    const explanation = readExplanation({ description: "Reentrancy", impact: "", fixed_code: "x = 0;" });
    const draft = attachExplanation(normalizeFinding({ type: "reentrancy" }), explanation);

    assert.deepStrictEqual(explanation, {
      description: "Reentrancy",
      impact: null,
      recommendation: null,
      fixedCode: "x = 0;",
    });
    assert.strictEqual(draft.category, "reentrancy");
    assert.strictEqual(draft.description, "Reentrancy");
    assert.strictEqual(draft.fixedCode, "x = 0;");
  });

  test("the empty explanation leaves every field null", () => {
    const draft = attachExplanation(normalizeFinding({}), EMPTY_EXPLANATION);

    assert.strictEqual(draft.description, null);
    assert.strictEqual(draft.recommendation, null);
  });
});
