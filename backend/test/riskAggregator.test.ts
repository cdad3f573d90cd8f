import * as assert from "assert";
import { measureCode } from "../services/analysis/codeMetrics";
import { highestSeverity, riskScore } from "../services/analysis/riskAggregator";

const SEVERITY_CYCLE = ["critical", "high", "medium", "low", "info", "unknown"];

suite("Risk aggregator", () => {
  test("highestSeverity of no findings is info", () => {
    assert.strictEqual(highestSeverity([]), "info");
  });

  test("highestSeverity follows critical > high > medium > low > info", () => {
    assert.strictEqual(
      highestSeverity([{ severity: "low" }, { severity: "critical" }, { severity: "medium" }]),
      "critical"
    );
    assert.strictEqual(highestSeverity([{ severity: "info" }, { severity: "low" }]), "low");
  });

  test("highestSeverity compares case-insensitively and ignores unknown labels", () => {
    assert.strictEqual(highestSeverity([{ severity: "HIGH" }]), "high");
    assert.strictEqual(highestSeverity([{ severity: "catastrophic" }, {}]), "info");
  });

  test("highestSeverity does not count findings without a severity", () => {
    assert.strictEqual(highestSeverity([{}]), "info");
    assert.strictEqual(highestSeverity([{ severity: null }, { severity: "low" }]), "low");
  });

  test("riskScore adds fixed points per severity", () => {
    assert.strictEqual(riskScore([]), 0);
    assert.strictEqual(riskScore([{ severity: "critical" }]), 40);
    assert.strictEqual(riskScore([{ severity: "high" }, { severity: "low" }, { severity: "info" }]), 31);
  });

  test("five medium findings outweigh one critical", () => {
    const mediums = Array.from({ length: 5 }, () => ({ severity: "medium" }));

    assert.strictEqual(riskScore(mediums), 75);
  });

  test("unknown severities score 10 and missing ones score as medium", () => {
    assert.strictEqual(riskScore([{ severity: "severe" }]), 10);
    assert.strictEqual(riskScore([{}]), 15);
    assert.strictEqual(riskScore([{ severity: null }]), 15);
  });

  test("riskScore saturates at 100", () => {
    assert.strictEqual(riskScore([{ severity: "critical" }, { severity: "critical" }, { severity: "critical" }]), 100);
    assert.strictEqual(riskScore(Array.from({ length: 250 }, () => ({ severity: "info" }))), 100);
  });

  test("adding a finding never lowers the score", () => {
    const findings: { severity: string }[] = [];
    let previous = riskScore(findings);

    for (let i = 0; i < 40; i += 1) {
      findings.push({ severity: SEVERITY_CYCLE[i % SEVERITY_CYCLE.length] ?? "info" });
      const current = riskScore(findings);
      assert.ok(current >= previous, `score dropped from ${previous} to ${current}`);
      assert.ok(current <= 100);
      previous = current;
    }
  });
});

suite("Code metrics", () => {
  test("counts lines as line breaks plus one", () => {
    assert.strictEqual(measureCode("a\nb\nc").totalLines, 3);
    assert.deepStrictEqual(measureCode(""), { totalLines: 1, functionsAnalyzed: 0 });
  });

  test("counts function tokens, including ones in comments", () => {
    const code = "// function helper\ncontract C {\n  function run() public {}\n  function stop() public {}\n}";

    assert.deepStrictEqual(measureCode(code), { totalLines: 5, functionsAnalyzed: 3 });
  });
});
