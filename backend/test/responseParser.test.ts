import * as assert from "assert";
import {
  PARSE_FAILURE_MESSAGE,
  cleanControlCharacters,
  parseModelResponse,
  stripCodeFence,
} from "../services/analysis/responseParser";

suite("Response parser", () => {
  test("parses well-formed JSON directly", () => {
    const mapping = {
      description: "Reentrancy in withdraw",
      impact: "Funds can be drained",
      recommendation: "Apply checks-effects-interactions",
      fixed_code: "balance = 0;\npayable(msg.sender).transfer(amount);",
      summary: "One issue",
    };

    const outcome = parseModelResponse(JSON.stringify(mapping));

    assert.ok(outcome.ok);
    assert.strictEqual(outcome.strategy, "direct");
    assert.deepStrictEqual(outcome.value, mapping);
  });

  test("fenced JSON yields the same mapping as the unfenced text", () => {
    const unfenced = '{"vulnerabilities":[],"summary":"ok","total_issues":0}';
    const outcome = parseModelResponse("```json\n" + unfenced + "\n```");

    assert.ok(outcome.ok);
    assert.strictEqual(outcome.strategy, "direct");
    assert.deepStrictEqual(outcome.value, JSON.parse(unfenced));
  });

  test("strips an untagged fence", () => {
    const outcome = parseModelResponse('```\n{"summary": "ok"}\n```');

    assert.ok(outcome.ok);
    assert.deepStrictEqual(outcome.value, { summary: "ok" });
  });

  test("recovers a description containing a literal newline", () => {
    const raw = '{"description": "Funds can be drained\nbefore the balance update", "impact": "Loss of funds"}';

    const outcome = parseModelResponse(raw);

    assert.ok(outcome.ok);
    assert.strictEqual(outcome.strategy, "cleaned");
    assert.strictEqual(outcome.value.description, "Funds can be drained before the balance update");
    assert.strictEqual(outcome.value.impact, "Loss of funds");
  });

  test("drops control characters that break JSON strings", () => {
    const outcome = parseModelResponse('{"summary": "ok\u0007"}');

    assert.ok(outcome.ok);
    assert.strictEqual(outcome.strategy, "cleaned");
    assert.deepStrictEqual(outcome.value, { summary: "ok" });
  });

  test("extracts the object between the outermost braces of surrounding prose", () => {
    const raw =
      'Sure! Here is my analysis:\n{"summary": "No issues", "vulnerabilities": []}\nLet me know if you need more.';

    const outcome = parseModelResponse(raw);

    assert.ok(outcome.ok);
    assert.strictEqual(outcome.strategy, "braces");
    assert.deepStrictEqual(outcome.value, { summary: "No issues", vulnerabilities: [] });
  });

  test("falls back to field extraction when the closing brace is missing", () => {
    const raw =
      '{"description": "Reentrancy in withdraw", "impact": "Attacker drains the vault", ' +
      '"fixed_code": "balances[msg.sender] = 0;\\npayable(msg.sender).transfer(amount);"';

    const outcome = parseModelResponse(raw);

    assert.ok(outcome.ok);
    assert.strictEqual(outcome.strategy, "fields");
    assert.deepStrictEqual(outcome.value, {
      description: "Reentrancy in withdraw",
      impact: "Attacker drains the vault",
      fixed_code: "balances[msg.sender] = 0;\npayable(msg.sender).transfer(amount);",
    });
  });

  test("unescapes quotes in extracted fields", () => {
    const outcome = parseModelResponse('Explanation: "description": "Uses \\"tx.origin\\" for auth", trailing');

    assert.ok(outcome.ok);
    assert.strictEqual(outcome.strategy, "fields");
    assert.deepStrictEqual(outcome.value, { description: 'Uses "tx.origin" for auth' });
  });

  test("returns the failure outcome for pure prose", () => {
    const raw = "I reviewed the contract and everything looks fine to me.";

    const outcome = parseModelResponse(raw);

    assert.deepStrictEqual(outcome, { ok: false, error: PARSE_FAILURE_MESSAGE, raw });
  });

  test("keeps only the first 200 characters of unparseable output", () => {
    const outcome = parseModelResponse("x".repeat(500));

    assert.ok(!outcome.ok);
    assert.strictEqual(outcome.raw, "x".repeat(200));
  });

  test("does not accept JSON that is not an object", () => {
    const outcome = parseModelResponse("[1, 2, 3]");

    assert.strictEqual(outcome.ok, false);
  });

  test("stripCodeFence and cleanControlCharacters", () => {
    assert.strictEqual(stripCodeFence("  ```json\n{}\n```  "), "{}");
    assert.strictEqual(cleanControlCharacters("a\r\n\tb   c\u0000d"), "a b cd");
  });
});
