import * as assert from "assert";
import { buildDetectionPrompt, buildExplanationPrompt } from "../prompts";

const CODE = "pragma solidity ^0.8.0;\ncontract Vault {}";

suite("Prompts", () => {
  test("detection prompt embeds the contract and demands JSON", () => {
    const { systemPrompt, userPrompt } = buildDetectionPrompt(CODE);

    assert.ok(systemPrompt.includes("You must respond ONLY with valid JSON"));
    assert.ok(userPrompt.includes(`CONTRACT CODE:\n${CODE}`));
    assert.ok(userPrompt.includes('"vulnerabilities": []'));
  });

  test("explanation prompt carries the finding and the full contract", () => {
    const { userPrompt } = buildExplanationPrompt({
      category: "reentrancy",
      severity: "critical",
      functionName: "withdraw",
      vulnerableCode: "msg.sender.call{value: amount}(\"\");",
      briefReason: "Balance is cleared after the call",
      contractCode: CODE,
    });

    assert.ok(userPrompt.includes("VULNERABILITY TYPE: reentrancy"));
    assert.ok(userPrompt.includes("SEVERITY: critical"));
    assert.ok(userPrompt.includes("FUNCTION NAME: withdraw"));
    assert.ok(userPrompt.includes("VULNERABLE CODE:\nmsg.sender.call{value: amount}(\"\");"));
    assert.ok(userPrompt.includes("BRIEF REASON: Balance is cleared after the call"));
    assert.ok(userPrompt.includes(`FULL CONTRACT CONTEXT:\n${CODE}`));
  });
});
