import type { PromptPair } from "./types";

const DETECTION_SYSTEM_PROMPT = `You are an expert smart contract security auditor.
Your job is to analyze Solidity code and identify security vulnerabilities.

You must respond ONLY with valid JSON. No explanations, no markdown, just JSON.

Focus on these vulnerability types:
1. reentrancy - External calls made before state updates
2. integer_overflow - Unchecked arithmetic (compilers before 0.8.0 or unchecked blocks)
3. access_control - Missing or improper access restrictions
4. unchecked_call - Low-level calls whose return value is ignored
5. frontrunning - Transactions exposed to MEV or sandwich attacks

For each vulnerability found, provide:
- type: one of the types listed above, or "other"
- severity: "critical", "high", "medium", "low", or "info"
- confidence: "high", "medium", or "low"
- line_start: starting line number (approximate if unsure)
- line_end: ending line number (approximate if unsure)
- function_name: name of the affected function
- vulnerable_code: the specific vulnerable code snippet
- brief_reason: one sentence explaining why this is vulnerable`;

const OUTPUT_SHAPE = `{
  "vulnerabilities": [
    {
      "type": "reentrancy",
      "severity": "critical",
      "confidence": "high",
      "line_start": 25,
      "line_end": 30,
      "function_name": "withdraw",
      "vulnerable_code": "payable(msg.sender).transfer(balance);",
      "brief_reason": "State update happens after external call"
    }
  ],
  "summary": "Brief overall assessment",
  "total_issues": 1
}`;

const EMPTY_SHAPE = `{
  "vulnerabilities": [],
  "summary": "No vulnerabilities detected",
  "total_issues": 0
}`;

export const buildDetectionPrompt = (contractCode: string): PromptPair => ({
  systemPrompt: DETECTION_SYSTEM_PROMPT,
  userPrompt: `Analyze this Solidity smart contract for security vulnerabilities.

CONTRACT CODE:
${contractCode}

Respond with a JSON object in this exact format:
${OUTPUT_SHAPE}

If no vulnerabilities are found, return:
${EMPTY_SHAPE}

IMPORTANT: Return ONLY the JSON object. No other text.`,
});

export default buildDetectionPrompt;
