import type { PromptPair } from "./types";

export interface ExplanationPromptInput {
  category: string;
  severity: string;
  functionName: string;
  vulnerableCode: string;
  briefReason: string;
  contractCode: string;
}

const EXPLANATION_SYSTEM_PROMPT = `You are a smart contract security expert who explains vulnerabilities in simple terms.

Your job is to:
1. Explain what the vulnerability is
2. Explain why it is dangerous
3. Provide a clear recommendation to fix it
4. Show the corrected code if possible

Be clear and concise. Avoid overly technical jargon when possible.`;

export const buildExplanationPrompt = ({
  category,
  severity,
  functionName,
  vulnerableCode,
  briefReason,
  contractCode,
}: ExplanationPromptInput): PromptPair => ({
  systemPrompt: EXPLANATION_SYSTEM_PROMPT,
  userPrompt: `Explain this smart contract vulnerability:

VULNERABILITY TYPE: ${category}
SEVERITY: ${severity}
FUNCTION NAME: ${functionName}

VULNERABLE CODE:
${vulnerableCode}

BRIEF REASON: ${briefReason}

FULL CONTRACT CONTEXT:
${contractCode}

Please provide:
1. DESCRIPTION: A clear explanation of what this vulnerability is (2-3 sentences)
2. IMPACT: What could happen if this is exploited (2-3 sentences)
3. RECOMMENDATION: How to fix this issue (2-3 sentences)
4. FIXED_CODE: The corrected version of the vulnerable code

Format your response as JSON:
{
  "description": "...",
  "impact": "...",
  "recommendation": "...",
  "fixed_code": "..."
}

Return ONLY the JSON object. No other text.`,
});

export default buildExplanationPrompt;
