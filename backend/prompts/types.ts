export interface PromptPair {
  systemPrompt: string;
  userPrompt: string;
}
