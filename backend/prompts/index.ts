export { buildDetectionPrompt } from "./detection";
export { buildExplanationPrompt, type ExplanationPromptInput } from "./explanation";
export type { PromptPair } from "./types";
