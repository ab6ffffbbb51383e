export * from "./types";
export { OpenAiAdvisoryModel, MAX_PROMPT_VARIANTS } from "./openai";
export { extractJson, normalizeSuggestion, normalizeExplanation } from "./normalize";
