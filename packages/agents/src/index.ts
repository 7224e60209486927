export * from "./adapters/AdapterTypes.js";
export * from "./adapters/openai/OpenAiAdapter.js";
export * from "./profiles/ProfileLoader.js";
export * from "./prompts/PromptBuilder.js";
export * from "./parsing/JsonExtraction.js";
export * from "./CompletionService/LlmCompletionService.js";
