export * from "./document/DocumentTypes.js";
export * from "./errors/DocumentErrors.js";
export * from "./policy/SectionPolicy.js";
export * from "./completion/CompletionTypes.js";
export * from "./logging/Logger.js";
export * from "./paths/PathHelper.js";
