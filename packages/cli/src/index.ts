export * from "./config/ConfigLoader.js";
export * from "./documents/DocumentStore.js";
export * from "./commands/run/RunCommands.js";
export * from "./commands/validate/ValidateCommands.js";
export * from "./commands/questions/QuestionsCommands.js";
export { ReqforgeEntrypoint } from "./bin/ReqforgeEntrypoint.js";
