export * from "./services/documents/markers/MarkerGrammar.js";
export * from "./services/documents/markers/SpanParser.js";
export * from "./services/documents/tables/MarkdownTable.js";
export * from "./services/documents/validation/StructuralValidator.js";
export * from "./services/documents/editing/BodySanitizer.js";
export * from "./services/documents/editing/MarkerPreservingEditor.js";
export * from "./services/documents/editing/TableRouting.js";
export * from "./services/documents/questions/QuestionLedger.js";
export * from "./services/documents/workflow/WorkflowTypes.js";
export * from "./services/documents/workflow/SectionState.js";
export * from "./services/documents/workflow/SectionHandlers.js";
export * from "./services/documents/workflow/WorkflowRunner.js";
export * from "./services/documents/review/ReviewTypes.js";
export * from "./services/documents/review/ReviewScope.js";
export * from "./services/documents/review/PatchValidator.js";
export * from "./services/documents/review/GatePreChecks.js";
export * from "./services/documents/review/GateResultWriter.js";
export * from "./services/documents/review/ReviewGateRunner.js";
export * from "./services/documents/review/ReviewReportRenderer.js";
export * from "./services/documents/completion/DocumentCompletion.js";
export * from "./services/documents/versioning/DocumentVersioning.js";
export * from "./services/config/PolicyRegistry.js";
export * from "./services/runtime/RunLogger.js";
