export * from "./edits/EditTypes.js";
export * from "./edits/TextLines.js";
export * from "./edits/TextNormalizer.js";
export * from "./edits/Similarity.js";
export * from "./edits/MatchEngine.js";
export * from "./edits/PatchApplier.js";
export * from "./edits/BlockParser.js";
export * from "./edits/OutcomeReporter.js";
export * from "./edits/EditPrompt.js";
export * from "./config/Config.js";
export * from "./config/ConfigLoader.js";
export * from "./errors/BlockpatchError.js";
export * from "./runtime/RunLogger.js";
