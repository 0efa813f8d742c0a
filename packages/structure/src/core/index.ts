export * from "./model.js";
export * from "./callRegistry.js";
export * from "./controlFlow.js";
export * from "./scope.js";
export type * from "./ports/FileSystem.js";
export type * from "./ports/GraphRenderer.js";
export type * from "./ports/StructureParser.js";
