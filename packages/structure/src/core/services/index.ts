export * from "./TextRenderer.js";
export * from "./GraphModelBuilder.js";
export * from "./DotWriter.js";
export * from "./GraphExporter.js";
export * from "./StructureService.js";
