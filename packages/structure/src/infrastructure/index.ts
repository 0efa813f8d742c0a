export { NodeFileSystem } from "./filesystem/NodeFileSystem.js";
export { TreeSitterPythonParser } from "./parsers/TreeSitterPythonParser.js";
export { extractStructure } from "./parsers/StructureExtractor.js";
export { resolveName, UNRESOLVED } from "./parsers/NameResolver.js";
export { cleanDocstring } from "./parsers/pythonSyntax.js";
export { GraphvizCliRenderer, type GraphvizCliOptions } from "./renderers/GraphvizCliRenderer.js";
export { VizRenderer } from "./renderers/VizRenderer.js";
export { createRenderers, type RendererSettings } from "./renderers/createRenderers.js";
