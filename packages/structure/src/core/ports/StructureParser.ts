import type { Result } from "@codeview/core";

import type { Structure } from "../model.js";

export interface SourcePosition {
  /** 1-indexed line */
  line: number;
  /** 1-indexed column */
  column: number;
}

export type ParseFailure =
  | { kind: "syntax"; message: string; position?: SourcePosition }
  | { kind: "unknown"; message: string };

/**
 * Port for turning Python source text into a Structure.
 */
export interface StructureParser {
  /**
   * @param source - Python source text
   * @param moduleName - Name the structure is rooted at (the file stem)
   */
  parseStructure(source: string, moduleName: string): Promise<Result<Structure, ParseFailure>>;
}
