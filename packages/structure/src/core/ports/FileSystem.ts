import type { Result } from "@codeview/core";

/**
 * Port for the file operations the analyzer needs.
 */
export interface FileSystem {
  exists(filePath: string): boolean;

  read(filePath: string): Result<string, Error>;

  /**
   * Replace the file's content in one step: readers never observe a partial
   * file and a failed write leaves nothing behind.
   */
  writeAtomic(filePath: string, content: string | Uint8Array): Result<number, Error>;
}
