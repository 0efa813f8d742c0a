import fs from "node:fs";
import path from "node:path";

import { type Result, Ok, Err, toError } from "@codeview/core";

import type { FileSystem } from "../../core/ports/FileSystem.js";

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Node.js implementation of the FileSystem port.
 */
export class NodeFileSystem implements FileSystem {
  private readonly basePath: string;

  constructor(basePath?: string) {
    this.basePath = basePath ?? process.cwd();
  }

  private resolvePath(filePath: string): string {
    if (path.isAbsolute(filePath)) {
      return filePath;
    }
    return path.resolve(this.basePath, filePath);
  }

  exists(filePath: string): boolean {
    try {
      return fs.existsSync(this.resolvePath(filePath));
    } catch {
      return false;
    }
  }

  read(filePath: string): Result<string, Error> {
    try {
      return Ok(utf8.decode(fs.readFileSync(this.resolvePath(filePath))));
    } catch (error) {
      return Err(toError(error));
    }
  }

  /**
   * Write to a temporary sibling, then rename over the target.
   */
  writeAtomic(filePath: string, content: string | Uint8Array): Result<number, Error> {
    const resolved = this.resolvePath(filePath);
    const temporary = path.join(
      path.dirname(resolved),
      `.${path.basename(resolved)}.${process.pid}.${Date.now()}.tmp`,
    );

    try {
      fs.mkdirSync(path.dirname(resolved), { recursive: true });
      fs.writeFileSync(temporary, content);
      fs.renameSync(temporary, resolved);
      return Ok(fs.statSync(resolved).size);
    } catch (error) {
      fs.rmSync(temporary, { force: true });
      return Err(toError(error));
    }
  }
}
