/**
 * Graphviz layout through the `dot` executable.
 * DOT source goes in on stdin, the rendered file comes back on stdout.
 */

import { spawn } from "node:child_process";

import { Err, Ok, type Result } from "@codeview/core";

import { engineMissing, exportFailure, type AnalysisError } from "../../core/model.js";
import type { GraphRenderer, RenderFormat } from "../../core/ports/GraphRenderer.js";

export interface GraphvizCliOptions {
  executable: string;
  timeoutMs: number;
}

export class GraphvizCliRenderer implements GraphRenderer {
  readonly name = "graphviz-cli";

  constructor(private readonly options: GraphvizCliOptions) {}

  supports(_format: RenderFormat): boolean {
    return true;
  }

  render(dot: string, format: RenderFormat): Promise<Result<Uint8Array, AnalysisError>> {
    const { executable, timeoutMs } = this.options;

    return new Promise((resolve) => {
      const proc = spawn(executable, [`-T${format}`], {
        stdio: ["pipe", "pipe", "pipe"],
      });

      const stdout: Buffer[] = [];
      let stderr = "";
      let resolved = false;

      const timeout = setTimeout(() => {
        if (!resolved) {
          resolved = true;
          proc.kill("SIGTERM");
          resolve(Err(exportFailure(`${executable} timed out after ${timeoutMs}ms`)));
        }
      }, timeoutMs);

      proc.stdout.on("data", (data: Buffer) => {
        stdout.push(data);
      });

      proc.stderr.on("data", (data: Buffer) => {
        stderr += data.toString();
      });

      // EPIPE when the process exits before reading all input; "close" reports the exit
      proc.stdin.on("error", (error) => {
        stderr += error.message;
      });

      proc.on("close", (code) => {
        if (resolved) return;
        resolved = true;
        clearTimeout(timeout);
        if (code === 0) {
          resolve(Ok(new Uint8Array(Buffer.concat(stdout))));
        } else {
          resolve(Err(exportFailure(stderr.trim() || `${executable} exited with code ${code}`)));
        }
      });

      proc.on("error", (error: NodeJS.ErrnoException) => {
        if (resolved) return;
        resolved = true;
        clearTimeout(timeout);
        resolve(Err(error.code === "ENOENT" ? engineMissing(executable) : exportFailure(error.message)));
      });

      proc.stdin.end(dot);
    });
  }
}
