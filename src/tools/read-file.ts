import * as z from "zod";
import { readFile, stat } from "node:fs/promises";
import { createTool } from "../tool-registry.js";
import { formatToolFailure } from "../errors.js";
import type { WorkspaceGuard } from "../workspace-guard.js";
import { errorCode, errorMessage, isPermissionError } from "./fs-errors.js";

export const MAX_READ_CHARS = 10_000;
export const READ_TRUNCATION_MARKER = "\n\n[... File truncated due to length ...]";

export function createReadFileTool(guard: WorkspaceGuard) {
  return createTool({
    name: "read_file",
    description:
      "Read the contents of a given relative file path. Use this when you want to see what's inside a file. Do not use this with directory names.",
    inputSchema: z
      .object({
        path: z.string().describe("The relative path of a file in the working directory."),
      })
      .strict(),
    async execute({ path: filePath }) {
      try {
        const guarded = await guard.resolve(filePath);
        if (!guarded.ok) return formatToolFailure(guarded.failure);

        const stats = await stat(guarded.path).catch(() => undefined);
        if (!stats?.isFile()) {
          return formatToolFailure({
            code: "NotAFile",
            message: `Path '${filePath}' is not a file or does not exist.`,
          });
        }

        const content = await readFile(guarded.path, "utf-8");
        if (content.length > MAX_READ_CHARS) {
          return content.slice(0, MAX_READ_CHARS) + READ_TRUNCATION_MARKER;
        }
        return content;
      } catch (err: unknown) {
        if (errorCode(err) === "ENOENT") {
          return `Error: File not found at path '${filePath}'`;
        }
        if (isPermissionError(err)) {
          return `Error: Permission denied to read file '${filePath}'`;
        }
        return `Error reading file '${filePath}': ${errorMessage(err)}`;
      }
    },
  });
}
