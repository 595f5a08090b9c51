import * as z from "zod";
import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { createTool } from "../tool-registry.js";
import { formatToolFailure } from "../errors.js";
import type { WorkspaceGuard } from "../workspace-guard.js";
import { errorCode, errorMessage, isPermissionError } from "./fs-errors.js";

export const EDIT_OK = "OK";

/**
 * Undo the double escaping models sometimes produce inside JSON string
 * arguments: literal \n, \t and \" become a newline, a tab and a quote.
 */
export function unescapeModelText(text: string): string {
  return text.replaceAll("\\n", "\n").replaceAll("\\t", "\t").replaceAll('\\"', '"');
}

async function createFile(guardedPath: string, requested: string, content: string): Promise<string> {
  try {
    await mkdir(dirname(guardedPath), { recursive: true });
    await writeFile(guardedPath, content, "utf-8");
    return `Successfully created file ${requested}`;
  } catch (err: unknown) {
    if (isPermissionError(err)) {
      return `Error: Permission denied to create file or directory for '${requested}'`;
    }
    return `Error creating file '${requested}': ${errorMessage(err)}`;
  }
}

export function createEditFileTool(guard: WorkspaceGuard) {
  return createTool({
    name: "edit_file",
    description:
      "Make edits to a text file by replacing ALL occurrences of 'old_str' with 'new_str'. 'old_str' and 'new_str' MUST be different. If the file specified with path doesn't exist AND 'old_str' is an empty string, it will be created with 'new_str' as content. USE WITH CAUTION.",
    inputSchema: z
      .object({
        path: z.string().describe("The relative path to the file."),
        old_str: z
          .string()
          .describe(
            'Text to search for. Must match exactly. Use an empty string "" to create a new file if it doesn\'t exist.',
          ),
        new_str: z.string().describe("Text to replace ALL occurrences of old_str with."),
      })
      .strict(),
    async execute({ path, old_str: oldStr, new_str: newStr }) {
      if (oldStr === newStr) {
        return formatToolFailure({
          code: "NoOpEdit",
          message: "'old_str' and 'new_str' must be different for editing.",
        });
      }
      if (path === "") {
        return formatToolFailure({
          code: "ToolArgumentMismatch",
          message: "'path' cannot be empty.",
        });
      }

      try {
        const guarded = await guard.resolve(path);
        if (!guarded.ok) return formatToolFailure(guarded.failure);

        const stats = await stat(guarded.path).catch((err: unknown) => {
          if (errorCode(err) === "ENOENT") return undefined;
          throw err;
        });

        if (!stats) {
          if (oldStr === "") {
            return await createFile(guarded.path, path, newStr);
          }
          return formatToolFailure({
            code: "FileNotFound",
            message: `File not found at path '${path}' and 'old_str' is not empty (cannot replace in non-existent file).`,
          });
        }

        if (!stats.isFile()) {
          return formatToolFailure({
            code: "NotAFile",
            message: `Path '${path}' exists but is not a file.`,
          });
        }

        if (oldStr === "") {
          return formatToolFailure({
            code: "FileExists",
            message: `File '${path}' already exists. Use a non-empty 'old_str' to edit it.`,
          });
        }

        const original = await readFile(guarded.path, "utf-8");
        const search = unescapeModelText(oldStr);
        const replacement = unescapeModelText(newStr);

        if (search !== "" && !original.includes(search)) {
          const trimmed = oldStr.trim();
          if (trimmed !== "" && trimmed !== oldStr && original.includes(trimmed)) {
            return formatToolFailure({
              code: "PatternNotFound",
              message: `'old_str' ('${oldStr}') not found exactly in file. Did you mean '${trimmed}' (ignoring leading/trailing whitespace)?`,
            });
          }
          return formatToolFailure({
            code: "PatternNotFound",
            message: `'old_str' ('${oldStr}') not found exactly in file '${path}'. Replacement aborted.`,
          });
        }

        const updated = original.split(search).join(replacement);

        if (updated === original) {
          return formatToolFailure({
            code: "NoChangeWarning",
            message: `Replacing '${oldStr}' with '${newStr}' resulted in no changes to the file '${path}'. Check if 'old_str' exists.`,
          });
        }

        await writeFile(guarded.path, updated, "utf-8");
        return EDIT_OK;
      } catch (err: unknown) {
        if (errorCode(err) === "ENOENT") {
          return `Error: File not found at path '${path}'`;
        }
        if (isPermissionError(err)) {
          return `Error: Permission denied to read or write file '${path}'`;
        }
        return `Error editing file '${path}': ${errorMessage(err)}`;
      }
    },
  });
}
