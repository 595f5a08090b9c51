import * as z from "zod";
import { readdir, stat } from "node:fs/promises";
import type { Dirent } from "node:fs";
import { join } from "node:path";
import { createTool } from "../tool-registry.js";
import { formatToolFailure } from "../errors.js";
import type { WorkspaceGuard } from "../workspace-guard.js";
import { errorCode, errorMessage, isPermissionError } from "./fs-errors.js";

export const MAX_LIST_ENTRIES = 200;
export const LIST_TRUNCATION_MARKER = "[... Directory listing truncated due to size ...]";

async function isDirectoryEntry(parent: string, entry: Dirent): Promise<boolean> {
  if (entry.isDirectory()) return true;
  if (!entry.isSymbolicLink()) return false;
  // Follow links so a linked directory still lists with a trailing slash
  const target = await stat(join(parent, entry.name)).catch(() => undefined);
  return target?.isDirectory() ?? false;
}

/**
 * Entries are rendered against the path the caller gave, never the
 * absolute one, so the listing does not expose the filesystem layout.
 */
export function displayPath(requested: string, name: string, isDirectory: boolean): string {
  const base = requested.replace(/\/+$/, "");
  const joined = base === "" ? `/${name}` : `${base}/${name}`;
  return isDirectory ? `${joined}/` : joined;
}

export function createListFilesTool(guard: WorkspaceGuard) {
  return createTool({
    name: "list_files",
    description:
      "List files and directories at a given relative path. If no path is provided, lists files in the current directory. Directories are marked with a trailing '/'.",
    inputSchema: z
      .object({
        path: z
          .string()
          .default(".")
          .describe(
            "Optional relative path to list files from. Defaults to current directory '.' if not provided.",
          ),
      })
      .strict(),
    async execute({ path }) {
      const requested = path === "" ? "." : path;

      try {
        const guarded = await guard.resolve(requested);
        if (!guarded.ok) return formatToolFailure(guarded.failure);

        const stats = await stat(guarded.path).catch(() => undefined);
        if (!stats?.isDirectory()) {
          return formatToolFailure({
            code: "NotADirectory",
            message: `Path '${requested}' is not a directory or does not exist.`,
          });
        }

        const entries = await readdir(guarded.path, { withFileTypes: true });
        entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

        const items: string[] = [];
        for (const entry of entries.slice(0, MAX_LIST_ENTRIES)) {
          const isDirectory = await isDirectoryEntry(guarded.path, entry);
          items.push(displayPath(requested, entry.name, isDirectory));
        }
        if (entries.length > MAX_LIST_ENTRIES) {
          items.push(LIST_TRUNCATION_MARKER);
        }

        return JSON.stringify(items);
      } catch (err: unknown) {
        if (errorCode(err) === "ENOENT") {
          return `Error: Directory not found at path '${requested}'`;
        }
        if (isPermissionError(err)) {
          return `Error: Permission denied to list directory '${requested}'`;
        }
        return `Error listing files in '${requested}': ${errorMessage(err)}`;
      }
    },
  });
}
