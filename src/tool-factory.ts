import { ToolRegistry } from "./tool-registry.js";
import { WorkspaceGuard } from "./workspace-guard.js";
import { createReadFileTool } from "./tools/read-file.js";
import { createListFilesTool } from "./tools/list-files.js";
import { createEditFileTool } from "./tools/edit-file.js";

/** The registry every session starts with: read, list and edit inside the workspace. */
export function createDefaultRegistry(guard: WorkspaceGuard = new WorkspaceGuard()): ToolRegistry {
  return new ToolRegistry()
    .register(createReadFileTool(guard))
    .register(createListFilesTool(guard))
    .register(createEditFileTool(guard));
}
