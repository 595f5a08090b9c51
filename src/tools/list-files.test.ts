import { test, expect, describe, beforeEach, afterEach } from "vitest";
import { mkdtempSync, mkdirSync, writeFileSync, rmSync, symlinkSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  createListFilesTool,
  displayPath,
  LIST_TRUNCATION_MARKER,
  MAX_LIST_ENTRIES,
} from "./list-files.js";
import { WorkspaceGuard } from "../workspace-guard.js";

let workspace: string;

beforeEach(() => {
  workspace = mkdtempSync(join(tmpdir(), "list-files-test-"));
});

afterEach(() => {
  rmSync(workspace, { recursive: true, force: true });
});

async function execute(args: Record<string, unknown>): Promise<string> {
  const tool = createListFilesTool(new WorkspaceGuard(workspace));
  return (await tool.invoke(args)).resultText;
}

describe("displayPath", () => {
  test("joins onto the caller's path", () => {
    expect(displayPath(".", "x.py", false)).toBe("./x.py");
    expect(displayPath("src", "lib", true)).toBe("src/lib/");
  });

  test("drops trailing slashes from the caller's path", () => {
    expect(displayPath("src/", "a.ts", false)).toBe("src/a.ts");
  });
});

test("lists a file and a subdirectory relative to '.'", async () => {
  writeFileSync(join(workspace, "x.py"), "print(1)");
  mkdirSync(join(workspace, "sub"));
  const result = await execute({ path: "." });
  expect(JSON.parse(result)).toEqual(["./sub/", "./x.py"]);
});

test("defaults to the current directory when no path is given", async () => {
  writeFileSync(join(workspace, "only.txt"), "");
  const result = await execute({});
  expect(JSON.parse(result)).toEqual(["./only.txt"]);
});

test("lists immediate children only", async () => {
  mkdirSync(join(workspace, "src", "deep"), { recursive: true });
  writeFileSync(join(workspace, "src", "deep", "hidden.ts"), "");
  writeFileSync(join(workspace, "src", "main.ts"), "");
  const result = await execute({ path: "src" });
  expect(JSON.parse(result)).toEqual(["src/deep/", "src/main.ts"]);
});

test("marks symlinked directories with a trailing slash", async () => {
  mkdirSync(join(workspace, "real"));
  symlinkSync(join(workspace, "real"), join(workspace, "link"));
  const result = await execute({ path: "." });
  expect(JSON.parse(result)).toEqual(["./link/", "./real/"]);
});

test("caps the listing and appends the truncation marker", async () => {
  for (let i = 0; i < MAX_LIST_ENTRIES + 5; i++) {
    writeFileSync(join(workspace, `f${String(i).padStart(3, "0")}.txt`), "");
  }
  const items: string[] = JSON.parse(await execute({ path: "." }));
  expect(items).toHaveLength(MAX_LIST_ENTRIES + 1);
  expect(items[MAX_LIST_ENTRIES]).toBe(LIST_TRUNCATION_MARKER);
  expect(items[0]).toBe("./f000.txt");
});

test("does not append the marker at exactly the cap", async () => {
  for (let i = 0; i < MAX_LIST_ENTRIES; i++) {
    writeFileSync(join(workspace, `f${String(i).padStart(3, "0")}.txt`), "");
  }
  const items: string[] = JSON.parse(await execute({ path: "." }));
  expect(items).toHaveLength(MAX_LIST_ENTRIES);
  expect(items).not.toContain(LIST_TRUNCATION_MARKER);
});

test("returns NotADirectory for a file", async () => {
  writeFileSync(join(workspace, "a.txt"), "");
  expect(await execute({ path: "a.txt" })).toBe(
    "Error: Path 'a.txt' is not a directory or does not exist.",
  );
});

test("returns NotADirectory for a missing path", async () => {
  expect(await execute({ path: "nope" })).toBe(
    "Error: Path 'nope' is not a directory or does not exist.",
  );
});

test("denies listing outside the workspace", async () => {
  expect(await execute({ path: ".." })).toMatch(/^Error: Access denied\./);
});

test("returns an empty JSON array for an empty directory", async () => {
  mkdirSync(join(workspace, "empty"));
  expect(await execute({ path: "empty" })).toBe("[]");
});
