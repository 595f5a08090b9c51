import { test, expect, describe, beforeEach, afterEach } from "vitest";
import { mkdtempSync, mkdirSync, writeFileSync, rmSync, symlinkSync, realpathSync } from "node:fs";
import { join, sep } from "node:path";
import { tmpdir } from "node:os";
import { WorkspaceGuard, canonicalize, isWithin } from "./workspace-guard.js";

let workspace: string;
let outside: string;

beforeEach(() => {
  workspace = mkdtempSync(join(tmpdir(), "guard-test-"));
  outside = mkdtempSync(join(tmpdir(), "guard-outside-"));
});

afterEach(() => {
  rmSync(workspace, { recursive: true, force: true });
  rmSync(outside, { recursive: true, force: true });
});

describe("isWithin", () => {
  test("accepts the root itself and descendants", () => {
    expect(isWithin("/work", "/work")).toBe(true);
    expect(isWithin("/work", `/work${sep}src${sep}a.ts`)).toBe(true);
  });

  test("rejects parents, siblings and prefix look-alikes", () => {
    expect(isWithin("/work", "/")).toBe(false);
    expect(isWithin("/work", "/other")).toBe(false);
    expect(isWithin("/work", "/work-evil/secret")).toBe(false);
  });

  test("accepts a child whose name starts with two dots", () => {
    expect(isWithin("/work", "/work/..hidden")).toBe(true);
  });
});

describe("canonicalize", () => {
  test("appends missing segments to the deepest existing ancestor", async () => {
    const real = realpathSync(workspace);
    const result = await canonicalize(join(workspace, "new", "deep", "file.txt"));
    expect(result).toBe(join(real, "new", "deep", "file.txt"));
  });
});

describe("WorkspaceGuard.resolve", () => {
  test("resolves a relative file inside the workspace", async () => {
    writeFileSync(join(workspace, "a.txt"), "hi");
    const guard = new WorkspaceGuard(workspace);
    const result = await guard.resolve("a.txt");
    expect(result).toEqual({ ok: true, path: join(realpathSync(workspace), "a.txt") });
  });

  test("resolves '.' to the canonical root", async () => {
    const guard = new WorkspaceGuard(workspace);
    const result = await guard.resolve(".");
    expect(result).toEqual({ ok: true, path: realpathSync(workspace) });
  });

  test("allows .. segments that stay inside", async () => {
    mkdirSync(join(workspace, "src"));
    writeFileSync(join(workspace, "root.txt"), "x");
    const guard = new WorkspaceGuard(workspace);
    const result = await guard.resolve("src/../root.txt");
    expect(result.ok).toBe(true);
  });

  test("denies traversal outside the workspace", async () => {
    const guard = new WorkspaceGuard(workspace);
    const result = await guard.resolve("../../etc/passwd");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.code).toBe("AccessDenied");
      expect(result.failure.message).toContain("../../etc/passwd");
    }
  });

  test("denies absolute paths outside the workspace", async () => {
    const guard = new WorkspaceGuard(workspace);
    const result = await guard.resolve(join(outside, "x.txt"));
    expect(result.ok).toBe(false);
  });

  test("allows absolute paths inside the workspace", async () => {
    writeFileSync(join(workspace, "ok.txt"), "allowed");
    const guard = new WorkspaceGuard(workspace);
    const result = await guard.resolve(join(workspace, "ok.txt"));
    expect(result.ok).toBe(true);
  });

  test("denies a symlink that points outside the workspace", async () => {
    writeFileSync(join(outside, "secret.txt"), "secret");
    symlinkSync(outside, join(workspace, "escape"));
    const guard = new WorkspaceGuard(workspace);
    const result = await guard.resolve("escape/secret.txt");
    expect(result.ok).toBe(false);
  });

  test("denies a not-yet-existing path below an escaping symlink", async () => {
    symlinkSync(outside, join(workspace, "escape"));
    const guard = new WorkspaceGuard(workspace);
    const result = await guard.resolve("escape/new/file.txt");
    expect(result.ok).toBe(false);
  });

  test("allows a symlink that stays inside the workspace", async () => {
    mkdirSync(join(workspace, "real"));
    writeFileSync(join(workspace, "real", "f.txt"), "f");
    symlinkSync(join(workspace, "real"), join(workspace, "alias"));
    const guard = new WorkspaceGuard(workspace);
    const result = await guard.resolve("alias/f.txt");
    expect(result).toEqual({ ok: true, path: join(realpathSync(workspace), "real", "f.txt") });
  });

  test("denies a dangling symlink whose target is outside the workspace", async () => {
    symlinkSync(join(outside, "pwned.txt"), join(workspace, "link.txt"));
    const guard = new WorkspaceGuard(workspace);
    const result = await guard.resolve("link.txt");
    expect(result.ok).toBe(false);
  });

  test("denies a path below a dangling symlink to the outside", async () => {
    symlinkSync(join(outside, "gone"), join(workspace, "dir-link"));
    const guard = new WorkspaceGuard(workspace);
    const result = await guard.resolve("dir-link/new.txt");
    expect(result.ok).toBe(false);
  });

  test("resolves a dangling symlink to its target inside the workspace", async () => {
    symlinkSync("target.txt", join(workspace, "link.txt"));
    const guard = new WorkspaceGuard(workspace);
    const result = await guard.resolve("link.txt");
    expect(result).toEqual({ ok: true, path: join(realpathSync(workspace), "target.txt") });
  });

  test("denies paths containing a null byte", async () => {
    const guard = new WorkspaceGuard(workspace);
    const result = await guard.resolve("a\0b");
    expect(result.ok).toBe(false);
  });
});
