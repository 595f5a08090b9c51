// Workspace Guard — the sole containment mechanism for tool file access.
// Every path a tool touches is canonicalized (., .., symlinks) and must land
// on the workspace root or below it.

import { readlink, realpath } from "node:fs/promises";
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from "node:path";
import type { ToolFailure } from "./errors.js";

export type GuardResult =
  | { ok: true; path: string }
  | { ok: false; failure: ToolFailure };

function isMissing(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    (err.code === "ENOENT" || err.code === "ENOTDIR")
  );
}

/** The target of `path` when it is a symlink, otherwise undefined. */
async function readLinkTarget(path: string): Promise<string | undefined> {
  try {
    return await readlink(path);
  } catch (err) {
    // EINVAL: exists but is not a link
    if (isMissing(err) || (err instanceof Error && "code" in err && err.code === "EINVAL")) {
      return undefined;
    }
    throw err;
  }
}

const MAX_LINK_HOPS = 40;

/**
 * Canonicalize a path that may not exist yet: the deepest existing ancestor
 * goes through realpath and the missing remainder is appended to it. A
 * dangling symlink on the way is followed to where it points, since writing
 * through it would create its target.
 */
export async function canonicalize(absolute: string, hops = 0): Promise<string> {
  const missing: string[] = [];
  let current = absolute;

  for (;;) {
    try {
      const real = await realpath(current);
      return missing.length > 0 ? join(real, ...missing.reverse()) : real;
    } catch (err) {
      if (!isMissing(err)) throw err;

      const target = await readLinkTarget(current);
      if (target !== undefined) {
        if (hops >= MAX_LINK_HOPS) throw err;
        const resolved = await canonicalize(resolve(dirname(current), target), hops + 1);
        return missing.length > 0 ? join(resolved, ...missing.reverse()) : resolved;
      }

      const parent = dirname(current);
      if (parent === current) throw err;
      missing.push(basename(current));
      current = parent;
    }
  }
}

/** True when `candidate` equals `root` or lies below it. Both must be canonical. */
export function isWithin(root: string, candidate: string): boolean {
  const rel = relative(root, candidate);
  if (rel === "") return true;
  return rel !== ".." && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

export class WorkspaceGuard {
  readonly root: string;
  private canonicalRoot: Promise<string> | undefined;

  constructor(root: string = process.cwd()) {
    this.root = resolve(root);
  }

  private getCanonicalRoot(): Promise<string> {
    this.canonicalRoot ??= realpath(this.root);
    return this.canonicalRoot;
  }

  /**
   * Resolve a caller-supplied path against the workspace root.
   * Returns an AccessDenied failure for anything that escapes it.
   */
  async resolve(relativePath: string): Promise<GuardResult> {
    if (relativePath.includes("\0")) {
      return this.deny(relativePath);
    }

    const root = await this.getCanonicalRoot();
    const canonical = await canonicalize(resolve(this.root, relativePath));

    if (!isWithin(root, canonical)) {
      return this.deny(relativePath);
    }
    return { ok: true, path: canonical };
  }

  private deny(requested: string): GuardResult {
    return {
      ok: false,
      failure: {
        code: "AccessDenied",
        message: `Access denied. "${requested}" is outside the working directory: ${this.root}`,
      },
    };
  }
}
