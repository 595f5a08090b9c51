/** The errno-style code of a Node filesystem error, if any. */
export function errorCode(err: unknown): string | undefined {
  return err instanceof Error && "code" in err && typeof err.code === "string"
    ? err.code
    : undefined;
}

export function isPermissionError(err: unknown): boolean {
  const code = errorCode(err);
  return code === "EACCES" || code === "EPERM";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
