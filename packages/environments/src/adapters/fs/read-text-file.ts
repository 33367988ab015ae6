import fs from "node:fs"

export type ReadFailure = "not_found" | "not_a_file" | "permission_denied" | "unreadable"

export type ReadResult =
  | { readonly ok: true; readonly content: string }
  | { readonly ok: false; readonly reason: ReadFailure; readonly cause: unknown }

/**
 * Reads a UTF-8 file in one shot, classifying the failure instead of throwing.
 */
export function readTextFile(filePath: string): ReadResult {
  try {
    return { ok: true, content: fs.readFileSync(filePath, "utf-8") }
  } catch (err) {
    return { ok: false, reason: classify(err), cause: err }
  }
}

function classify(err: unknown): ReadFailure {
  switch (errnoCode(err)) {
    case "ENOENT":
    case "ENOTDIR":
      return "not_found"
    case "EISDIR":
      return "not_a_file"
    case "EACCES":
    case "EPERM":
      return "permission_denied"
    default:
      return "unreadable"
  }
}

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code
  }

  return undefined
}
