import { resolve } from "path";

// Absolute path used as the document identity throughout the session.
export function normalizeDocumentPath(filepath: string, cwd: string = process.cwd()): string {
  return resolve(cwd, filepath.trim());
}

// Registry key: the host treats paths case-insensitively and accepts either separator.
export function documentKey(filepath: string): string {
  return filepath.replace(/\\/g, "/").toLowerCase();
}
