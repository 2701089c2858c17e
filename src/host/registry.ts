import type { DocumentHandle } from "./handles";
import { documentKey } from "./paths";
import type { DocumentEntry } from "./types";

// Bookkeeping for the documents a session knows about. Ownership decisions
// are made by HostSession; this map only records them.
export class DocumentRegistry {
  private readonly byKey = new Map<string, DocumentEntry>();

  get size(): number {
    return this.byKey.size;
  }

  get(path: string): DocumentEntry | undefined {
    return this.byKey.get(documentKey(path));
  }

  contains(path: string): boolean {
    return this.byKey.has(documentKey(path));
  }

  // Untracked paths are not owned.
  isOwned(path: string): boolean {
    return this.get(path)?.owned ?? false;
  }

  set(path: string, handle: DocumentHandle, owned: boolean, readOnly = false): DocumentEntry {
    const entry: DocumentEntry = { path, handle, owned, readOnly, held: false };
    this.byKey.set(documentKey(path), entry);
    return entry;
  }

  remove(path: string): DocumentEntry | undefined {
    const key = documentKey(path);
    const entry = this.byKey.get(key);
    this.byKey.delete(key);
    return entry;
  }

  clear(): void {
    this.byKey.clear();
  }

  paths(): string[] {
    return this.entries().map((entry) => entry.path);
  }

  entries(): DocumentEntry[] {
    return [...this.byKey.values()];
  }
}
