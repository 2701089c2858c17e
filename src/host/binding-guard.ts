import type { ApplicationBinding } from "./types";

// Per-thread binding initialization, torn down only by whoever set it up.
export class BindingThreadGuard {
  private initializedHere = false;

  constructor(private readonly binding: ApplicationBinding) {}

  async acquire(): Promise<void> {
    if (this.initializedHere) {
      return;
    }
    this.initializedHere = await this.binding.initializeThread();
  }

  async release(): Promise<void> {
    if (!this.initializedHere) {
      return;
    }
    this.initializedHere = false;
    await this.binding.uninitializeThread();
  }
}
