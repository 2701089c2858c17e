import type { ProcessLister, ProcessRow, ProcessTerminator } from "../../src/process/types";

// Process table the guardian can list and kill without touching the OS.
export class FakeProcessTable implements ProcessLister {
  readonly name = "fake";
  rows: ProcessRow[] = [];
  listError: Error | null = null;
  readonly killed: number[] = [];
  private nextPid = 5000;

  spawn(name: string, parentPid: number | null): number {
    const pid = this.nextPid++;
    this.rows.push({ pid, parentPid, name });
    return pid;
  }

  has(pid: number): boolean {
    return this.rows.some((row) => row.pid === pid);
  }

  list(executableName: string): ProcessRow[] {
    if (this.listError) {
      throw this.listError;
    }
    return this.rows
      .filter((row) => row.name.toLowerCase() === executableName.toLowerCase())
      .map((row) => ({ ...row }));
  }

  terminator(): ProcessTerminator {
    return {
      name: "fake-kill",
      terminate: (pid) => {
        if (!this.has(pid)) {
          return false;
        }
        this.rows = this.rows.filter((row) => row.pid !== pid);
        this.killed.push(pid);
        return true;
      },
    };
  }
}
