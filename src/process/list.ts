import { basename } from "path";
import { z } from "zod";
import { PROCESS_LIST_TIMEOUT_MS } from "./config";
import { assertCommandSucceeded, runCommandSync } from "./run";
import type { CommandRunner, ProcessLister, ProcessRow } from "./types";

function sameExecutable(candidate: string, executableName: string): boolean {
  return basename(candidate).toLowerCase() === executableName.toLowerCase();
}

function quotePowerShellLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

// ============================================================================
// Windows: CIM query through PowerShell
// ============================================================================

const cimRowSchema = z.object({
  pid: z.number().int(),
  parentPid: z.number().int().nullable(),
  name: z.string(),
});

const cimOutputSchema = z.union([cimRowSchema, z.array(cimRowSchema)]);

// Preferred on Windows: reports name, pid and parent pid in one structured call.
export class CimProcessLister implements ProcessLister {
  readonly name = "cim";

  constructor(private readonly run: CommandRunner = runCommandSync) {}

  list(executableName: string): ProcessRow[] {
    const script = [
      '$ErrorActionPreference = "Stop"',
      `$rows = Get-CimInstance Win32_Process | Where-Object { $_.Name -ieq ${quotePowerShellLiteral(executableName)} } |`,
      '  Select-Object @{Name="pid";Expression={[int]$_.ProcessId}},',
      '                @{Name="parentPid";Expression={[int]$_.ParentProcessId}},',
      '                @{Name="name";Expression={$_.Name}}',
      "$rows | ConvertTo-Json -Compress",
    ].join("; ");

    const result = this.run("powershell", ["-NoProfile", "-NonInteractive", "-Command", script], PROCESS_LIST_TIMEOUT_MS);
    assertCommandSucceeded("Get-CimInstance", result);

    const stdout = result.stdout.trim();
    if (!stdout) {
      return [];
    }

    const parsed = cimOutputSchema.parse(JSON.parse(stdout));
    return Array.isArray(parsed) ? parsed : [parsed];
  }
}

// ============================================================================
// Windows: wmic
// ============================================================================

// wmic orders columns alphabetically, so fields are located through the header.
export function parseWmicCsv(stdout: string, executableName: string): ProcessRow[] {
  const lines = stdout
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);

  const headerIndex = lines.findIndex((line) => /processid/i.test(line));
  if (headerIndex === -1) {
    return [];
  }

  const header = lines[headerIndex].split(",").map((column) => column.trim().toLowerCase());
  const pidColumn = header.indexOf("processid");
  const parentColumn = header.indexOf("parentprocessid");
  if (pidColumn === -1) {
    return [];
  }

  const rows: ProcessRow[] = [];
  for (const line of lines.slice(headerIndex + 1)) {
    const fields = line.split(",");
    const pid = parseInt(fields[pidColumn] ?? "", 10);
    if (Number.isNaN(pid)) {
      continue;
    }

    const parentPid = parentColumn === -1 ? NaN : parseInt(fields[parentColumn] ?? "", 10);
    rows.push({ pid, parentPid: Number.isNaN(parentPid) ? null : parentPid, name: executableName });
  }

  return rows;
}

export class WmicProcessLister implements ProcessLister {
  readonly name = "wmic";

  constructor(private readonly run: CommandRunner = runCommandSync) {}

  list(executableName: string): ProcessRow[] {
    const result = this.run(
      "wmic",
      ["process", "where", `name='${executableName}'`, "get", "ProcessId,ParentProcessId", "/format:csv"],
      PROCESS_LIST_TIMEOUT_MS
    );
    assertCommandSucceeded("wmic", result);
    return parseWmicCsv(result.stdout, executableName);
  }
}

// ============================================================================
// Windows: tasklist (no parent information)
// ============================================================================

export function parseTasklistCsv(stdout: string, executableName: string): ProcessRow[] {
  const rows: ProcessRow[] = [];

  for (const line of stdout.split(/\r?\n/)) {
    const fields = [...line.matchAll(/"([^"]*)"/g)].map((match) => match[1]);
    if (fields.length < 2 || !sameExecutable(fields[0], executableName)) {
      continue;
    }

    const pid = parseInt(fields[1], 10);
    if (!Number.isNaN(pid)) {
      rows.push({ pid, parentPid: null, name: fields[0] });
    }
  }

  return rows;
}

export class TasklistProcessLister implements ProcessLister {
  readonly name = "tasklist";

  constructor(private readonly run: CommandRunner = runCommandSync) {}

  list(executableName: string): ProcessRow[] {
    const result = this.run(
      "tasklist",
      ["/FI", `IMAGENAME eq ${executableName}`, "/FO", "CSV", "/NH"],
      PROCESS_LIST_TIMEOUT_MS
    );
    assertCommandSucceeded("tasklist", result);
    return parseTasklistCsv(result.stdout, executableName);
  }
}

// ============================================================================
// POSIX: ps
// ============================================================================

export function parsePsOutput(stdout: string, executableName: string): ProcessRow[] {
  const rows: ProcessRow[] = [];

  for (const line of stdout.split("\n")) {
    const match = line.trim().match(/^(\d+)\s+(\d+)\s+(.+)$/);
    if (!match || !sameExecutable(match[3], executableName)) {
      continue;
    }

    rows.push({
      pid: parseInt(match[1], 10),
      parentPid: parseInt(match[2], 10),
      name: basename(match[3]),
    });
  }

  return rows;
}

export class PsProcessLister implements ProcessLister {
  readonly name = "ps";

  constructor(private readonly run: CommandRunner = runCommandSync) {}

  list(executableName: string): ProcessRow[] {
    const result = this.run("ps", ["-ax", "-o", "pid=,ppid=,comm="], PROCESS_LIST_TIMEOUT_MS);
    assertCommandSucceeded("ps", result);
    return parsePsOutput(result.stdout, executableName);
  }
}

// ============================================================================
// Ranked fallback
// ============================================================================

// Tries each strategy in order and returns the first listing that succeeds.
export class FallbackProcessLister implements ProcessLister {
  readonly name: string;

  constructor(private readonly strategies: ProcessLister[]) {
    this.name = strategies.map((strategy) => strategy.name).join(">");
  }

  list(executableName: string): ProcessRow[] {
    const errors: string[] = [];

    for (const strategy of this.strategies) {
      try {
        return strategy.list(executableName);
      } catch (error) {
        errors.push(`${strategy.name}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    throw new Error(`No process listing strategy succeeded (${errors.join("; ")})`);
  }
}

export function createProcessLister(
  platform: NodeJS.Platform = process.platform,
  run: CommandRunner = runCommandSync
): ProcessLister {
  if (platform === "win32") {
    return new FallbackProcessLister([
      new CimProcessLister(run),
      new WmicProcessLister(run),
      new TasklistProcessLister(run),
    ]);
  }

  return new FallbackProcessLister([new PsProcessLister(run)]);
}
