import { z } from "zod";
import { DEFAULT_HOST_EXECUTABLE } from "../process/config";

// PowerShell executable that hosts the binding bridge.
export const DEFAULT_POWERSHELL_EXECUTABLE = "powershell.exe";

// Upper bound for one bridge call before it is rejected.
export const DEFAULT_CALL_TIMEOUT_MS = 30_000;

const booleanFlag = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .optional()
    .transform((value) => (value === undefined ? fallback : value === "true" || value === "1" || value === "yes"));

const hostEnvSchema = z.object({
  SHEETHOST_VISIBLE: booleanFlag(false),
  SHEETHOST_DISPLAY_ALERTS: booleanFlag(false),
  SHEETHOST_ATTACH: booleanFlag(true),
  SHEETHOST_EXECUTABLE: z.string().min(1).default(DEFAULT_HOST_EXECUTABLE),
  SHEETHOST_POWERSHELL: z.string().min(1).default(DEFAULT_POWERSHELL_EXECUTABLE),
  SHEETHOST_CALL_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_CALL_TIMEOUT_MS),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export interface HostConfig {
  visible: boolean;
  displayAlerts: boolean;
  attachToExisting: boolean;
  executableName: string;
  powershellPath: string;
  callTimeoutMs: number;
  logLevel: string;
}

// Reads runtime settings from the environment. Throws on invalid values.
export function loadHostConfig(env: NodeJS.ProcessEnv = process.env): HostConfig {
  const parsed = hostEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid sheethost configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    visible: values.SHEETHOST_VISIBLE,
    displayAlerts: values.SHEETHOST_DISPLAY_ALERTS,
    attachToExisting: values.SHEETHOST_ATTACH,
    executableName: values.SHEETHOST_EXECUTABLE,
    powershellPath: values.SHEETHOST_POWERSHELL,
    callTimeoutMs: values.SHEETHOST_CALL_TIMEOUT_MS,
    logLevel: values.LOG_LEVEL,
  };
}
