import { join } from "path";

// Script the bridge process runs. Same relative location from src/ and dist/.
export const BRIDGE_SCRIPT_PATH = join(__dirname, "..", "..", "..", "resources", "sheethost-bridge.ps1");

// Flags for a non-interactive, single-threaded-apartment PowerShell host.
export const POWERSHELL_BRIDGE_ARGS = ["-NoProfile", "-NonInteractive", "-ExecutionPolicy", "Bypass", "-STA", "-File"];

// How long stop() waits for the script to exit after stdin closes.
export const BRIDGE_SHUTDOWN_TIMEOUT_MS = 5_000;
