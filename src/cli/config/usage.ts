// Keep CLI usage text in one editable module.
export const CLI_USAGE_TEXT = `sheethost - Session manager for a shared spreadsheet host

Usage:
  sheethost mcp                  Run the MCP server on stdio
  sheethost status [options]     Show whether the host application is running
  sheethost processes [options]  List host processes with their parent pids

Options:
  --executable <name>   Host executable to look for (default: EXCEL.EXE)
  --json                Print machine-readable output
  --help                Show this help message

Environment:
  SHEETHOST_VISIBLE           Show a launched host window (default: false)
  SHEETHOST_DISPLAY_ALERTS    Let the host show dialogs (default: false)
  SHEETHOST_ATTACH            Attach to a running host first (default: true)
  SHEETHOST_EXECUTABLE        Host executable name (default: EXCEL.EXE)
  SHEETHOST_POWERSHELL        PowerShell used for the bridge (default: powershell.exe)
  SHEETHOST_CALL_TIMEOUT_MS   Timeout for one host call (default: 30000)
  LOG_LEVEL                   pino log level (default: info)

Examples:
  sheethost mcp
  sheethost status --json
  sheethost processes --executable EXCEL.EXE
`;
