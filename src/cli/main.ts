import { loadHostConfig } from "../host/config";
import { runMcpServer } from "../mcp/main";
import { runProcessesCommand } from "./commands/processes";
import { runStatusCommand } from "./commands/status";
import { CLI_USAGE_TEXT } from "./config/usage";
import type { ProcessCommandOptions } from "./types";

function printUsage(): void {
  console.log(CLI_USAGE_TEXT);
}

export function parseProcessOptions(args: string[]): ProcessCommandOptions {
  const options: ProcessCommandOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--json") {
      options.json = true;
      continue;
    }

    if (arg === "--executable" && args[i + 1]) {
      options.executable = args[i + 1];
      i++;
    }
  }

  return options;
}

// Main CLI dispatcher.
export async function runCli(argv: string[]): Promise<void> {
  const args = argv;
  if (args.length === 0 || args[0] === "--help" || args[0] === "-h" || args[0] === "help") {
    printUsage();
    process.exit(0);
  }

  const firstArg = args[0];

  switch (firstArg) {
    case "mcp": {
      await runMcpServer();
      break;
    }

    case "status": {
      const options = parseProcessOptions(args.slice(1));
      runStatusCommand(options.executable ?? loadHostConfig().executableName, options);
      break;
    }

    case "processes": {
      const options = parseProcessOptions(args.slice(1));
      runProcessesCommand(options.executable ?? loadHostConfig().executableName, options);
      break;
    }

    default: {
      console.error(`Unknown command: ${firstArg}\n`);
      printUsage();
      process.exit(1);
    }
  }
}
