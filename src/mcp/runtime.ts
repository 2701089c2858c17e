import type { Logger } from "pino";
import { PowerShellHostBinding } from "../bindings/powershell/binding";
import { loadHostConfig, type HostConfig } from "../host/config";
import { HostSession } from "../host/session";
import type { HostBinding } from "../host/types";
import { createStderrLogger } from "../logging";
import { ProcessGuardian } from "../process/guardian";
import { MCP_SESSION_LABEL } from "./config/server";

// Everything the tool layer needs, built once per server.
export interface SheethostRuntime {
  config: HostConfig;
  logger: Logger;
  binding: HostBinding;
  guardian: ProcessGuardian;
  session: HostSession;
  dispose(): void;
}

export interface CreateRuntimeOptions {
  config?: HostConfig;
  logger?: Logger;
  binding?: HostBinding;
  guardian?: ProcessGuardian;
  pathExists?: (path: string) => boolean;
  // Off in tests; the server turns it on.
  exitHooks?: boolean;
}

// Composition root: explicit construction, no module-level singletons.
export function createRuntime(options: CreateRuntimeOptions = {}): SheethostRuntime {
  const config = options.config ?? loadHostConfig();
  const logger = options.logger ?? createStderrLogger(config.logLevel);

  const binding =
    options.binding ??
    new PowerShellHostBinding({
      executableName: config.executableName,
      powershellPath: config.powershellPath,
      callTimeoutMs: config.callTimeoutMs,
      logger,
    });

  const guardian =
    options.guardian ??
    new ProcessGuardian({
      executableName: binding.executableName,
      logger,
    });

  const session = new HostSession({
    binding,
    guardian,
    logger,
    label: MCP_SESSION_LABEL,
    visible: config.visible,
    displayAlerts: config.displayAlerts,
    attachToExisting: config.attachToExisting,
    pathExists: options.pathExists,
  });

  const disposeReleaser = guardian.addReferenceReleaser(() => binding.collectGarbage());
  const disposeExitHooks = options.exitHooks ? guardian.registerExitHooks() : null;

  return {
    config,
    logger,
    binding,
    guardian,
    session,
    dispose: () => {
      disposeReleaser();
      disposeExitHooks?.();
      session.dispose();
    },
  };
}
