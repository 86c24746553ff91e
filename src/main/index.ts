/**
 * Daemon entry point.
 *
 * Runs input source sync for an editor in another process: the editor's
 * window id and its toggle command come from the environment. Stops on
 * SIGINT/SIGTERM.
 *
 * Focus is only known on X11, through the window id. ProcessHost cannot
 * report the editor's own focus, so on a Wayland session (GNOME included)
 * the daemon never acts. Embed the library with a host that implements
 * hasApplicationFocus to use the GNOME Shell backend.
 */

import { loadConfig, type InputSourceSyncConfig } from "./config";
import { createInputSourceSync } from "./bootstrap";
import { ProcessHost } from "./process-host";
import { CommandInputMethodToggle } from "../services/input-sources";
import { ElectronLogService } from "../services/logging";
import { ExecaProcessRunner } from "../services/platform/process";
import { LoggingProcessRunner } from "../services/platform/logging-process-runner";
import { getErrorMessage } from "../services/errors";

async function run(config: InputSourceSyncConfig): Promise<void> {
  const loggingService = new ElectronLogService({ consoleLevel: config.logLevel });
  const logger = loggingService.createLogger("app");
  const runner = new LoggingProcessRunner(new ExecaProcessRunner(), loggingService.createLogger("process"));

  if (!config.toggleCommand) {
    logger.warn("INPUT_SOURCE_SYNC_TOGGLE_COMMAND not set; toggles will fail");
  }
  const toggle = config.toggleCommand
    ? new CommandInputMethodToggle(config.toggleCommand, runner, loggingService.createLogger("toggle"))
    : undefined;
  const host = new ProcessHost(config.windowId, toggle);

  const { mode } = createInputSourceSync(host, config, { loggingService, runner });
  if (!(await mode.enable())) {
    process.exitCode = 1;
    return;
  }
  logger.info("Input source sync running", {
    transport: config.transport,
    avoid: config.avoidanceLayout,
    reset: config.resetPolicy,
  });

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    logger.info("Shutting down", { signal });
    host.teardown();
    await mode.disable();
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error("Shutdown failed", { error: getErrorMessage(error) });
        process.exitCode = 1;
      });
    });
  }
}

function main(): void {
  let config: InputSourceSyncConfig;
  try {
    config = loadConfig();
  } catch (error) {
    new ElectronLogService().createLogger("config").error(getErrorMessage(error));
    process.exitCode = 1;
    return;
  }

  run(config).catch((error: unknown) => {
    new ElectronLogService().createLogger("app").error("Startup failed", { error: getErrorMessage(error) });
    process.exitCode = 1;
  });
}

main();
