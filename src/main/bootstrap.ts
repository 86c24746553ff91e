/**
 * Wires input source sync for a host application.
 *
 * Everything with side effects (logging backend, process runner, bus
 * connection, session probing) can be injected; defaults are the
 * production implementations.
 */

import { createDbusSignalBus, type SignalBusFactory } from "../services/bus";
import { createFocusOracle } from "../services/focus";
import {
  CallbackInputMethodToggle,
  CommandLayoutResetAction,
  EventDebouncer,
  SignalSubscription,
  createLayoutStateReader,
  type HostApplication,
} from "../services/input-sources";
import { ElectronLogService, type LoggingService } from "../services/logging";
import { ExecaProcessRunner, type ProcessRunner } from "../services/platform/process";
import { LoggingProcessRunner } from "../services/platform/logging-process-runner";
import { readSessionEnvironment, type SessionEnvironment } from "../services/platform/session-environment";
import type { InputSourceSyncConfig } from "./config";
import { InputSourceSyncMode } from "./input-source-sync-mode";

export interface InputSourceSyncDeps {
  readonly loggingService?: LoggingService;
  readonly runner?: ProcessRunner;
  readonly environment?: SessionEnvironment;
  readonly connect?: SignalBusFactory;
}

export interface InputSourceSync {
  readonly mode: InputSourceSyncMode;
  readonly subscription: SignalSubscription;
  readonly loggingService: LoggingService;
}

export function createInputSourceSync(
  host: HostApplication,
  config: InputSourceSyncConfig,
  deps: InputSourceSyncDeps = {}
): InputSourceSync {
  const loggingService = deps.loggingService ?? new ElectronLogService({ consoleLevel: config.logLevel });
  const runner = deps.runner ?? new LoggingProcessRunner(new ExecaProcessRunner(), loggingService.createLogger("process"));
  const environment = deps.environment ?? readSessionEnvironment();
  const busLogger = loggingService.createLogger("bus");
  const connect = deps.connect ?? ((busAddress: string) => createDbusSignalBus(busAddress, busLogger));

  // Backend is probed once per process
  const focus = createFocusOracle({
    environment,
    host,
    runner,
    logger: loggingService.createLogger("focus"),
  });
  const reset = new CommandLayoutResetAction(config.resetPolicy, runner, loggingService.createLogger("reset"));
  const toggle = new CallbackInputMethodToggle(
    () => host.toggleInputMethod(),
    loggingService.createLogger("toggle")
  );
  const debouncerLogger = loggingService.createLogger("debouncer");

  const subscription = new SignalSubscription({
    transport: config.transport,
    busAddress: environment.busAddress,
    connect,
    host,
    stateReader: createLayoutStateReader(config.transport, runner),
    logger: loggingService.createLogger("subscription"),
    createDebouncer: (initialLayout) =>
      new EventDebouncer({
        transport: config.transport,
        avoidanceLayout: config.avoidanceLayout,
        focus,
        reset,
        toggle,
        logger: debouncerLogger,
        echoWindowMs: config.echoWindowMs,
        initialLayout,
      }),
  });

  const mode = new InputSourceSyncMode(subscription, loggingService.createLogger("app"));
  return { mode, subscription, loggingService };
}
