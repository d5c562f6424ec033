export * from './types';
export { loadConfig, AdbConfig, AdbConfigSchema } from './config';
export { AdbMcpServer, AdbMcpServerOptions, SERVER_NAME } from './server';
export { AdbSession, AdbSessionOptions, CommandOptions, toComponentName } from './utils/adb';
export { escapeShellArg, tokenizeCommand } from './utils/command';
export {
  parseActivitiesFromDumpsys,
  parseFocusedWindow,
  parseInstalledPackages,
  parseScreenState,
  stripUiDumpFooter,
} from './utils/dumpsys';
export { formatErrorForResponse, getErrorSuggestion, isRecoverableError } from './utils/error';
export { ExecutionLock } from './utils/execution-lock';
export { formatHierarchy, normalizeHierarchy, parseHierarchy, renderHierarchy } from './utils/hierarchy';
export { KEY_CODES, resolveKeyCodes } from './utils/keycodes';
export { ConsoleLogger, Logger, noopLogger } from './utils/logger';
export { ChildHandle, ChildPool, ExitHost, ProcessReaper, processReaper } from './utils/process-pool';
export {
  BinaryResolver,
  ExecuteOptions,
  ProcessRunner,
  ProcessRunnerOptions,
  Spawner,
} from './utils/process-runner';
export { decodeScreenshot, getPNGDimensions } from './utils/screenshot';
export { BridgeServerControl, BridgeServerGuard, processBridgeGuard } from './utils/server-guard';
