export { NodeTerminalBackend, createNodeBackend } from "./backend/nodeBackend.js";
export type {
  NodeBackendOptions,
  ShutdownReason,
  SignalSource,
  TerminalInput,
  TerminalOutput,
} from "./backend/nodeBackend.js";

export { readEnvConfig } from "./config/envConfig.js";
export type { EnvConfig, EnvMap } from "./config/envConfig.js";

export { createFileLogSink, formatLogLine } from "./logging/fileLogSink.js";

export { createNodeApp } from "./createNodeApp.js";
export type { CreateNodeAppOptions, NodeApp } from "./createNodeApp.js";
