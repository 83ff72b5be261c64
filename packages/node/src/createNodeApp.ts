/**
 * packages/node/src/createNodeApp.ts — App over the Node terminal backend.
 *
 * Environment settings (see readEnvConfig) fill in what the options leave
 * unset; explicit options win. SIGTERM, SIGHUP and a failed stdin stop the
 * app, which restores the terminal on the way out of run().
 */

import {
  type App,
  type AppConfig,
  type AppOptions,
  type Logger,
  type LogSink,
  createApp,
  createLogger,
  describeThrown,
  nullSink,
} from "@termloom/core";
import { type NodeBackendOptions, type NodeTerminalBackend, createNodeBackend } from "./backend/nodeBackend.js";
import { type EnvConfig, type EnvMap, readEnvConfig } from "./config/envConfig.js";
import { createFileLogSink } from "./logging/fileLogSink.js";

export type CreateNodeAppOptions = Omit<AppOptions, "backend"> &
  Readonly<{
    /** Streams and fallback size for the backend. */
    terminal?: NodeBackendOptions;
    /** Defaults to process.env. */
    env?: EnvMap;
  }>;

export type NodeApp = Readonly<{
  app: App;
  backend: NodeTerminalBackend;
  /** Settings that came from the environment. */
  env: EnvConfig;
}>;

function mergeConfig(env: EnvConfig, config: AppConfig | undefined): AppConfig {
  return {
    ...(env.fpsCap === undefined ? {} : { fpsCap: env.fpsCap }),
    ...config,
  };
}

/**
 * Without LOOM_LOG_FILE nothing is written anywhere: the console shares the
 * terminal with the UI. Records stay inspectable through logger.records().
 */
function createEnvLogger(env: EnvConfig): Logger {
  const sink: LogSink = env.logFile === undefined ? nullSink : createFileLogSink(env.logFile);
  return createLogger({ level: env.logLevel ?? "warn", sink });
}

export function createNodeApp(opts: CreateNodeAppOptions = {}): NodeApp {
  const { terminal, env: envMap, config, logger, ...appOpts } = opts;
  const env = readEnvConfig(envMap ?? process.env);
  const backend = createNodeBackend(terminal ?? {});
  const app = createApp({
    ...appOpts,
    backend,
    config: mergeConfig(env, config),
    logger: logger ?? createEnvLogger(env),
  });
  backend.onShutdown((reason) => {
    if (reason.kind === "signal") app.logger.info(`${reason.signal} received, stopping`);
    else app.logger.error(`input failed: ${describeThrown(reason.error)}`, reason.error);
    app.stop();
  });
  return Object.freeze({ app, backend, env });
}
