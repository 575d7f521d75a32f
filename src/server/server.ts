/**
 * Toolbox server - mounts the code-analysis and docker-control registries
 * under one HTTP listener.
 *
 *   /code/...    CodeAnalysisServer   (run_linter, run_type_checker)
 *   /docker/...  DockerControlServer  (list_containers, stop_container)
 *   /health      liveness probe
 *
 * Transport is fixed for the life of the process. In stream-http mode each
 * adapter is a managed context opened through the LifecycleManager (code
 * analysis first, docker control second) and closed in reverse on shutdown;
 * in sse mode every stream manages its own lifetime.
 */

import { createCodeAnalysisRegistry } from "../registry/code-analysis.js";
import { createDockerControlRegistry } from "../registry/docker-control.js";
import type { ToolRegistry } from "../registry/tool-registry.js";
import { connectDocker, type DockerConnection } from "../tools/docker-control/docker-connection.js";
import { createTransportAdapter, type TransportAdapterFactory } from "../transport/index.js";
import type { TransportAdapter } from "../transport/types.js";
import { CompositeApp } from "./app.js";
import type { ToolboxConfig } from "./config.js";
import { LifecycleManager } from "./lifecycle.js";
import { logError, logInfo, toLoggable } from "../utils/logger.js";

export const CODE_ANALYSIS_MOUNT = "/code";
export const DOCKER_CONTROL_MOUNT = "/docker";

export interface StartServerOptions {
  config: ToolboxConfig;
  /** Pre-established daemon connection; connects to the local daemon when omitted. */
  dockerConnection?: DockerConnection;
  /** Override adapter construction (tests). */
  createAdapter?: TransportAdapterFactory;
}

export interface RunningToolboxServer {
  app: CompositeApp;
  port: number;
  registries: { codeAnalysis: ToolRegistry; dockerControl: ToolRegistry };
  /** Close adapters (and their sessions), then the listener. Idempotent. */
  close(): Promise<void>;
}

export async function startToolboxServer(options: StartServerOptions): Promise<RunningToolboxServer> {
  const { config } = options;
  const createAdapter = options.createAdapter ?? createTransportAdapter;

  const codeAnalysis = createCodeAnalysisRegistry({
    linterCommand: config.linterCommand,
    typeCheckerCommand: config.typeCheckerCommand,
  });
  const dockerConnection = options.dockerConnection ?? await connectDocker();
  const dockerControl = createDockerControlRegistry(dockerConnection);

  for (const registry of [codeAnalysis, dockerControl]) {
    logInfo(`${registry.name}: ${registry.toolNames().join(", ")}`, { component: "Toolbox" });
  }

  const adapters: TransportAdapter[] = [
    createAdapter(config.transport, codeAnalysis, CODE_ANALYSIS_MOUNT),
    createAdapter(config.transport, dockerControl, DOCKER_CONTROL_MOUNT),
  ];
  const app = new CompositeApp(
    config.transport,
    adapters.map((adapter) => ({ prefix: adapter.mountPath, adapter })),
  );

  const lifecycle = new LifecycleManager();
  const usesLifecycle = config.transport === "stream-http";
  if (usesLifecycle) {
    await lifecycle.openAll(adapters);
  }

  const closeAdapters = async (): Promise<void> => {
    if (usesLifecycle) {
      await lifecycle.closeAll();
      return;
    }
    await Promise.all(adapters.map((adapter) =>
      adapter.close().catch((err: unknown) => {
        logError(`Error while closing ${adapter.name}`, toLoggable(err));
      })
    ));
  };

  let port: number;
  try {
    port = await app.listen(config.port, config.host);
  } catch (error) {
    await closeAdapters();
    throw error;
  }

  logInfo(`Ready on ${config.transport.toUpperCase()} transport: http://${config.host}:${port}`, { component: "Toolbox" });
  logInfo(`Code analysis at ${CODE_ANALYSIS_MOUNT}/, docker control at ${DOCKER_CONTROL_MOUNT}/`, { component: "Toolbox" });

  let closing: Promise<void> | undefined;
  const close = (): Promise<void> => {
    closing ??= (async () => {
      logInfo("Shutting down toolbox server...", { component: "Toolbox" });
      try {
        await closeAdapters();
      } finally {
        await app.close();
      }
    })();
    return closing;
  };

  return { app, port, registries: { codeAnalysis, dockerControl }, close };
}
