import type { IncomingMessage, ServerResponse } from "node:http";
import type { ToolRegistry } from "../registry/tool-registry.js";

export const TRANSPORT_MODES = ["sse", "stream-http"] as const;
export type TransportMode = (typeof TRANSPORT_MODES)[number];

/**
 * A runtime context that must be opened before use and closed on every
 * exit path.
 */
export interface ManagedContext {
  readonly name: string;
  open(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Binds one registry to one wire protocol. The composite application hands
 * it every request under its mount path, with the mount path stripped.
 */
export interface TransportAdapter extends ManagedContext {
  readonly mode: TransportMode;
  readonly registry: ToolRegistry;
  readonly mountPath: string;
  handleRequest(req: IncomingMessage, res: ServerResponse, subPath: string, url: URL): Promise<void>;
}
