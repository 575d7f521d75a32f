import type { ToolRegistry } from "../registry/tool-registry.js";
import type { TransportAdapter, TransportMode } from "./types.js";
import { SseTransportAdapter } from "./sse-adapter.js";
import { StreamableHttpTransportAdapter } from "./streamable-http-adapter.js";

export type TransportAdapterFactory = (mode: TransportMode, registry: ToolRegistry, mountPath: string) => TransportAdapter;

export const createTransportAdapter: TransportAdapterFactory = (mode, registry, mountPath) => {
  switch (mode) {
    case "sse":
      return new SseTransportAdapter(registry, mountPath);
    case "stream-http":
      return new StreamableHttpTransportAdapter(registry, mountPath);
  }
};

export { SseTransportAdapter, StreamableHttpTransportAdapter };
export { TRANSPORT_MODES } from "./types.js";
export type { ManagedContext, TransportAdapter, TransportMode } from "./types.js";
