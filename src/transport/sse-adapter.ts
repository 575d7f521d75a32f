/**
 * Push-stream transport: one long-lived text/event-stream per client.
 *
 *   GET  <mount>/                          open a stream, get an endpoint event
 *   POST <mount>/messages/?sessionId=<id>  deliver a client message to that stream
 *
 * Each stream owns its own McpServer and is forgotten when it closes, so
 * there is nothing for a shared lifecycle manager to do.
 */

import type { IncomingMessage, ServerResponse } from "node:http";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import type { ToolRegistry } from "../registry/tool-registry.js";
import type { TransportAdapter } from "./types.js";
import { readRequestBody, sendJson, sendJsonRpcError } from "./http-utils.js";
import { logDebug, logError, logInfo, toLoggable } from "../utils/logger.js";

const MESSAGES_PATH = "/messages/";

export class SseTransportAdapter implements TransportAdapter {
  readonly mode = "sse" as const;
  readonly registry: ToolRegistry;
  readonly mountPath: string;

  private readonly connections = new Map<string, SSEServerTransport>();

  constructor(registry: ToolRegistry, mountPath: string) {
    this.registry = registry;
    this.mountPath = mountPath;
  }

  get name(): string {
    return this.registry.name;
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  async open(): Promise<void> {
    logDebug(`SSE transport ready at ${this.mountPath}/`, { component: this.name });
  }

  async close(): Promise<void> {
    const open = [...this.connections.values()];
    this.connections.clear();
    await Promise.all(open.map((transport) =>
      transport.close().catch((err: unknown) => {
        logError(`Failed to close SSE stream ${transport.sessionId}`, toLoggable(err));
      })
    ));
  }

  async handleRequest(req: IncomingMessage, res: ServerResponse, subPath: string, url: URL): Promise<void> {
    if (subPath === "/") {
      if (req.method === "GET") {
        await this.openStream(res);
      } else {
        sendJson(res, 405, { error: "Method Not Allowed" });
      }
      return;
    }

    if (subPath === MESSAGES_PATH || subPath === "/messages") {
      if (req.method === "POST") {
        await this.postMessage(req, res, url);
      } else {
        sendJson(res, 405, { error: "Method Not Allowed" });
      }
      return;
    }

    sendJson(res, 404, { error: "Not Found" });
  }

  private async openStream(res: ServerResponse): Promise<void> {
    const transport = new SSEServerTransport(`${this.mountPath}${MESSAGES_PATH}`, res);
    const sessionId = transport.sessionId;

    this.connections.set(sessionId, transport);
    transport.onclose = () => {
      this.connections.delete(sessionId);
      logInfo(`SSE stream closed: ${sessionId}`, { component: this.name });
    };

    const server = this.registry.createMcpServer();
    await server.connect(transport);
    logInfo(`SSE stream opened: ${sessionId}`, { component: this.name });
  }

  private async postMessage(req: IncomingMessage, res: ServerResponse, url: URL): Promise<void> {
    const sessionId = url.searchParams.get("sessionId");
    if (!sessionId) {
      sendJson(res, 400, { error: "sessionId query parameter is required" });
      return;
    }

    const transport = this.connections.get(sessionId);
    if (!transport) {
      sendJson(res, 404, { error: "Unknown session ID" });
      return;
    }

    const body = await readRequestBody(req);
    if (body === undefined) {
      sendJsonRpcError(res, 400, -32700, "Parse error: request body is not valid JSON");
      return;
    }

    await transport.handlePostMessage(req, res, body);
  }
}
