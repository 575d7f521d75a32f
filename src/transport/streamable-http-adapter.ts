/**
 * Streamed-HTTP transport: every JSON-RPC exchange is its own HTTP request,
 * correlated by the mcp-session-id header.
 *
 *   POST   <mount>/  initialize (no session header) or a message for a session
 *   GET    <mount>/  server-to-client stream for a session
 *   DELETE <mount>/  end a session
 *
 * The adapter is a managed context: it rejects requests with 503 until it is
 * opened and again after it is closed, and closing it tears down every live
 * session. A request admitted before close() but finishing after it never
 * leaves a session behind.
 *
 * A session header that names no live session is answered with 404, which
 * tells the client to initialize again.
 */

import * as crypto from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import type { ToolRegistry } from "../registry/tool-registry.js";
import type { TransportAdapter } from "./types.js";
import { headerValue, readRequestBody, sendJson, sendJsonRpcError, SESSION_HEADER } from "./http-utils.js";
import { logError, logInfo, toLoggable } from "../utils/logger.js";

export class StreamableHttpTransportAdapter implements TransportAdapter {
  readonly mode = "stream-http" as const;
  readonly registry: ToolRegistry;
  readonly mountPath: string;

  private readonly sessions = new Map<string, StreamableHTTPServerTransport>();
  private running = false;

  constructor(registry: ToolRegistry, mountPath: string) {
    this.registry = registry;
    this.mountPath = mountPath;
  }

  get name(): string {
    return this.registry.name;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  async open(): Promise<void> {
    this.running = true;
    logInfo(`Session manager started at ${this.mountPath}/`, { component: this.name });
  }

  async close(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    const open = [...this.sessions.values()];
    this.sessions.clear();
    await Promise.all(open.map((transport) =>
      transport.close().catch((err: unknown) => {
        logError(`Failed to close session ${transport.sessionId ?? "(uninitialized)"}`, toLoggable(err));
      })
    ));
    logInfo(`Session manager stopped (${open.length} session(s) closed)`, { component: this.name });
  }

  async handleRequest(req: IncomingMessage, res: ServerResponse, subPath: string): Promise<void> {
    if (!this.running) {
      rejectUnavailable(res);
      return;
    }

    if (subPath !== "/") {
      sendJson(res, 404, { error: "Not Found" });
      return;
    }

    const sessionId = headerValue(req, SESSION_HEADER);
    const existing = sessionId ? this.sessions.get(sessionId) : undefined;

    switch (req.method) {
      case "POST":
        await this.handlePost(req, res, sessionId, existing);
        return;
      case "GET":
      case "DELETE":
        if (!existing) {
          if (sessionId) {
            rejectUnknownSession(res);
          } else {
            sendJsonRpcError(res, 400, -32000, "Bad Request: Missing session ID");
          }
          return;
        }
        await existing.handleRequest(req, res);
        return;
      default:
        sendJson(res, 405, { error: "Method Not Allowed" });
    }
  }

  private async handlePost(
    req: IncomingMessage,
    res: ServerResponse,
    sessionId: string | undefined,
    existing: StreamableHTTPServerTransport | undefined,
  ): Promise<void> {
    const body = await readRequestBody(req);
    if (!this.running) {
      rejectUnavailable(res);
      return;
    }
    if (body === undefined) {
      sendJsonRpcError(res, 400, -32700, "Parse error: request body is not valid JSON");
      return;
    }

    if (existing) {
      await existing.handleRequest(req, res, body);
      return;
    }

    if (sessionId) {
      rejectUnknownSession(res);
      return;
    }
    if (!isInitializeRequest(body)) {
      sendJsonRpcError(res, 400, -32000, "Bad Request: No valid session ID provided");
      return;
    }

    const server = this.registry.createMcpServer();
    let adopted = false;
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => crypto.randomUUID(),
      onsessioninitialized: (sid) => {
        if (!this.running) return;
        adopted = true;
        this.sessions.set(sid, transport);
        logInfo(`Session initialized: ${sid}`, { component: this.name });
      },
    });
    transport.onclose = () => {
      const sid = transport.sessionId;
      if (sid && this.sessions.delete(sid)) {
        logInfo(`Session closed: ${sid}`, { component: this.name });
      }
    };

    await server.connect(transport);
    await transport.handleRequest(req, res, body);

    // closed mid-initialize, or the initialize was refused
    if (!adopted) {
      await transport.close();
    }
  }
}

function rejectUnavailable(res: ServerResponse): void {
  sendJsonRpcError(res, 503, -32000, "Service Unavailable: session manager is not running");
}

function rejectUnknownSession(res: ServerResponse): void {
  sendJsonRpcError(res, 404, -32001, "Session not found");
}
