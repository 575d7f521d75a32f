/**
 * Tool registry: an immutable, name-keyed, registration-ordered set of tools
 * served together as one MCP server.
 */

import {McpServer} from "@modelcontextprotocol/sdk/server/mcp.js";
import {Tool} from "../tools/Tool.js";
import {InvocationResult} from "../tools/results.js";

export type AnyTool = Tool<unknown, InvocationResult>;

export type InvocationOutcome =
    | { kind: "ok"; result: InvocationResult }
    | { kind: "tool-not-found"; name: string; message: string }
    | { kind: "invalid-arguments"; name: string; message: string };

export class DuplicateToolError extends Error {
    constructor(registryName: string, toolName: string) {
        super(`Tool "${toolName}" is already registered in ${registryName}`);
        this.name = "DuplicateToolError";
    }
}

export class ToolRegistry {
    readonly name: string;
    readonly version: string;
    private readonly tools: ReadonlyMap<string, AnyTool>;

    constructor(name: string, version: string, tools: ReadonlyMap<string, AnyTool>) {
        this.name = name;
        this.version = version;
        this.tools = tools;
    }

    /** Tools in registration order. */
    list(): AnyTool[] {
        return [...this.tools.values()];
    }

    toolNames(): string[] {
        return [...this.tools.keys()];
    }

    has(name: string): boolean {
        return this.tools.has(name);
    }

    /**
     * Direct dispatch, bypassing any transport. Unknown names and malformed
     * arguments come back as outcomes, never as exceptions.
     */
    async invoke(name: string, args: unknown): Promise<InvocationOutcome> {
        const tool = this.tools.get(name);
        if (!tool) {
            return {kind: "tool-not-found", name, message: `Tool ${name} not found`};
        }
        const parsed = tool.parseArguments(args);
        if (!parsed.success) {
            return {kind: "invalid-arguments", name, message: parsed.error.message};
        }
        return {kind: "ok", result: await tool.invoke(parsed.data)};
    }

    /**
     * Build a fresh McpServer exposing every tool. An McpServer binds to a
     * single transport, so each session gets its own.
     */
    createMcpServer(): McpServer {
        const server = new McpServer({name: this.name, version: this.version});
        for (const tool of this.tools.values()) {
            tool.registerWithMcpServer(server);
        }
        return server;
    }
}

export class ToolRegistryBuilder {
    private readonly tools = new Map<string, AnyTool>();

    constructor(private readonly name: string, private readonly version: string = "1.0.0") {}

    register(tool: AnyTool): this {
        if (this.tools.has(tool.toolName)) {
            throw new DuplicateToolError(this.name, tool.toolName);
        }
        this.tools.set(tool.toolName, tool);
        return this;
    }

    build(): ToolRegistry {
        return new ToolRegistry(this.name, this.version, new Map(this.tools));
    }
}
