import {McpServer, RegisteredTool} from "@modelcontextprotocol/sdk/server/mcp.js";
import {CallToolResult, ToolAnnotations} from "@modelcontextprotocol/sdk/types.js";
import {z} from "zod";
import {describeError, errorResult, InvocationResult, ToolErrorResult} from "./results.js";
import {logError, toLoggable} from "../utils/logger.js";

/** Validates raw call arguments into the handler's argument type. */
export type ToolInputSchema<ARGS> = z.ZodType<ARGS, z.ZodTypeDef, unknown>;

/**
 * A named, schema-described tool. Subclasses implement `handler` and are
 * expected to translate their own failures into an InvocationResult; `invoke`
 * is the last line that turns anything that still escapes into an error
 * record so the transport only ever forwards structured results.
 */
export abstract class Tool<ARGS, RESULT extends InvocationResult = InvocationResult> {
    abstract toolName: string;
    abstract title: string;
    abstract description: string;
    abstract inputSchema: ToolInputSchema<ARGS>;
    annotations?: ToolAnnotations;

    abstract handler(args: ARGS): Promise<RESULT>;

    parseArguments(args: unknown): z.SafeParseReturnType<unknown, ARGS> {
        return this.inputSchema.safeParse(args ?? {});
    }

    async invoke(args: ARGS): Promise<RESULT | ToolErrorResult> {
        try {
            return await this.handler(args);
        } catch (error) {
            logError(`Tool ${this.toolName} raised an unexpected fault`, toLoggable(error));
            return errorResult(describeError(error));
        }
    }

    registerWithMcpServer(server: McpServer): RegisteredTool {
        return server.registerTool(
            this.toolName,
            {
                title: this.title,
                description: this.description,
                inputSchema: this.inputSchema,
                annotations: this.annotations,
            },
            async (args: unknown): Promise<CallToolResult> => {
                const parsed = this.parseArguments(args);
                if (!parsed.success) {
                    return {
                        content: [{type: "text", text: `Invalid arguments for tool ${this.toolName}: ${parsed.error.message}`}],
                        isError: true,
                    };
                }
                return toCallToolResult(await this.invoke(parsed.data));
            }
        );
    }
}

/**
 * Wrap an InvocationResult for the wire: one JSON text block, plus
 * structuredContent when the result is a record.
 */
export function toCallToolResult(result: InvocationResult): CallToolResult {
    const text = JSON.stringify(result, null, 2);
    if (Array.isArray(result)) {
        return {content: [{type: "text", text}]};
    }
    return {content: [{type: "text", text}], structuredContent: result};
}
