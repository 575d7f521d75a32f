import {Tool} from "../Tool.js";
import {z} from "zod";
import {ToolAnnotations} from "@modelcontextprotocol/sdk/types.js";
import {AnalysisResult, describeError, errorResult} from "../results.js";
import {ExecutableNotFoundError, runProcess} from "./process-runner.js";

const ANALYZER_INPUT_SCHEMA = z.object({
    project_path: z.string().describe("Path of the file or directory to analyse"),
}).strict();

export type AnalyzerArgs = z.infer<typeof ANALYZER_INPUT_SCHEMA>;

/**
 * Shared body of the code-analysis tools: run `<command> [...leadingArgs] <project_path>`
 * and report its output. A non-zero exit means the analyser found issues, which
 * is still a successful invocation.
 */
export abstract class AnalyzerTool extends Tool<AnalyzerArgs, AnalysisResult> {
    inputSchema = ANALYZER_INPUT_SCHEMA;
    annotations: ToolAnnotations = {readOnlyHint: true, destructiveHint: false, idempotentHint: true, openWorldHint: false};

    /** Human-readable program name used in the not-installed message. */
    protected abstract displayName: string;
    /** Returned as `output` when the program printed nothing on stdout. */
    protected abstract emptyOutput: string;
    protected abstract leadingArgs: string[];

    protected readonly command: string;

    constructor(command: string) {
        super();
        this.command = command;
    }

    async handler(args: AnalyzerArgs): Promise<AnalysisResult> {
        try {
            const outcome = await runProcess(this.command, [...this.leadingArgs, args.project_path]);
            return {
                status: "success",
                output: outcome.stdout || this.emptyOutput,
                errors: outcome.stderr,
            };
        } catch (error) {
            if (error instanceof ExecutableNotFoundError) {
                return errorResult(`${this.displayName} is not installed or not in PATH.`);
            }
            return errorResult(describeError(error));
        }
    }
}
