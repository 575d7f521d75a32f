import {AnalyzerTool} from "./AnalyzerTool.js";

export const DEFAULT_LINTER_COMMAND = "ruff";

export class RunLinterTool extends AnalyzerTool {
    toolName = "run_linter";
    title = "Run Linter";
    description = "Performs linting and static analysis using Ruff and returns the results.";
    protected displayName = "Ruff";
    protected emptyOutput = "No issues found.";
    protected leadingArgs = ["check"];

    constructor(command: string = DEFAULT_LINTER_COMMAND) {
        super(command);
    }
}
