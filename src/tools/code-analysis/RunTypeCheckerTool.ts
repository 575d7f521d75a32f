import {AnalyzerTool} from "./AnalyzerTool.js";

export const DEFAULT_TYPE_CHECKER_COMMAND = "mypy";

export class RunTypeCheckerTool extends AnalyzerTool {
    toolName = "run_type_checker";
    title = "Run Type Checker";
    description = "Performs static type checking using Mypy and returns the results.";
    protected displayName = "Mypy";
    protected emptyOutput = "No type errors found.";
    protected leadingArgs: string[] = [];

    constructor(command: string = DEFAULT_TYPE_CHECKER_COMMAND) {
        super(command);
    }
}
