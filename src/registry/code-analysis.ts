import {ToolRegistry, ToolRegistryBuilder} from "./tool-registry.js";
import {DEFAULT_LINTER_COMMAND, RunLinterTool} from "../tools/code-analysis/RunLinterTool.js";
import {DEFAULT_TYPE_CHECKER_COMMAND, RunTypeCheckerTool} from "../tools/code-analysis/RunTypeCheckerTool.js";

export const CODE_ANALYSIS_SERVER_NAME = "CodeAnalysisServer";

export interface CodeAnalysisOptions {
    linterCommand?: string;
    typeCheckerCommand?: string;
}

export function createCodeAnalysisRegistry(options: CodeAnalysisOptions = {}): ToolRegistry {
    return new ToolRegistryBuilder(CODE_ANALYSIS_SERVER_NAME)
        .register(new RunLinterTool(options.linterCommand ?? DEFAULT_LINTER_COMMAND))
        .register(new RunTypeCheckerTool(options.typeCheckerCommand ?? DEFAULT_TYPE_CHECKER_COMMAND))
        .build();
}
