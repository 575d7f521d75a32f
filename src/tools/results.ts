/**
 * Invocation result shapes shared by every tool.
 *
 * Every tool call resolves to one of these values; failures are encoded in
 * the value itself (a `status: "error"` record or an `{ error }` record) so
 * nothing above the handler layer ever has to interpret a thrown fault.
 */

export type ToolErrorResult = {
    status: "error";
    message: string;
};

export type AnalysisSuccessResult = {
    status: "success";
    output: string;
    errors: string;
};

export type AnalysisResult = AnalysisSuccessResult | ToolErrorResult;

/** Returned by every docker-control tool when no daemon connection exists. */
export type DaemonUnavailableResult = {
    error: string;
};

export type ContainerSummary = {
    id: string;
    name: string;
    image: string;
    status: string;
};

export type ListContainersResult = ContainerSummary[] | [DaemonUnavailableResult];

export type StopContainerResult =
    | { status: "success"; message: string }
    | ToolErrorResult
    | DaemonUnavailableResult;

export type InvocationResult = AnalysisResult | ListContainersResult | StopContainerResult;

export function errorResult(message: string): ToolErrorResult {
    return {status: "error", message};
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
