import {Tool} from "../Tool.js";
import {z} from "zod";
import {ToolAnnotations} from "@modelcontextprotocol/sdk/types.js";
import {describeError, errorResult, StopContainerResult} from "../results.js";
import {daemonStatusCode, DOCKER_UNAVAILABLE_MESSAGE, DockerConnection} from "./docker-connection.js";

const STOP_TOOL_INPUT_SCHEMA = z.object({
    container_id: z.string().describe("ID or name of the container to stop"),
}).strict();

type StopContainerArgs = z.infer<typeof STOP_TOOL_INPUT_SCHEMA>;

const NOT_FOUND = 404;
const NOT_MODIFIED = 304;

export class StopContainerTool extends Tool<StopContainerArgs, StopContainerResult> {
    toolName = "stop_container";
    title = "Stop Container";
    description = "Stops a running Docker container by its ID.";
    inputSchema = STOP_TOOL_INPUT_SCHEMA;
    annotations: ToolAnnotations = {readOnlyHint: false, destructiveHint: true, idempotentHint: false, openWorldHint: false};

    private connection: DockerConnection;

    constructor(connection: DockerConnection) {
        super();
        this.connection = connection;
    }

    async handler(args: StopContainerArgs): Promise<StopContainerResult> {
        if (this.connection.state === "unavailable") {
            return {error: DOCKER_UNAVAILABLE_MESSAGE};
        }

        const id = args.container_id;
        const container = this.connection.docker.getContainer(id);
        try {
            await container.inspect();
        } catch (error) {
            if (daemonStatusCode(error) === NOT_FOUND) {
                return errorResult(`Container ${id} not found.`);
            }
            return errorResult(describeError(error));
        }

        try {
            await container.stop();
        } catch (error) {
            const status = daemonStatusCode(error);
            if (status === NOT_FOUND) {
                return errorResult(`Container ${id} not found.`);
            }
            // 304: already stopped
            if (status !== NOT_MODIFIED) {
                return errorResult(describeError(error));
            }
        }
        return {status: "success", message: `Container ${id} stopped.`};
    }
}
