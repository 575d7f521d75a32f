import {ToolRegistry, ToolRegistryBuilder} from "./tool-registry.js";
import {DockerConnection} from "../tools/docker-control/docker-connection.js";
import {ListContainersTool} from "../tools/docker-control/ListContainersTool.js";
import {StopContainerTool} from "../tools/docker-control/StopContainerTool.js";

export const DOCKER_CONTROL_SERVER_NAME = "DockerControlServer";

export function createDockerControlRegistry(connection: DockerConnection): ToolRegistry {
    return new ToolRegistryBuilder(DOCKER_CONTROL_SERVER_NAME)
        .register(new ListContainersTool(connection))
        .register(new StopContainerTool(connection))
        .build();
}
