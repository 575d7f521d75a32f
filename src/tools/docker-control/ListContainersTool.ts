import {Tool} from "../Tool.js";
import {z} from "zod";
import {ToolAnnotations} from "@modelcontextprotocol/sdk/types.js";
import {ContainerSummary, describeError, ListContainersResult} from "../results.js";
import {ContainerListing, DOCKER_UNAVAILABLE_MESSAGE, DockerConnection, DockerDaemon} from "./docker-connection.js";

const LIST_TOOL_INPUT_SCHEMA = z.object({
    all_containers: z.boolean().default(false).describe("Include stopped containers as well as running ones"),
}).strict();

type ListContainersArgs = z.infer<typeof LIST_TOOL_INPUT_SCHEMA>;

const UNTAGGED_IMAGE = "N/A";
const SHORT_ID_LENGTH = 12;

export class ListContainersTool extends Tool<ListContainersArgs, ListContainersResult> {
    toolName = "list_containers";
    title = "List Containers";
    description = "Lists Docker containers. Only running containers are returned unless all_containers is true.";
    inputSchema = LIST_TOOL_INPUT_SCHEMA;
    annotations: ToolAnnotations = {readOnlyHint: true, destructiveHint: false, idempotentHint: true, openWorldHint: false};

    private connection: DockerConnection;

    constructor(connection: DockerConnection) {
        super();
        this.connection = connection;
    }

    async handler(args: ListContainersArgs): Promise<ListContainersResult> {
        if (this.connection.state === "unavailable") {
            return [{error: DOCKER_UNAVAILABLE_MESSAGE}];
        }
        const docker = this.connection.docker;

        try {
            const listings = await docker.listContainers({all: args.all_containers});
            const visible = args.all_containers
                ? listings
                : listings.filter((listing) => listing.State === "running");
            return await Promise.all(visible.map((listing) => summarize(docker, listing)));
        } catch (error) {
            return [{error: describeError(error)}];
        }
    }
}

async function summarize(docker: DockerDaemon, listing: ContainerListing): Promise<ContainerSummary> {
    return {
        id: listing.Id.slice(0, SHORT_ID_LENGTH),
        name: (listing.Names[0] ?? "").replace(/^\//, ""),
        image: await primaryImageTag(docker, listing.ImageID),
        status: listing.State,
    };
}

async function primaryImageTag(docker: DockerDaemon, imageId: string): Promise<string> {
    try {
        const image = await docker.getImage(imageId).inspect();
        return image.RepoTags?.[0] ?? UNTAGGED_IMAGE;
    } catch {
        // image may have been removed since the listing
        return UNTAGGED_IMAGE;
    }
}
