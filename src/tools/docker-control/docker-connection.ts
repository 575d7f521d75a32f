/**
 * Process-scoped connection to the container daemon.
 *
 * Established once at startup. When the daemon cannot be reached the
 * connection is `unavailable` for the rest of the process lifetime and every
 * docker-control tool short-circuits on it.
 */

import Docker from 'dockerode';
import { resolveDockerSocketPath } from '../../utils/docker.js';
import { logInfo, logWarn } from '../../utils/logger.js';
import { describeError } from '../results.js';

export type ContainerListing = Pick<Docker.ContainerInfo, 'Id' | 'Names' | 'ImageID' | 'State'>;

/** The subset of the dockerode client the docker-control tools call. */
export interface DockerDaemon {
  ping(): Promise<unknown>;
  listContainers(options: { all: boolean }): Promise<ContainerListing[]>;
  getContainer(id: string): {
    inspect(): Promise<Pick<Docker.ContainerInspectInfo, 'Id'>>;
    stop(): Promise<unknown>;
  };
  getImage(name: string): {
    inspect(): Promise<Pick<Docker.ImageInspectInfo, 'RepoTags'>>;
  };
}

export type DockerConnection =
  | { state: 'connected'; docker: DockerDaemon }
  | { state: 'unavailable'; reason: string };

export const DOCKER_UNAVAILABLE_MESSAGE = 'Docker is not running or is not installed.';

export function createDockerClient(): Docker {
  const socketPath = resolveDockerSocketPath();
  return new Docker(socketPath ? { socketPath } : {});
}

/**
 * Ping the daemon once and fix the connection state for this process.
 */
export async function connectDocker(docker: DockerDaemon = createDockerClient()): Promise<DockerConnection> {
  try {
    await docker.ping();
    logInfo('Connected to container daemon', { component: 'Docker' });
    return { state: 'connected', docker };
  } catch (error) {
    const reason = describeError(error);
    logWarn(`Docker not available: ${reason}`, { component: 'Docker' });
    return { state: 'unavailable', reason };
  }
}

/** Daemon API errors carry the HTTP status the daemon answered with. */
export function daemonStatusCode(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}
