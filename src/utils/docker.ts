import { existsSync } from 'node:fs';
import { userInfo } from 'node:os';
import { logDebug } from './logger.js';

export const DEFAULT_DOCKER_SOCKET = '/var/run/docker.sock';

/**
 * Socket path for dockerode, or undefined when DOCKER_HOST is set and
 * dockerode should read it itself. Probes the rootful Docker socket, then
 * rootless and rootful Podman.
 */
export function resolveDockerSocketPath(): string | undefined {
  if (process.env.DOCKER_HOST) {
    logDebug('DOCKER_HOST is set, letting dockerode handle it', { component: 'DockerUtils' });
    return undefined;
  }

  const candidates = [
    DEFAULT_DOCKER_SOCKET,
    `/run/user/${userInfo().uid}/podman/podman.sock`,
    '/run/podman/podman.sock',
  ];
  const found = candidates.find((path) => existsSync(path));
  if (found) {
    logDebug(`Found socket at ${found}`, { component: 'DockerUtils' });
    return found;
  }

  logDebug(`No socket found, using ${DEFAULT_DOCKER_SOCKET}`, { component: 'DockerUtils' });
  return DEFAULT_DOCKER_SOCKET;
}
