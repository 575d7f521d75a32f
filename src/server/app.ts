/**
 * Composite application: one HTTP listener, one transport adapter per
 * mount prefix. A request is handed to at most one adapter, so a path under
 * one prefix can never reach another registry's tools.
 */

import * as http from "node:http";
import type { TransportAdapter, TransportMode } from "../transport/types.js";
import { sendJson } from "../transport/http-utils.js";
import { logDebug, logError, toLoggable } from "../utils/logger.js";

export interface Mount {
  prefix: string;
  adapter: TransportAdapter;
}

export interface MountMatch {
  mount: Mount;
  subPath: string;
}

function assertValidMounts(mounts: readonly Mount[]): void {
  for (const { prefix } of mounts) {
    if (!/^\/[^/]+(\/[^/]+)*$/.test(prefix)) {
      throw new Error(`Invalid mount prefix "${prefix}": must start with "/" and must not end with "/"`);
    }
  }
  for (const a of mounts) {
    for (const b of mounts) {
      if (a !== b && (a.prefix === b.prefix || b.prefix.startsWith(`${a.prefix}/`))) {
        throw new Error(`Mount prefixes "${a.prefix}" and "${b.prefix}" overlap`);
      }
    }
  }
}

/**
 * Find the mount owning `pathname`. The prefix must match a whole path
 * segment: "/code" owns "/code" and "/code/x" but not "/codebase".
 */
export function resolveMount(mounts: readonly Mount[], pathname: string): MountMatch | undefined {
  for (const mount of mounts) {
    if (pathname === mount.prefix) {
      return { mount, subPath: "/" };
    }
    if (pathname.startsWith(`${mount.prefix}/`)) {
      return { mount, subPath: pathname.slice(mount.prefix.length) };
    }
  }
  return undefined;
}

export class CompositeApp {
  readonly transport: TransportMode;
  private readonly mounts: readonly Mount[];
  private server: http.Server | undefined;

  constructor(transport: TransportMode, mounts: readonly Mount[]) {
    assertValidMounts(mounts);
    this.transport = transport;
    this.mounts = mounts;
  }

  get adapters(): TransportAdapter[] {
    return this.mounts.map((mount) => mount.adapter);
  }

  handle = async (req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
    const url = new URL(req.url ?? "/", "http://localhost");

    if (url.pathname === "/health" && req.method === "GET") {
      sendJson(res, 200, { status: "ok", transport: this.transport });
      return;
    }

    const match = resolveMount(this.mounts, url.pathname);
    if (!match) {
      sendJson(res, 404, { error: "Not Found" });
      return;
    }

    logDebug(`${req.method ?? "?"} ${url.pathname} -> ${match.mount.adapter.name}`, { component: "App" });
    try {
      await match.mount.adapter.handleRequest(req, res, match.subPath, url);
    } catch (error) {
      logError(`Unhandled error serving ${url.pathname}`, toLoggable(error));
      if (!res.headersSent) {
        sendJson(res, 500, { error: "Internal Server Error" });
      } else {
        res.end();
      }
    }
  };

  /** Start listening; resolves with the bound port. */
  async listen(port: number, host: string): Promise<number> {
    const server = http.createServer((req, res) => {
      void this.handle(req, res);
    });

    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(port, host, () => {
        server.off("error", reject);
        resolve();
      });
    });
    this.server = server;

    const address = server.address();
    return typeof address === "object" && address !== null ? address.port : port;
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = undefined;
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
