#!/usr/bin/env node

/**
 * Development Toolbox MCP CLI
 *
 * Usage:
 *   development-toolbox-mcp [run] [--transport sse|stream-http] [--port <n>] [--host <addr>] [--debug]
 */

import { Command, Option } from "commander";
import * as fs from "node:fs";
import { runServer } from "./commands.js";
import { DEFAULT_HOST, DEFAULT_PORT } from "../server/config.js";
import { TRANSPORT_MODES } from "../transport/types.js";

const pkg: unknown = JSON.parse(
  fs.readFileSync(new URL("../../package.json", import.meta.url), "utf-8")
);
const version = typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
  ? pkg.version
  : "0.0.0";

const program = new Command();

program
  .name("development-toolbox-mcp")
  .description("Development Toolbox MCP Server - linting, type checking and Docker control over MCP")
  .version(version);

program
  .command("run", { isDefault: true })
  .description("Start the toolbox server (default command)")
  .addOption(
    new Option("--transport <transport>", "The transport to use")
      .choices([...TRANSPORT_MODES])
      .default("sse")
  )
  .option("-p, --port <number>", "Port to listen on", String(DEFAULT_PORT))
  .option("--host <string>", "Host to bind to", DEFAULT_HOST)
  .option("-d, --debug", "Enable debug logging")
  .action(async (options: { transport: string; port: string; host: string; debug?: boolean }) => {
    await runServer(options);
  });

await program.parseAsync();
