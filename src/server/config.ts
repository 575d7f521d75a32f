/**
 * Runtime configuration, assembled from CLI options and environment
 * variables and validated with zod.
 */

import { z } from "zod";
import { TRANSPORT_MODES } from "../transport/types.js";
import { DEFAULT_LINTER_COMMAND } from "../tools/code-analysis/RunLinterTool.js";
import { DEFAULT_TYPE_CHECKER_COMMAND } from "../tools/code-analysis/RunTypeCheckerTool.js";

export const DEFAULT_PORT = 9654;
export const DEFAULT_HOST = "0.0.0.0";

export const LINTER_COMMAND_ENV = "TOOLBOX_LINTER_COMMAND";
export const TYPE_CHECKER_COMMAND_ENV = "TOOLBOX_TYPE_CHECKER_COMMAND";

// a blank string would coerce to 0 and silently bind an ephemeral port
const PortSchema = z
  .union([z.number(), z.string().trim().min(1, "must not be empty")])
  .pipe(z.coerce.number().int().min(0).max(65535));

const ToolboxConfigSchema = z.object({
  transport: z.enum(TRANSPORT_MODES).default("sse"),
  port: PortSchema.default(DEFAULT_PORT),
  host: z.string().min(1).default(DEFAULT_HOST),
  debug: z.boolean().default(false),
  linterCommand: z.string().min(1).default(DEFAULT_LINTER_COMMAND),
  typeCheckerCommand: z.string().min(1).default(DEFAULT_TYPE_CHECKER_COMMAND),
});

export type ToolboxConfig = z.infer<typeof ToolboxConfigSchema>;

/** Options as they arrive from the command line (all strings or flags). */
export interface CliOptions {
  transport?: string;
  port?: string | number;
  host?: string;
  debug?: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function resolveToolboxConfig(options: CliOptions = {}, env: NodeJS.ProcessEnv = process.env): ToolboxConfig {
  const parsed = ToolboxConfigSchema.safeParse({
    transport: options.transport,
    port: options.port,
    host: options.host,
    debug: options.debug,
    linterCommand: env[LINTER_COMMAND_ENV] || undefined,
    typeCheckerCommand: env[TYPE_CHECKER_COMMAND_ENV] || undefined,
  });

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  return parsed.data;
}
