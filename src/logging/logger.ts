// ---------------------------------------------------------------------------
// Pino structured JSON logger factory.
// ---------------------------------------------------------------------------

import pino from "pino";
import type { LoggingConfig } from "../core/types.js";

/** Paths that should be redacted from log output to avoid leaking secrets. */
const SECRET_PATHS: string[] = [
  "apiKey",
  "*.apiKey",
  "api.apiKey",
  "headers.authorization",
];

/**
 * Create a configured pino logger instance.
 *
 * - JSON output to stdout (pino default)
 * - Secret redaction on sensitive key paths
 * - Optional pretty-print via `pino-pretty` for interactive runs
 * - Optional copy of every line to `config.file`
 */
export function createLogger(config: LoggingConfig): pino.Logger {
  const baseOptions: pino.LoggerOptions = {
    level: config.level,
    base: {
      service: "news-labeler",
      version: process.env["APP_VERSION"] ?? "dev",
    },
    ...(config.redactSecrets
      ? {
          redact: {
            paths: SECRET_PATHS,
            censor: "[REDACTED]",
          },
        }
      : {}),
  };

  const targets: pino.TransportTargetOptions[] = [];

  if (config.prettyPrint) {
    targets.push({
      target: "pino-pretty",
      level: config.level,
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname,service,version",
      },
    });
  }

  if (config.file) {
    targets.push({
      target: "pino/file",
      level: config.level,
      options: { destination: config.file, mkdir: true },
    });
    if (!config.prettyPrint) {
      targets.push({ target: "pino/file", level: config.level, options: { destination: 1 } });
    }
  }

  if (targets.length === 0) {
    return pino(baseOptions);
  }

  return pino({ ...baseOptions, transport: { targets } });
}
