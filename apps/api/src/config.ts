import { config as loadEnv } from "dotenv";
import { dirname, resolve } from "path";
import { fileURLToPath } from "url";
import type { Welcome } from "@rendezvous-relay/shared";

// Project root .env, wherever the process was started from (apps/api/src → root)
export const ENV_FILE_PATH = resolve(dirname(fileURLToPath(import.meta.url)), "../../../.env");

loadEnv({ path: ENV_FILE_PATH });

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export interface Config {
  nodeEnv: string;
  port: number;
  host: string;
  logLevel: LogLevel;

  // WebSocket transport
  wsPath: string;
  maxPayloadBytes: number;
  logRequests: boolean;

  // Connection attempts per IP per minute
  rateLimitMax: number;

  // Sent to every client on connect
  welcome: Welcome;
}

export interface ConfigValidationIssue {
  key: string;
  reason: string;
}

export interface ConfigValidationResult {
  ok: boolean;
  errors: ConfigValidationIssue[];
  warnings: ConfigValidationIssue[];
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): Config {
  const nodeEnv = env.NODE_ENV || "development";

  return {
    nodeEnv,
    port: parseInt(env.PORT || "4000", 10),
    host: env.HOST || "0.0.0.0",
    logLevel: parseLogLevel(env.LOG_LEVEL, nodeEnv === "development" ? "info" : "warn"),

    wsPath: env.RELAY_WS_PATH || "/v1",
    maxPayloadBytes: parseInt(env.RELAY_MAX_PAYLOAD_BYTES || "1048576", 10),
    logRequests: env.RELAY_LOG_REQUESTS === "true",

    rateLimitMax: parseInt(env.RELAY_RATE_LIMIT_MAX || "300", 10),

    welcome: parseWelcome(env),
  };
}

export function validateConfig(currentConfig: Config): ConfigValidationResult {
  const errors: ConfigValidationIssue[] = [];
  const warnings: ConfigValidationIssue[] = [];

  if (!Number.isInteger(currentConfig.port) || currentConfig.port < 0 || currentConfig.port > 65535) {
    errors.push({ key: "PORT", reason: "Port must be an integer between 0 and 65535." });
  }

  if (!currentConfig.wsPath.startsWith("/")) {
    errors.push({ key: "RELAY_WS_PATH", reason: "WebSocket path must start with '/'." });
  }

  if (!Number.isInteger(currentConfig.maxPayloadBytes) || currentConfig.maxPayloadBytes <= 0) {
    errors.push({ key: "RELAY_MAX_PAYLOAD_BYTES", reason: "Maximum payload must be a positive integer." });
  }

  if (!Number.isInteger(currentConfig.rateLimitMax) || currentConfig.rateLimitMax <= 0) {
    errors.push({ key: "RELAY_RATE_LIMIT_MAX", reason: "Rate limit must be a positive integer." });
  }

  if (currentConfig.welcome.error) {
    warnings.push({
      key: "RELAY_WELCOME_ERROR",
      reason: "Every client will display the welcome error and abort.",
    });
  }

  return {
    ok: errors.length === 0,
    errors,
    warnings,
  };
}

function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  const normalized = (value || "").trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

function parseWelcome(env: Env): Welcome {
  const welcome: Welcome = {};
  if (env.RELAY_WELCOME_CURRENT_VERSION) welcome.currentVersion = env.RELAY_WELCOME_CURRENT_VERSION;
  if (env.RELAY_WELCOME_MOTD) welcome.motd = env.RELAY_WELCOME_MOTD;
  if (env.RELAY_WELCOME_ERROR) welcome.error = env.RELAY_WELCOME_ERROR;
  return welcome;
}
