import { fileURLToPath } from "node:url";
import { isIsoDate } from "./analysis/dates.js";
import type { LogLevel } from "./logger.js";

export interface Config {
  sources: {
    ledgerPath?: string;
    dailyNotesPath?: string;
    /** Earliest daily note to read */
    notesSince?: string;
    activitiesPath: string;
  };
  server: {
    port: number;
    transport: "stdio" | "http";
    corsOrigins: string[];
  };
  auth: {
    apiToken?: string;
  };
  rateLimit: {
    rpm: number;
  };
  callouts: {
    window: number;
    threshold: number;
    bufferDays: number;
  };
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

const DEFAULT_ACTIVITIES_PATH = fileURLToPath(
  new URL("../data/activities.json", import.meta.url),
);

export function loadConfig(
  env: Env = process.env,
  argv: readonly string[] = process.argv,
): Config {
  const notesSince = env.NOTES_SINCE || undefined;
  if (notesSince && !isIsoDate(notesSince)) {
    throw new Error(`NOTES_SINCE must be a YYYY-MM-DD date, got "${notesSince}"`);
  }

  return {
    sources: {
      ledgerPath: env.LEDGER_PATH || undefined,
      dailyNotesPath: env.DAILY_NOTES_PATH || undefined,
      notesSince,
      activitiesPath: env.ACTIVITIES_PATH || DEFAULT_ACTIVITIES_PATH,
    },
    server: {
      port: parseInteger(env, "PORT", 3200),
      transport: resolveTransport(env, argv),
      corsOrigins: (env.CORS_ORIGINS || "http://localhost:3000")
        .split(",")
        .map((origin) => origin.trim())
        .filter(Boolean),
    },
    auth: {
      apiToken: env.API_TOKEN || undefined,
    },
    rateLimit: {
      rpm: parsePositiveInteger(env, "RATE_LIMIT_RPM", 60),
    },
    callouts: {
      window: parsePositiveInteger(env, "CALLOUT_WINDOW", 7),
      threshold: parseNumber(env, "CALLOUT_THRESHOLD", 2),
      bufferDays: parseInteger(env, "CALLOUT_BUFFER_DAYS", 3),
    },
    logLevel: resolveLogLevel(env.LOG_LEVEL),
  };
}

function resolveTransport(env: Env, argv: readonly string[]): "stdio" | "http" {
  // CLI flag takes precedence
  const args = argv.slice(2);
  const transportIdx = args.indexOf("--transport");
  if (transportIdx !== -1) {
    const val = args[transportIdx + 1];
    if (val === "stdio" || val === "http") return val;
  }

  // Then env var
  const envTransport = env.TRANSPORT;
  if (envTransport === "stdio" || envTransport === "http") return envTransport;

  // Default
  return "stdio";
}

function resolveLogLevel(value: string | undefined): LogLevel {
  switch (value) {
    case "debug":
    case "info":
    case "warn":
    case "error":
      return value;
    default:
      return "info";
  }
}

function parseInteger(env: Env, key: string, fallback: number): number {
  const value = parseNumber(env, key, fallback);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${key} must be a non-negative integer, got "${env[key]}"`);
  }
  return value;
}

function parsePositiveInteger(env: Env, key: string, fallback: number): number {
  const value = parseInteger(env, key, fallback);
  if (value === 0) {
    throw new Error(`${key} must be a positive integer, got "${env[key]}"`);
  }
  return value;
}

function parseNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${key} must be a number, got "${raw}"`);
  }
  return value;
}
