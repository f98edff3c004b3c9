import Ajv, { type JTDDataType } from "ajv/dist/jtd";
import { ConfigError } from "./errors.ts";
import type { SessionOptions } from "./session/device-session.ts";

export const ENV_PREFIX = "PRANA_GATEWAY_";

const schema = {
  properties: {
    host: { type: "string" },
    port: { type: "uint16" },
    connectAttempts: { type: "uint32" },
    connectTimeoutMs: { type: "uint32" },
    backoffBaseMs: { type: "uint32" },
    backoffMaxMs: { type: "uint32" },
    maxRetries: { type: "uint32" },
    protocolRetries: { type: "uint32" },
    responseTimeoutMs: { type: "uint32" },
    commandTimeoutMs: { type: "uint32" },
    stalenessMs: { type: "uint32" },
    idleTimeoutMs: { type: "uint32" },
    evictionIntervalMs: { type: "uint32" },
    scanDurationMs: { type: "uint32" },
    /** 0 disables recurring discovery */
    scanIntervalMs: { type: "uint32" },
  },
} as const;

export type GatewayConfig = JTDDataType<typeof schema>;

const ajv = new Ajv({ allErrors: true });
const validateConfig = ajv.compile<GatewayConfig>(schema);

export const DEFAULT_CONFIG: GatewayConfig = {
  host: "0.0.0.0",
  port: 8080,
  connectAttempts: 3,
  connectTimeoutMs: 5000,
  backoffBaseMs: 250,
  backoffMaxMs: 4000,
  maxRetries: 2,
  protocolRetries: 1,
  responseTimeoutMs: 2000,
  commandTimeoutMs: 15000,
  stalenessMs: 10000,
  idleTimeoutMs: 300000,
  evictionIntervalMs: 60000,
  scanDurationMs: 5000,
  scanIntervalMs: 60000,
};

/** `connectTimeoutMs` -> `PRANA_GATEWAY_CONNECT_TIMEOUT_MS` */
export function envName(key: string): string {
  return ENV_PREFIX + key.replace(/[A-Z]/g, (letter) => `_${letter}`).toUpperCase();
}

// Unparseable values are passed through as strings so validation reports them
const parseNumber = (value: string, fallback: number): number | string => {
  if (value.trim() === "") {
    return fallback;
  }

  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : value;
};

/**
 * Builds the configuration from environment variables over the defaults.
 *
 * @throws ConfigError if a value is not valid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const raw: Record<string, unknown> = {};
  for (const [key, fallback] of Object.entries(DEFAULT_CONFIG)) {
    const value = env[envName(key)];
    if (value === undefined) {
      raw[key] = fallback;
    } else if (typeof fallback === "number") {
      raw[key] = parseNumber(value, fallback);
    } else {
      raw[key] = value.trim() || fallback;
    }
  }

  if (!validateConfig(raw)) {
    const errors = (validateConfig.errors ?? []).map((error) => {
      const key = error.instancePath.replace(/^\//, "");
      return `${envName(key)} ${error.message ?? "is invalid"}`;
    });
    throw new ConfigError(`Invalid configuration: ${errors.join("; ")}`);
  }

  checkRanges(raw);
  return raw;
}

function checkRanges(config: GatewayConfig): void {
  const problems: string[] = [];
  if (config.connectAttempts < 1) problems.push(`${envName("connectAttempts")} must be at least 1`);
  if (config.backoffMaxMs < config.backoffBaseMs) {
    problems.push(`${envName("backoffMaxMs")} must not be below ${envName("backoffBaseMs")}`);
  }
  for (const key of ["connectTimeoutMs", "responseTimeoutMs", "commandTimeoutMs", "evictionIntervalMs"] as const) {
    if (config[key] === 0) problems.push(`${envName(key)} must be positive`);
  }

  if (problems.length > 0) {
    throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`);
  }
}

/** The part of the configuration each device session uses */
export function sessionOptions(config: GatewayConfig): SessionOptions {
  return {
    connectAttempts: config.connectAttempts,
    connectTimeoutMs: config.connectTimeoutMs,
    backoffBaseMs: config.backoffBaseMs,
    backoffMaxMs: config.backoffMaxMs,
    maxRetries: config.maxRetries,
    protocolRetries: config.protocolRetries,
    responseTimeoutMs: config.responseTimeoutMs,
    commandTimeoutMs: config.commandTimeoutMs,
    stalenessMs: config.stalenessMs,
  };
}
