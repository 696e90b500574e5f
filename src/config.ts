import { z } from "zod";
import { ConfigError } from "./errors";
import type { LogLevel } from "./logger";
import type { RetryPolicy } from "./channel/retry";
import { GUARD_POLICIES, type GuardPolicy } from "./charger/chargerState";

const EnvSchema = z.object({
  MQTT_URL: z
    .string()
    .url()
    .refine((url) => /^(mqtts?|wss?|tcp|ssl):\/\//.test(url), {
      message: "must use an mqtt://, mqtts://, ws://, wss://, tcp:// or ssl:// URL",
    })
    .default("mqtt://localhost:1883"),
  MQTT_USERNAME: z.string().optional(),
  MQTT_PASSWORD: z.string().optional(),
  BASE_TOPIC: z
    .string()
    .refine(
      (topic) => !/[#+]/.test(topic) && !topic.startsWith("/") && !topic.endsWith("/"),
      { message: "must be a topic path without wildcards or leading/trailing '/'" },
    )
    .default("openevse"),
  CHARGER_CLIENT_ID: z.string().min(1).default("openevse_charger"),
  CONTROLLER_CLIENT_ID: z.string().min(1).default("openevse_simulator"),
  HEARTBEAT_INTERVAL_MS: z.coerce.number().int().positive().default(5000),
  TELEMETRY_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
  CHARGER_GUARDS: z.enum(GUARD_POLICIES).default("none"),
  ACK_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  PUBLISH_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(20).default(3),
  PUBLISH_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(200),
  DASHBOARD_PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  SIM_TIME_SCALE: z.coerce.number().positive().max(1).default(1),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export interface MqttConfig {
  url: string;
  username?: string;
  password?: string;
}

export interface AppConfig {
  mqtt: MqttConfig;
  baseTopic: string;
  chargerClientId: string;
  controllerClientId: string;
  heartbeatIntervalMs: number;
  telemetryIntervalMs: number;
  guards: GuardPolicy;
  /** Unset: the controller relies on its script delays alone. */
  ackTimeoutMs?: number;
  retry: RetryPolicy;
  dashboardPort: number;
  /** Multiplier applied to script waits by the single-process simulation. */
  timeScale: number;
  logLevel: LogLevel;
}

/**
 * Reads configuration from environment variables (entry scripts load `.env`
 * through dotenv first). Empty variables count as unset.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const vars = parsed.data;
  return {
    mqtt: {
      url: vars.MQTT_URL,
      username: vars.MQTT_USERNAME,
      password: vars.MQTT_PASSWORD,
    },
    baseTopic: vars.BASE_TOPIC,
    chargerClientId: vars.CHARGER_CLIENT_ID,
    controllerClientId: vars.CONTROLLER_CLIENT_ID,
    heartbeatIntervalMs: vars.HEARTBEAT_INTERVAL_MS,
    telemetryIntervalMs: vars.TELEMETRY_INTERVAL_MS,
    guards: vars.CHARGER_GUARDS,
    ackTimeoutMs: vars.ACK_TIMEOUT_MS,
    retry: {
      attempts: vars.PUBLISH_RETRY_ATTEMPTS,
      baseDelayMs: vars.PUBLISH_RETRY_BASE_DELAY_MS,
    },
    dashboardPort: vars.DASHBOARD_PORT,
    timeScale: vars.SIM_TIME_SCALE,
    logLevel: vars.LOG_LEVEL,
  };
}
