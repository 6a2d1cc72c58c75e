/**
 * Centralized Configuration Loader
 * --------------------------------------------------------------
 * Consolidates every environment variable the service reads into one typed
 * object with defaults for local development. Invalid values fail startup.
 */

import dotenv from "dotenv";
import { z } from "zod";

// Load .env file in local development (deployments inject env vars)
dotenv.config();

const bool = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v === "" ? fallback : v.toLowerCase() === "true"));

const EnvSchema = z.object({
  // 🌐 Server
  PORT: z.coerce.number().int().positive().default(8080),
  NODE_ENV: z.string().default("development"),
  SERVICE_NAME: z.string().default("dc-thermal-core"),

  // 🗄 Database
  DATABASE_URL: z.string().default(""),
  DB_MAX_CONNECTIONS: z.coerce.number().int().positive().default(10),

  // 🔐 Security
  AUTH_REQUIRED: bool(true),
  CORE_JWT_SECRET: z.string().default(""),
  CORE_JWT_ALG: z.enum(["HS256", "RS256"]).default("HS256"),
  CORE_JWT_PUBLIC_KEY: z.string().default(""),
  CORE_JWT_ISS: z.string().default("dc-thermal.auth"),
  CORE_JWT_AUD: z.string().default("dc-thermal.core"),
  DEVICE_API_KEY: z.string().default(""),

  // 🌡 Thresholds
  TEMPERATURE_CRITICAL_THRESHOLD: z.coerce.number().positive().default(5.0),
  TEMPERATURE_WARNING_OFFSET: z.coerce.number().positive().default(2.0),
  TEMPERATURE_LOW_OFFSET: z.coerce.number().positive().default(3.0),
  HUMIDITY_HIGH_OFFSET: z.coerce.number().positive().default(15),
  HYSTERESIS_THRESHOLD: z.coerce.number().nonnegative().default(1.0),

  // 🚨 Alerts
  ALERT_COOLDOWN_MINUTES: z.coerce.number().nonnegative().default(5),
  ALERT_ESCALATION_MINUTES: z.coerce.number().positive().default(30),
  ESCALATION_WEBHOOK_URL: z.string().default(""),

  // 🧹 Housekeeping
  SENSOR_OFFLINE_THRESHOLD_MINUTES: z.coerce.number().positive().default(5),
  DATA_RETENTION_DAYS: z.coerce.number().int().positive().default(30),
  READING_AGGREGATION_HOURS: z.coerce.number().int().positive().default(24),
  COMMAND_LOG_RETENTION_DAYS: z.coerce.number().int().positive().default(90),
  ALERT_RETENTION_DAYS: z.coerce.number().int().positive().default(365),
  ENABLE_CRON: bool(true),

  // 📡 IR transmitters
  IR_GATEWAY_URL: z.string().default(""),
  IR_COMMAND_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  IR_ALLOW_MISSING_CODES: bool(true),
});

export type AppConfig = z.infer<typeof EnvSchema>;

/**
 * Values the alerting, actuation and housekeeping components are built
 * with. Handed to each component at construction.
 */
export interface ThermalSettings {
  temperatureCriticalThreshold: number;
  temperatureWarningOffset: number;
  temperatureLowOffset: number;
  humidityHighOffset: number;
  hysteresis: number;
  alertCooldownMinutes: number;
  alertEscalationMinutes: number;
  sensorOfflineThresholdMinutes: number;
  dataRetentionDays: number;
  readingAggregationHours: number;
  commandLogRetentionDays: number;
  alertRetentionDays: number;
  allowMissingIrCodes: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid environment configuration: ${issues.join("; ")}`);
  }
  return parsed.data;
}

export function settingsFromConfig(c: AppConfig): ThermalSettings {
  return {
    temperatureCriticalThreshold: c.TEMPERATURE_CRITICAL_THRESHOLD,
    temperatureWarningOffset: c.TEMPERATURE_WARNING_OFFSET,
    temperatureLowOffset: c.TEMPERATURE_LOW_OFFSET,
    humidityHighOffset: c.HUMIDITY_HIGH_OFFSET,
    hysteresis: c.HYSTERESIS_THRESHOLD,
    alertCooldownMinutes: c.ALERT_COOLDOWN_MINUTES,
    alertEscalationMinutes: c.ALERT_ESCALATION_MINUTES,
    sensorOfflineThresholdMinutes: c.SENSOR_OFFLINE_THRESHOLD_MINUTES,
    dataRetentionDays: c.DATA_RETENTION_DAYS,
    readingAggregationHours: c.READING_AGGREGATION_HOURS,
    commandLogRetentionDays: c.COMMAND_LOG_RETENTION_DAYS,
    alertRetentionDays: c.ALERT_RETENTION_DAYS,
    allowMissingIrCodes: c.IR_ALLOW_MISSING_CODES,
  };
}

export const cfg = loadConfig();

export default cfg;
