import { z } from "zod";

export const SERVER_INFO = {
  name: "Interval Workout",
  version: "0.1.0"
} as const;

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(2091),
  DATA_FILE: z.string().min(1).default("data/settings.json"),
  NOTIFICATION_PERMISSION: z.enum(["granted", "denied", "notDetermined"]).default("notDetermined"),
  TICK_INTERVAL_MS: z.coerce.number().int().positive().default(1000)
});

export interface ServerConfig {
  port: number;
  dataFile: string;
  notificationPermission: "granted" | "denied" | "notDetermined";
  tickIntervalMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return {
    port: parsed.data.PORT,
    dataFile: parsed.data.DATA_FILE,
    notificationPermission: parsed.data.NOTIFICATION_PERMISSION,
    tickIntervalMs: parsed.data.TICK_INTERVAL_MS
  };
}
