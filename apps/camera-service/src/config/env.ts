import path from "path";
import { config as loadEnv } from "dotenv";
import { z } from "zod";
import {
  SERVICE_DEFAULTS,
  SIMULATED_DEFAULTS,
  SIMULATED_DRIVER,
  SIMULATED_FAILURE_MODES,
} from "@isocam/config";

// Load environment variables
loadEnv({
  path: path.resolve(process.cwd(), ".env"),
});

const flag = z
  .enum(["true", "false", "1", "0"])
  .optional()
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  ISOCAM_HOST: z.string().min(1).default(SERVICE_DEFAULTS.HOST),
  ISOCAM_PORT: z.coerce.number().int().min(1).max(65535).optional(),
  ISOCAM_RECV_TIMEOUT_S: z.coerce.number().positive().default(SERVICE_DEFAULTS.RECV_TIMEOUT_S),
  ISOCAM_CONNECT_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(SERVICE_DEFAULTS.CONNECT_TIMEOUT_MS),
  ISOCAM_CONNECT_RETRY_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(SERVICE_DEFAULTS.CONNECT_RETRY_DELAY_MS),
  ISOCAM_KILL_DELAY_MS: z.coerce.number().int().min(0).default(SERVICE_DEFAULTS.KILL_DELAY_MS),
  ISOCAM_FRAME_POLL_INTERVAL_MS: z.coerce
    .number()
    .min(0)
    .default(SERVICE_DEFAULTS.FRAME_POLL_INTERVAL_MS),
  ISOCAM_DRIVER_PATH: z.string().default(SIMULATED_DRIVER),
  ISOCAM_SIM_SERIALS: z.string().default(SIMULATED_DEFAULTS.SERIALS.join(",")),
  ISOCAM_SIM_FRAME_INTERVAL_MS: z.coerce
    .number()
    .min(0)
    .default(SIMULATED_DEFAULTS.FRAME_INTERVAL_MS),
  ISOCAM_SIM_COLOR: flag,
  ISOCAM_SIM_FAILURE_MODE: z.enum(SIMULATED_FAILURE_MODES).default("none"),
});

// Unset and empty variables both fall back to their defaults
const present = Object.fromEntries(
  Object.entries(process.env).filter(([, value]) => value !== undefined && value !== ""),
);

const parsed = envSchema.parse(present);

export const env = {
  nodeEnv: parsed.NODE_ENV,
  host: parsed.ISOCAM_HOST,
  port: parsed.ISOCAM_PORT,
  recvTimeoutS: parsed.ISOCAM_RECV_TIMEOUT_S,
  connectTimeoutMs: parsed.ISOCAM_CONNECT_TIMEOUT_MS,
  connectRetryDelayMs: parsed.ISOCAM_CONNECT_RETRY_MS,
  killDelayMs: parsed.ISOCAM_KILL_DELAY_MS,
  framePollIntervalMs: parsed.ISOCAM_FRAME_POLL_INTERVAL_MS,
  driverPath: parsed.ISOCAM_DRIVER_PATH,
  simulated: {
    serials: parsed.ISOCAM_SIM_SERIALS.split(",")
      .map((serial) => serial.trim())
      .filter((serial) => serial.length > 0),
    frameIntervalMs: parsed.ISOCAM_SIM_FRAME_INTERVAL_MS,
    supportsColor: parsed.ISOCAM_SIM_COLOR,
    failureMode: parsed.ISOCAM_SIM_FAILURE_MODE,
  },
} as const;
