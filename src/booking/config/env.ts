import { z } from "zod";

const envSchema = z.object({
  BOOKING_DB_PATH: z
    .string()
    .min(1, "BOOKING_DB_PATH must not be empty")
    .default("./calendario_prenotazioni.db"),

  BOOKING_LOG_LEVEL: z
    .enum(["debug", "info", "warn", "error"])
    .default("info"),

  // What happens to an appointment's history when the appointment is hard-deleted
  BOOKING_HISTORY_ON_DELETE: z
    .enum(["cascade", "restrict"])
    .default("cascade"),

  BOOKING_CHECK_CONFLICTS: z
    .enum(["true", "false"])
    .default("true")
    .transform((v) => v === "true"),

  BOOKING_DEFAULT_LOCATION: z
    .string()
    .default("Studio Principale"),
});

export type BookingEnv = z.infer<typeof envSchema>;

let _env: BookingEnv | null = null;

export function loadEnv(source: NodeJS.ProcessEnv): BookingEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const invalid = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(
      `Booking environment validation failed:\n${invalid}\n\nCopy .env.example to .env.local and fix the values.`
    );
  }
  return result.data;
}

export function getEnv(): BookingEnv {
  if (!_env) {
    _env = loadEnv(process.env);
  }
  return _env;
}
