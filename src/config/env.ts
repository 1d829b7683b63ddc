import { z } from "zod";

const envSchema = z.object({
  TASK_LOG_FILE: z.string().min(1).optional(),
  TASK_PROGRESS_PERCENT: z.coerce.number().int().min(0).max(100).optional(),
  TASK_STEP_DELAY_MS: z.coerce.number().int().min(0).max(60000).optional(),
  TASK_VERBOSE: z
    .enum(["0", "1", "true", "false"])
    .optional()
    .transform((value) => value === "1" || value === "true")
});

export type AppEnv = z.infer<typeof envSchema>;

let cachedEnv: AppEnv | null = null;

export function getEnv(): AppEnv {
  if (cachedEnv) {
    return cachedEnv;
  }

  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${parsed.error.message}`);
  }

  cachedEnv = parsed.data;
  return cachedEnv;
}

export function resetEnvForTests(): void {
  cachedEnv = null;
}
