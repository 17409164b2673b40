import { z } from "zod";
import { ConfigurationError } from "./errors.ts";

export const LogLevelSchema = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/** scalar part of the model options, the part that comes from plain config */
export const ModelConfigSchema = z.object({
  name: z.string().trim().min(1).optional(),
  verbose: z.boolean().default(false),
  logLevel: LogLevelSchema.optional(),
}).strict();
export type ModelConfig = z.infer<typeof ModelConfigSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

export function parseModelConfig(input: unknown): ModelConfig {
  const parsed = ModelConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      `invalid model options: ${describeIssues(parsed.error)}`,
    );
  }
  return parsed.data;
}

/** reads `LOG_LEVEL`; unset or empty means no preference */
export function logLevelFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): LogLevel | undefined {
  const raw = env.LOG_LEVEL?.trim();
  if (!raw) return undefined;
  const parsed = LogLevelSchema.safeParse(raw.toLowerCase());
  if (!parsed.success) {
    throw new ConfigurationError(
      `invalid LOG_LEVEL '${raw}': expected one of ${
        LogLevelSchema.options.join(", ")
      }`,
    );
  }
  return parsed.data;
}
