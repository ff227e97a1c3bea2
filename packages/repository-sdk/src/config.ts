/**
 * Client configuration from environment variables
 */

import { z } from "zod";
import { RepositoryValidationError } from "./errors.js";
import { createConsoleLogger, LOG_LEVELS } from "./logger.js";
import type { ClientConfig } from "./types/index.js";

export const EnvConfigSchema = z
  .object({
    /** Base URL of the repository API */
    ARCHIVUM_API_URL: z.string().url({ message: "must be an absolute URL" }).optional(),

    /** API token */
    ARCHIVUM_API_TOKEN: z.string().min(1, { message: "must not be empty" }).optional(),

    /** Basic auth credentials; take precedence over the token */
    ARCHIVUM_API_USERNAME: z.string().min(1, { message: "must not be empty" }).optional(),
    ARCHIVUM_API_PASSWORD: z.string().optional(),

    /** Request timeout in milliseconds */
    ARCHIVUM_TIMEOUT_MS: z.coerce
      .number()
      .int()
      .positive({ message: "must be a positive integer" })
      .optional(),

    /** Minimum level written by the default console logger */
    ARCHIVUM_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  })
  .refine(
    (env) => (env.ARCHIVUM_API_USERNAME === undefined) === (env.ARCHIVUM_API_PASSWORD === undefined),
    {
      message: "must be set together with ARCHIVUM_API_PASSWORD",
      path: ["ARCHIVUM_API_USERNAME"],
    },
  );

export type EnvConfig = z.infer<typeof EnvConfigSchema>;

/**
 * Build a ClientConfig from `ARCHIVUM_*` variables.
 *
 * Unset variables fall back to the client defaults.
 *
 * @throws RepositoryValidationError naming the first invalid variable
 */
export function loadClientConfig(
  env: Record<string, string | undefined> = process.env,
): ClientConfig {
  const result = EnvConfigSchema.safeParse({
    ARCHIVUM_API_URL: env.ARCHIVUM_API_URL,
    ARCHIVUM_API_TOKEN: env.ARCHIVUM_API_TOKEN,
    ARCHIVUM_API_USERNAME: env.ARCHIVUM_API_USERNAME,
    ARCHIVUM_API_PASSWORD: env.ARCHIVUM_API_PASSWORD,
    ARCHIVUM_TIMEOUT_MS: env.ARCHIVUM_TIMEOUT_MS,
    ARCHIVUM_LOG_LEVEL: env.ARCHIVUM_LOG_LEVEL,
  });

  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join(".");
    throw new RepositoryValidationError(
      `Invalid configuration: ${field ?? "environment"} ${issue?.message ?? "is invalid"}`,
      field,
      { cause: result.error },
    );
  }

  const { data } = result;
  const config: ClientConfig = {};
  if (data.ARCHIVUM_API_URL !== undefined) config.baseUrl = data.ARCHIVUM_API_URL;
  if (data.ARCHIVUM_API_TOKEN !== undefined) config.token = data.ARCHIVUM_API_TOKEN;
  if (data.ARCHIVUM_API_USERNAME !== undefined) config.username = data.ARCHIVUM_API_USERNAME;
  if (data.ARCHIVUM_API_PASSWORD !== undefined) config.password = data.ARCHIVUM_API_PASSWORD;
  if (data.ARCHIVUM_TIMEOUT_MS !== undefined) config.timeout = data.ARCHIVUM_TIMEOUT_MS;
  if (data.ARCHIVUM_LOG_LEVEL !== undefined) {
    config.logger = createConsoleLogger("repository-sdk", data.ARCHIVUM_LOG_LEVEL);
  }
  return config;
}
