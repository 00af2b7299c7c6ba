import { tmpdir } from "node:os";
import { z } from "zod";
import { MockStoreError } from "./MockStoreError.ts";

/**
 * Log levels understood by the logger, from most to least verbose.
 */
export const logLevels = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevelName = typeof logLevels[number];

const environmentSchema = z.object({
  MOCK_TRANSPORT_SCRATCH_DIR: z.string().min(1).optional(),
  MOCK_TRANSPORT_PREFIX: z
    .string()
    .regex(/^[A-Za-z0-9_-]+$/, "must only contain letters, digits, _ or -")
    .default("mock_transport_response"),
  MOCK_TRANSPORT_STORE_VARIABLE: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "must be a valid variable name")
    .default("MOCK_TRANSPORT_STORE_FILE"),
  MOCK_TRANSPORT_LOG_LEVEL: z.enum(logLevels).default("warn"),
  NO_COLOR: z.string().optional(),
});

/**
 * Settings shared by the store, the session and the transport.
 */
export interface Configuration {
  /** Directory holding the store files */
  scratchDirectory: string;
  /** File name prefix of every store file */
  prefix: string;
  /** Environment variable carrying the store path to the system under test */
  storeVariable: string;
  logging: {
    level: LogLevelName;
    colorize: boolean;
  };
}

/**
 * Reads the configuration from environment variables.
 * @param env - Variables to read, `process.env` by default
 * @throws MockStoreError when a variable holds an invalid value
 */
export function loadConfiguration(
  env: NodeJS.ProcessEnv = process.env,
): Configuration {
  const result = environmentSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new MockStoreError(
      "INVALID_CONFIGURATION",
      `Invalid mock transport configuration: ${issues}`,
    );
  }

  const values = result.data;
  return {
    scratchDirectory: values.MOCK_TRANSPORT_SCRATCH_DIR ?? tmpdir(),
    prefix: values.MOCK_TRANSPORT_PREFIX,
    storeVariable: values.MOCK_TRANSPORT_STORE_VARIABLE,
    logging: {
      level: values.MOCK_TRANSPORT_LOG_LEVEL,
      colorize: !values.NO_COLOR,
    },
  };
}
