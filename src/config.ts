import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { logger } from "./logger.js";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

export const EngineConfigSchema = z.object({
  /** Threshold of the engine's console logging. */
  logLevel: LogLevelSchema.default("warn"),
  /** Attribute name prefixes that `Something.like` treats as private. */
  privatePrefixes: z.array(z.string().min(1)).default(["_", "#"]),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

const log = logger.child("config");

/**
 * Reads the defaults from the environment. `TYPESHAPE_LOG_LEVEL` accepts the
 * names of {@link LogLevelSchema}; anything else is reported and ignored.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const level = LogLevelSchema.safeParse(env.TYPESHAPE_LOG_LEVEL);
  if (env.TYPESHAPE_LOG_LEVEL !== undefined && !level.success)
    log.warn(`ignoring TYPESHAPE_LOG_LEVEL=${env.TYPESHAPE_LOG_LEVEL}`);
  return EngineConfigSchema.parse({
    logLevel: level.success ? level.data : undefined,
  });
}

let current: EngineConfig = Object.freeze(loadConfig());
logger.setLevel(current.logLevel);

export const getConfig = (): EngineConfig => current;

/**
 * Validates `overrides` on top of the current configuration and applies it.
 *
 * @throws ConfigurationError listing every invalid field
 */
export function configure(overrides: Partial<EngineConfig>): EngineConfig {
  const parsed = EngineConfigSchema.safeParse({ ...current, ...overrides });
  if (!parsed.success)
    throw new ConfigurationError(
      parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; "),
      { issues: parsed.error.issues },
    );
  current = Object.freeze(parsed.data);
  logger.setLevel(current.logLevel);
  log.debug("configuration updated", { ...current });
  return current;
}

export function resetConfig(): EngineConfig {
  current = Object.freeze(loadConfig());
  logger.setLevel(current.logLevel);
  return current;
}
