import { config, type AppConfig } from "./config.js";
import { validateConfig } from "./config-validator.js";
import { logger } from "./logging.js";
import { runReadinessCheck, type OutputSink, type ReadinessReport } from "./readiness/checker.js";
import { loadSettings, type SettingsSource } from "./settings/provider.js";

export function settingsSourceFor(cfg: AppConfig, env: NodeJS.ProcessEnv): SettingsSource {
  return cfg.settings.file ? { kind: "file", path: cfg.settings.file } : { kind: "env", env };
}

/**
 * The check-production-ready command. Takes no arguments.
 *
 * Throws when the configuration is invalid or the settings cannot be loaded;
 * failed readiness checks never affect the outcome.
 */
export function runCli(
  cfg: AppConfig = config,
  out: OutputSink = process.stdout,
  env: NodeJS.ProcessEnv = process.env,
): ReadinessReport {
  const validation = validateConfig(cfg);
  for (const warning of validation.warnings) {
    logger.warn(warning);
  }
  if (validation.errors.length > 0) {
    for (const error of validation.errors) {
      logger.error(error);
    }
    throw new Error("Configuration validation failed. Please fix the errors above.");
  }

  const settings = loadSettings(settingsSourceFor(cfg, env));
  return runReadinessCheck(settings, out, { colorize: cfg.output.color });
}

/** Resolves to the process exit code; failed checks still exit 0. */
export async function main(
  cfg: AppConfig = config,
  out: OutputSink = process.stdout,
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  runCli(cfg, out, env);
  return 0;
}

export function handleFatal(err: unknown): number {
  logger.fatal({ err }, "Fatal error");
  return 1;
}
