import { existsSync } from "node:fs";
import pino from "pino";
import type { AppConfig } from "./config.js";

/**
 * Validation result with errors (fatal) and warnings (non-fatal).
 */
export interface ValidationResult {
  errors: string[];
  warnings: string[];
}

/**
 * Validates the command's own configuration before any settings are read.
 *
 * Checks:
 * - log level is a pino level or "silent" (warning; the logger falls back to info)
 * - settings file exists if set
 * - settings file has a .json extension (warning)
 */
export function validateConfig(cfg: AppConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isLogLevel(cfg.log.level)) {
    warnings.push(`LOG_LEVEL must be one of ${validLevels().join(", ")}, got "${cfg.log.level}"`);
  }

  if (cfg.settings.file) {
    if (!existsSync(cfg.settings.file)) {
      errors.push(`Settings file does not exist: ${cfg.settings.file}`);
    } else if (!cfg.settings.file.toLowerCase().endsWith(".json")) {
      warnings.push(`Settings file is parsed as JSON but has no .json extension: ${cfg.settings.file}`);
    }
  }

  return { errors, warnings };
}

function validLevels(): string[] {
  return [...Object.keys(pino.levels.values), "silent"];
}

export function isLogLevel(level: string): boolean {
  return validLevels().includes(level);
}
