/**
 * Settings provider: turns a JSON settings file or the process environment
 * into a validated {@link Settings} snapshot.
 *
 * Malformed input throws SettingsError. Callers are expected to let it
 * propagate so the command exits non-zero.
 */
import { readFileSync } from "node:fs";
import { logSettings } from "../logging.js";
import { SettingsSchema, type Settings } from "./schema.js";

export type SettingsSource =
  | { kind: "file"; path: string }
  | { kind: "env"; env: NodeJS.ProcessEnv };

export class SettingsError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SettingsError";
    this.issues = issues;
  }
}

const TRUTHY = new Set(["true", "1", "yes", "on"]);

function parseBool(value: string): boolean {
  return TRUTHY.has(value.trim().toLowerCase());
}

function parseList(value: string): string[] {
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/** Validate an untrusted settings object. `origin` names the source in error messages. */
export function parseSettings(raw: unknown, origin: string): Settings {
  const result = SettingsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${field}: ${issue.message}`;
    });
    throw new SettingsError(`Invalid settings from ${origin}: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

/**
 * Map environment variables onto the settings keys. Unset variables are left
 * out so that optional keys stay absent; set-but-empty ones count as present.
 */
export function readEnvSettings(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const raw: Record<string, unknown> = {};
  if (env.DEBUG !== undefined) raw.DEBUG = parseBool(env.DEBUG);
  if (env.SECRET_KEY !== undefined) raw.SECRET_KEY = env.SECRET_KEY;
  if (env.TENANT_DOMAIN !== undefined) raw.TENANT_DOMAIN = env.TENANT_DOMAIN;
  if (env.ALLOWED_HOSTS !== undefined) raw.ALLOWED_HOSTS = parseList(env.ALLOWED_HOSTS);
  if (env.TENANT_MODEL !== undefined) raw.TENANT_MODEL = env.TENANT_MODEL;
  return raw;
}

export function readFileSettings(path: string): unknown {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw new SettingsError(`Cannot read settings file: ${path}`, [], { cause: err });
  }
  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new SettingsError(`Settings file is not valid JSON: ${path} (${detail})`, [], { cause: err });
  }
}

export function loadSettings(source: SettingsSource): Settings {
  if (source.kind === "file") {
    logSettings.debug({ path: source.path }, "Loading settings from file");
    return parseSettings(readFileSettings(source.path), source.path);
  }
  logSettings.debug("Loading settings from environment");
  return parseSettings(readEnvSettings(source.env), "environment");
}
