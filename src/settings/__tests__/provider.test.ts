import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  SettingsError,
  loadSettings,
  parseSettings,
  readEnvSettings,
  readFileSettings,
} from "../provider.js";

describe("readEnvSettings", () => {
  it("maps variables onto settings keys", () => {
    expect(
      readEnvSettings({
        DEBUG: "True",
        SECRET_KEY: "test-secret",
        TENANT_DOMAIN: "acme.zentoerp.com",
        ALLOWED_HOSTS: " zentoerp.com , *.zentoerp.com ,, ",
        TENANT_MODEL: "tenants.Tenant",
      }),
    ).toEqual({
      DEBUG: true,
      SECRET_KEY: "test-secret",
      TENANT_DOMAIN: "acme.zentoerp.com",
      ALLOWED_HOSTS: ["zentoerp.com", "*.zentoerp.com"],
      TENANT_MODEL: "tenants.Tenant",
    });
  });

  it("leaves unset variables out", () => {
    expect(readEnvSettings({ SECRET_KEY: "test-secret" })).toEqual({ SECRET_KEY: "test-secret" });
  });

  it("keeps set-but-empty optional variables", () => {
    expect(readEnvSettings({ SECRET_KEY: "test-secret", TENANT_DOMAIN: "" })).toEqual({
      SECRET_KEY: "test-secret",
      TENANT_DOMAIN: "",
    });
  });

  it.each<[string, boolean]>([
    ["1", true],
    ["yes", true],
    ["ON", true],
    ["false", false],
    ["0", false],
    ["", false],
  ])("reads DEBUG=%j as %s", (value, expected) => {
    expect(readEnvSettings({ DEBUG: value }).DEBUG).toBe(expected);
  });
});

describe("parseSettings", () => {
  it("applies defaults for DEBUG and ALLOWED_HOSTS", () => {
    expect(parseSettings({ SECRET_KEY: "test-secret" }, "test")).toEqual({
      DEBUG: false,
      SECRET_KEY: "test-secret",
      ALLOWED_HOSTS: [],
    });
  });

  it("drops keys the checks do not read", () => {
    const settings = parseSettings({ SECRET_KEY: "test-secret", DATABASES: {} }, "test");
    expect(Object.keys(settings).sort()).toEqual(["ALLOWED_HOSTS", "DEBUG", "SECRET_KEY"]);
  });

  it("rejects a missing SECRET_KEY", () => {
    expect(() => parseSettings({}, "environment")).toThrowError(
      "Invalid settings from environment: SECRET_KEY: SECRET_KEY is required",
    );
  });

  it("lists every invalid field", () => {
    try {
      parseSettings({ SECRET_KEY: "test-secret", DEBUG: "yes", ALLOWED_HOSTS: "zentoerp.com" }, "test");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SettingsError);
      if (err instanceof SettingsError) {
        expect(err.issues).toEqual([
          "DEBUG: Expected boolean, received string",
          "ALLOWED_HOSTS: Expected array, received string",
        ]);
      }
    }
  });

  it("rejects a non-object document", () => {
    expect(() => parseSettings(["SECRET_KEY"], "test")).toThrowError(SettingsError);
  });
});

describe("file settings", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "readiness-settings-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("loads a JSON settings file", () => {
    const path = join(dir, "settings.json");
    writeFileSync(
      path,
      JSON.stringify({
        DEBUG: true,
        SECRET_KEY: "test-secret",
        ALLOWED_HOSTS: ["*.zentoerp.com"],
        TENANT_MODEL: "tenants.Tenant",
      }),
    );

    expect(loadSettings({ kind: "file", path })).toEqual({
      DEBUG: true,
      SECRET_KEY: "test-secret",
      ALLOWED_HOSTS: ["*.zentoerp.com"],
      TENANT_MODEL: "tenants.Tenant",
    });
  });

  it("throws SettingsError for a missing file", () => {
    const path = join(dir, "missing.json");
    expect(() => readFileSettings(path)).toThrowError(`Cannot read settings file: ${path}`);
  });

  it("throws SettingsError for invalid JSON", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ not json");
    expect(() => readFileSettings(path)).toThrowError(SettingsError);
  });
});

describe("loadSettings", () => {
  it("reads the given environment", () => {
    expect(loadSettings({ kind: "env", env: { SECRET_KEY: "test-secret", DEBUG: "true" } })).toEqual({
      DEBUG: true,
      SECRET_KEY: "test-secret",
      ALLOWED_HOSTS: [],
    });
  });
});
