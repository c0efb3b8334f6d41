import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { DEFAULT_CONFIG, getConfigPath, loadConfig, maskSecret, requireCredentials } from "./config.js";
import { ConfigurationError } from "./errors.js";

let testDir: string;
let configPath: string;
let warnings: string[];

beforeEach(() => {
  testDir = mkdtempSync(join(tmpdir(), "timesheet-config-"));
  configPath = join(testDir, "config.json");
  warnings = [];
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

function load(env: NodeJS.ProcessEnv = {}) {
  return loadConfig({ env, configPath, warn: (message) => warnings.push(message) });
}

describe("loadConfig", () => {
  test("uses defaults when there is no file and no environment", () => {
    expect(load()).toEqual(DEFAULT_CONFIG);
    expect(warnings).toEqual([]);
  });

  test("returns a frozen object", () => {
    expect(Object.isFrozen(load())).toBe(true);
  });

  test("reads credentials from the environment", () => {
    const config = load({
      INSIDER_AUTH_TOKEN: "test-token",
      INSIDER_USER_ID: "186",
      INSIDER_EMP_CODE: "test.user",
    });
    expect(config.authToken).toBe("test-token");
    expect(config.userId).toBe("186");
    expect(config.employeeCode).toBe("test.user");
  });

  test("lets the environment override the config file", () => {
    writeFileSync(configPath, JSON.stringify({ userId: 42, excessPolicy: "ignore", logLevel: "warn" }));
    const config = load({ LOG_LEVEL: "DEBUG", TIMESHEET_REQUEST_TIMEOUT: "5000" });

    expect(config.userId).toBe("42");
    expect(config.excessPolicy).toBe("ignore");
    expect(config.logLevel).toBe("debug");
    expect(config.requestTimeoutMs).toBe(5000);
  });

  test("treats blank variables as unset", () => {
    writeFileSync(configPath, JSON.stringify({ authToken: "file-token" }));
    expect(load({ INSIDER_AUTH_TOKEN: "  " }).authToken).toBe("file-token");
  });

  test("ignores an invalid variable and keeps the rest", () => {
    const config = load({ TIMESHEET_EXCESS_POLICY: "sometimes", INSIDER_EMP_CODE: "test.user" });
    expect(config.excessPolicy).toBe("flag");
    expect(config.employeeCode).toBe("test.user");
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toContain("TIMESHEET_EXCESS_POLICY");
  });

  test("ignores a config file that is not JSON", () => {
    writeFileSync(configPath, "{ not json");
    expect(load()).toEqual(DEFAULT_CONFIG);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toContain(`Failed to load config file ${configPath}`);
  });

  test("ignores a config file with invalid values", () => {
    writeFileSync(configPath, JSON.stringify({ requestTimeoutMs: -1 }));
    expect(load().requestTimeoutMs).toBe(30000);
    expect(warnings[0]).toContain(`Ignoring invalid config file ${configPath}`);
  });
});

describe("getConfigPath", () => {
  test("honours TIMESHEET_CONFIG", () => {
    expect(getConfigPath({ TIMESHEET_CONFIG: "/tmp/timesheet.json" })).toBe("/tmp/timesheet.json");
  });
});

describe("requireCredentials", () => {
  test("lists every missing variable", () => {
    try {
      requireCredentials(DEFAULT_CONFIG);
      throw new Error("Expected a configuration error");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        missing: ["INSIDER_AUTH_TOKEN", "INSIDER_USER_ID", "INSIDER_EMP_CODE"],
        message: "Missing required environment variables: INSIDER_AUTH_TOKEN, INSIDER_USER_ID, INSIDER_EMP_CODE",
      });
    }
  });

  test("rejects a non-numeric user id", () => {
    const config = { ...DEFAULT_CONFIG, authToken: "test-token", userId: "abc", employeeCode: "test.user" };
    try {
      requireCredentials(config);
      throw new Error("Expected a configuration error");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        missing: ["INSIDER_USER_ID"],
        message: 'INSIDER_USER_ID must be a numeric user id, got "abc"',
      });
    }
  });

  test("returns the numeric user id", () => {
    const config = { ...DEFAULT_CONFIG, authToken: "test-token", userId: "186", employeeCode: "test.user" };
    expect(requireCredentials(config)).toEqual({ authToken: "test-token", userId: 186, employeeCode: "test.user" });
  });
});

describe("maskSecret", () => {
  test("keeps only a short prefix", () => {
    expect(maskSecret("test-token")).toBe("test********");
    expect(maskSecret("abc")).toBe("****");
    expect(maskSecret("")).toBe("");
  });
});
