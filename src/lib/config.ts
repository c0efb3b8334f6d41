import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { homedir } from "os";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "./errors.js";
import type { Credentials, TimesheetConfig } from "./types.js";

export const AUTH_TOKEN_ENV = "INSIDER_AUTH_TOKEN";
export const USER_ID_ENV = "INSIDER_USER_ID";
export const EMP_CODE_ENV = "INSIDER_EMP_CODE";

const DEFAULT_CONFIG_FILE = join(homedir(), ".timesheet-mcp.json");

export const DEFAULT_CONFIG: TimesheetConfig = {
  apiBaseUrl: "https://insiderapi.saigontechnology.vn/api",
  authToken: "",
  userId: "",
  employeeCode: "",
  requestTimeoutMs: 30000,
  excessPolicy: "flag",
  logLevel: "info",
};

const fileSchema = z
  .object({
    apiBaseUrl: z.string().url(),
    authToken: z.string(),
    userId: z.union([z.string(), z.number()]).transform(String),
    employeeCode: z.string(),
    requestTimeoutMs: z.number().int().positive(),
    excessPolicy: z.enum(["flag", "ignore"]),
    logLevel: z.enum(["debug", "info", "warn", "error"]),
  })
  .partial();

const envSchema = z.object({
  INSIDER_API_URL: z.string().url().optional(),
  INSIDER_AUTH_TOKEN: z.string().optional(),
  INSIDER_USER_ID: z.string().optional(),
  INSIDER_EMP_CODE: z.string().optional(),
  TIMESHEET_REQUEST_TIMEOUT: z.coerce.number().int().positive().optional(),
  TIMESHEET_EXCESS_POLICY: z.enum(["flag", "ignore"]).optional(),
  LOG_LEVEL: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(["debug", "info", "warn", "error"]))
    .optional(),
});

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  configPath?: string;
  warn?: (message: string) => void;
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.TIMESHEET_CONFIG || DEFAULT_CONFIG_FILE;
}

function readConfigFile(path: string, warn: (message: string) => void): Partial<TimesheetConfig> {
  if (!existsSync(path)) return {};

  try {
    const parsed = fileSchema.safeParse(JSON.parse(readFileSync(path, "utf-8")));
    if (parsed.success) return parsed.data;
    warn(`Ignoring invalid config file ${path}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  } catch (error) {
    warn(`Failed to load config file ${path}, using defaults: ${errorMessage(error)}`);
  }
  return {};
}

function readEnv(env: NodeJS.ProcessEnv, warn: (message: string) => void): Partial<TimesheetConfig> {
  // Blank variables count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const invalid = new Set<string>();
    for (const issue of parsed.error.issues) {
      const key = String(issue.path[0]);
      invalid.add(key);
      warn(`Ignoring ${key}: ${issue.message}`);
    }
    return readEnv(
      Object.fromEntries(Object.entries(present).filter(([key]) => !invalid.has(key))),
      warn
    );
  }

  const vars = parsed.data;
  const overrides: Partial<TimesheetConfig> = {};
  if (vars.INSIDER_API_URL) overrides.apiBaseUrl = vars.INSIDER_API_URL;
  if (vars.INSIDER_AUTH_TOKEN) overrides.authToken = vars.INSIDER_AUTH_TOKEN;
  if (vars.INSIDER_USER_ID) overrides.userId = vars.INSIDER_USER_ID;
  if (vars.INSIDER_EMP_CODE) overrides.employeeCode = vars.INSIDER_EMP_CODE;
  if (vars.TIMESHEET_REQUEST_TIMEOUT) overrides.requestTimeoutMs = vars.TIMESHEET_REQUEST_TIMEOUT;
  if (vars.TIMESHEET_EXCESS_POLICY) overrides.excessPolicy = vars.TIMESHEET_EXCESS_POLICY;
  if (vars.LOG_LEVEL) overrides.logLevel = vars.LOG_LEVEL;
  return overrides;
}

/**
 * Builds the process configuration once: defaults, then the JSON config
 * file, then environment variables. The result is frozen.
 */
export function loadConfig(options: LoadConfigOptions = {}): Readonly<TimesheetConfig> {
  const env = options.env ?? process.env;
  const warn = options.warn ?? ((message: string) => console.error(message));
  const path = options.configPath ?? getConfigPath(env);

  return Object.freeze({
    ...DEFAULT_CONFIG,
    ...readConfigFile(path, warn),
    ...readEnv(env, warn),
  });
}

export function requireCredentials(config: TimesheetConfig): Credentials {
  const missing: string[] = [];
  if (!config.authToken) missing.push(AUTH_TOKEN_ENV);
  if (!config.userId) missing.push(USER_ID_ENV);
  if (!config.employeeCode) missing.push(EMP_CODE_ENV);
  if (missing.length > 0) {
    throw new ConfigurationError(missing);
  }

  const userId = Number(config.userId);
  if (!Number.isInteger(userId)) {
    throw new ConfigurationError(
      [USER_ID_ENV],
      `${USER_ID_ENV} must be a numeric user id, got "${config.userId}"`
    );
  }

  return {
    authToken: config.authToken,
    userId,
    employeeCode: config.employeeCode,
  };
}

export function maskSecret(value: string): string {
  if (!value) return "";
  return value.length <= 4 ? "****" : `${value.slice(0, 4)}${"*".repeat(8)}`;
}
