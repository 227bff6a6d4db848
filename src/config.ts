/**
 * bucketd - Configuration
 *
 * Layers, lowest to highest precedence: defaults, config file (YAML or
 * JSON), environment, command-line overrides. The merged result is
 * validated once; any issue is fatal.
 */

import { readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError } from "./errors.ts";

export const CSRF_KEY_BYTES = 32;
export const DEFAULT_MAX_BODY_BYTES = 1 << 24;

// ============================================================================
// Schema
// ============================================================================

const CsrfKeySchema = z.string().superRefine((key, ctx) => {
  const length = Buffer.byteLength(key);
  if (length !== CSRF_KEY_BYTES) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `bad CSRF key: want ${CSRF_KEY_BYTES} bytes, got ${length}`,
    });
  }
});

export const AppConfigSchema = z.object({
  server: z
    .object({
      port: z.coerce.number().int().min(0).max(65535).default(8080),
      host: z.string().min(1).default("0.0.0.0"),
      maxBodyBytes: z.coerce.number().int().positive().default(DEFAULT_MAX_BODY_BYTES),
    })
    .default({}),
  storage: z
    .object({
      engine: z.enum(["sqlite", "memory"]).default("sqlite"),
      path: z.string().min(1).default("bucketd.db"),
    })
    .default({}),
  csrf: z
    .object({
      // an empty key disables CSRF protection
      key: z.preprocess((value) => (value === "" ? undefined : value), CsrfKeySchema.optional()),
      secure: z.boolean().default(false),
      cookieName: z.string().min(1).default("bucketd_csrf"),
    })
    .default({}),
  tls: z
    .object({
      certFile: z.string().min(1),
      keyFile: z.string().min(1),
    })
    .optional(),
  log: z
    .object({
      requests: z.boolean().default(true),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type ServerConfig = AppConfig["server"];
export type StorageConfig = AppConfig["storage"];
export type CsrfConfig = AppConfig["csrf"];

/** Command-line flags that override every other source */
export type ConfigOverrides = {
  port?: number;
  db?: string;
  memory?: boolean;
};

export type LoadConfigOptions = {
  file?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
};

type Layer = Record<string, unknown>;

// ============================================================================
// Layers
// ============================================================================

const isRecord = (value: unknown): value is Layer =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const mergeLayers = (base: Layer, layer: Layer): Layer => {
  const merged: Layer = { ...base };
  for (const [key, value] of Object.entries(layer)) {
    const current = merged[key];
    merged[key] = isRecord(current) && isRecord(value) ? mergeLayers(current, value) : value;
  }
  return merged;
};

const parseFlag = (value: string): boolean | string => {
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return value;
};

export const readConfigFile = (path: string): Layer => {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (err) {
    throw new ConfigError(`couldn't read config file ${path}`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }

  let data: unknown;
  try {
    // JSON is a subset of YAML
    data = parseYaml(text);
  } catch (err) {
    throw new ConfigError(`couldn't parse config file ${path}`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }
  if (data === null || data === undefined) return {};
  if (!isRecord(data)) {
    throw new ConfigError(`config file ${path} must hold a mapping`);
  }
  return data;
};

export const envLayer = (env: NodeJS.ProcessEnv): Layer => {
  const server: Layer = {};
  const storage: Layer = {};
  const csrf: Layer = {};
  const log: Layer = {};

  if (env.BUCKETD_PORT !== undefined) server.port = env.BUCKETD_PORT;
  if (env.BUCKETD_HOST !== undefined) server.host = env.BUCKETD_HOST;
  if (env.BUCKETD_DB !== undefined) storage.path = env.BUCKETD_DB;
  if (env.BUCKETD_ENGINE !== undefined) storage.engine = env.BUCKETD_ENGINE;
  if (env.BUCKETD_CSRF_KEY !== undefined) csrf.key = env.BUCKETD_CSRF_KEY;
  if (env.BUCKETD_LOG_REQUESTS !== undefined) log.requests = parseFlag(env.BUCKETD_LOG_REQUESTS);

  return { server, storage, csrf, log };
};

const overridesLayer = (overrides: ConfigOverrides): Layer => {
  const server: Layer = {};
  const storage: Layer = {};
  if (overrides.port !== undefined) server.port = overrides.port;
  if (overrides.db !== undefined) storage.path = overrides.db;
  if (overrides.memory) storage.engine = "memory";
  return { server, storage };
};

// ============================================================================
// Loading
// ============================================================================

/**
 * Validate a merged configuration object
 */
export const parseConfig = (raw: unknown): AppConfig => {
  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      "invalid configuration",
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return result.data;
};

export const loadConfig = (options: LoadConfigOptions = {}): AppConfig => {
  const { file, env = process.env, overrides = {} } = options;
  let raw: Layer = file ? readConfigFile(file) : {};
  raw = mergeLayers(raw, envLayer(env));
  raw = mergeLayers(raw, overridesLayer(overrides));
  return parseConfig(raw);
};
