import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { AppConfigSchema, type AppConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

export const DEFAULT_CONFIG_FILENAME = ".prsweep.yaml";

export type LoadAppConfigArgs = {
  explicitPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

export type LoadedAppConfig = {
  config: AppConfig;
  configPath: string | null;
};

export type HttpOverrides = {
  concurrency?: number;
  timeoutSeconds?: number;
  connectTimeoutSeconds?: number;
};

// Environment variables read on top of the config file.
export const HTTP_ENV_VARS = {
  maxConcurrent: "PRSWEEP_MAX_CONCURRENT_HTTP_STREAMS",
  timeoutSeconds: "PRSWEEP_HTTP_TIMEOUT_SECS",
  connectTimeoutSeconds: "PRSWEEP_HTTP_CONNECT_TIMEOUT_SECS",
} as const;

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
  env: NodeJS.ProcessEnv;
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = ctx.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// OVERRIDES
// =============================================================================

function readEnvNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number, received ${JSON.stringify(raw)}.`);
  }
  return value;
}

function asRecord(value: unknown): Record<string, unknown> {
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return { ...value };
  }
  return {};
}

function withHttpValues(doc: unknown, values: Record<string, number | undefined>): unknown {
  const defined = Object.entries(values).filter(([, v]) => v !== undefined);
  if (defined.length === 0) return doc;

  const config = asRecord(doc);
  config.http = { ...asRecord(config.http), ...Object.fromEntries(defined) };
  return config;
}

function applyEnvOverrides(doc: unknown, env: NodeJS.ProcessEnv): unknown {
  return withHttpValues(doc, {
    max_concurrent: readEnvNumber(env, HTTP_ENV_VARS.maxConcurrent),
    timeout_seconds: readEnvNumber(env, HTTP_ENV_VARS.timeoutSeconds),
    connect_timeout_seconds: readEnvNumber(env, HTTP_ENV_VARS.connectTimeoutSeconds),
  });
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const MISSING_CONFIG_HINT = `Check the --config path, or drop the flag to use ./${DEFAULT_CONFIG_FILENAME} when present.`;
const INVALID_CONFIG_HINT = "Fix the config value (file, environment or flag) and rerun.";

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

function parseConfig(doc: unknown, source: string): AppConfig {
  const parsed = AppConfigSchema.safeParse(doc ?? {});
  if (!parsed.success) {
    const details = formatIssues(parsed.error.issues);
    throw new ConfigError(`Invalid configuration from ${source}:\n${details}`, parsed.error);
  }
  return parsed.data;
}

function createInvalidConfigError(source: string, cause: ConfigError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Configuration invalid.",
    message: cause.message,
    hint: INVALID_CONFIG_HINT,
    next: source === "<defaults>" ? undefined : `Review ${source}.`,
    cause,
  });
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function resolveConfigPath(args: LoadAppConfigArgs): string | null {
  const cwd = args.cwd ?? process.cwd();

  if (args.explicitPath) {
    const absolutePath = path.resolve(cwd, args.explicitPath);
    if (!fs.existsSync(absolutePath)) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.config,
        title: "Config file missing.",
        message: `Config file not found at ${absolutePath}.`,
        hint: MISSING_CONFIG_HINT,
      });
    }
    return absolutePath;
  }

  const discovered = path.join(cwd, DEFAULT_CONFIG_FILENAME);
  return fs.existsSync(discovered) ? discovered : null;
}

export function loadAppConfig(args: LoadAppConfigArgs = {}): LoadedAppConfig {
  const env = args.env ?? process.env;
  const configPath = resolveConfigPath(args);
  const source = configPath ?? "<defaults>";

  try {
    let doc: unknown = {};
    if (configPath) {
      let raw: string;
      try {
        raw = fs.readFileSync(configPath, "utf8");
      } catch (err) {
        throw new ConfigError(`Failed to read config at ${configPath}`, err);
      }

      try {
        doc = yaml.load(raw);
      } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        throw new ConfigError(`Failed to parse YAML config at ${configPath}: ${detail}`, err);
      }
      doc = expandEnv(doc, { file: configPath, trail: [], env });
    }

    const config = parseConfig(applyEnvOverrides(doc, env), source);
    return { config, configPath };
  } catch (err) {
    if (err instanceof ConfigError) {
      throw createInvalidConfigError(source, err);
    }
    throw err;
  }
}

export function applyHttpOverrides(config: AppConfig, overrides: HttpOverrides): AppConfig {
  const doc = withHttpValues(config, {
    max_concurrent: overrides.concurrency,
    timeout_seconds: overrides.timeoutSeconds,
    connect_timeout_seconds: overrides.connectTimeoutSeconds,
  });

  try {
    return parseConfig(doc, "command-line flags");
  } catch (err) {
    if (err instanceof ConfigError) {
      throw createInvalidConfigError("command-line flags", err);
    }
    throw err;
  }
}
