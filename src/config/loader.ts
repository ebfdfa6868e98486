import { config as loadDotEnv } from "dotenv";
import { parse as parseJsonc, printParseErrorCode, type ParseError } from "jsonc-parser";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { replaceEnvVars } from "./env";
import { WardenConfigSchema, type WardenConfig } from "./schema";

export interface ConfigLoadResult {
  success: boolean;
  config?: WardenConfig;
  errors?: string[];
  path: string;
  /** False when no file existed and only defaults were applied. */
  fromFile: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expandHomePath(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed.startsWith("~")) {
    return raw;
  }
  if (trimmed === "~") {
    return os.homedir();
  }
  if (trimmed.startsWith("~/")) {
    return path.join(os.homedir(), trimmed.slice(2));
  }
  return raw;
}

function resolvePathValue(raw: string, configDir: string): string {
  return path.resolve(configDir, expandHomePath(raw));
}

export function resolveConfigPath(customPath?: string): string {
  const envPath = process.env.WARDEN_CONFIG;
  if (customPath) {
    return path.resolve(customPath);
  }
  if (envPath) {
    return path.resolve(envPath);
  }
  return path.join(os.homedir(), ".warden", "config.jsonc");
}

/**
 * Fills in derived paths and resolves every configured path against the
 * directory holding the config file.
 */
export function applyConfigDefaults(raw: unknown, configDir: string): unknown {
  if (!isRecord(raw)) {
    return raw;
  }
  const obj = { ...raw };

  const paths = isRecord(obj.paths) ? { ...obj.paths } : {};
  const baseDir =
    typeof paths.baseDir === "string" && paths.baseDir.trim()
      ? resolvePathValue(paths.baseDir, configDir)
      : path.join(os.homedir(), ".warden");
  const pathOr = (value: unknown, fallback: string): string =>
    typeof value === "string" && value.trim() ? resolvePathValue(value, configDir) : fallback;

  obj.paths = {
    ...paths,
    baseDir,
    errorArtifact: pathOr(paths.errorArtifact, path.join(baseDir, "run", "startup-error.json")),
    stderrLog: pathOr(paths.stderrLog, path.join(baseDir, "logs", "service-stderr.log")),
    pidFile: pathOr(paths.pidFile, path.join(baseDir, "run", "warden.pid")),
    logFile: pathOr(paths.logFile, path.join(baseDir, "logs", "supervisor.log")),
  };

  if (isRecord(obj.service)) {
    const service = { ...obj.service };
    if (typeof service.cwd === "string") {
      service.cwd = resolvePathValue(service.cwd, configDir);
    }
    if (typeof service.configFile === "string") {
      service.configFile = resolvePathValue(service.configFile, configDir);
    }
    obj.service = service;
  }

  if (isRecord(obj.supervisor) && Array.isArray(obj.supervisor.lockFiles)) {
    obj.supervisor = {
      ...obj.supervisor,
      lockFiles: obj.supervisor.lockFiles.map((value) =>
        typeof value === "string" ? resolvePathValue(value, configDir) : value,
      ),
    };
  }

  const reconcile = isRecord(obj.reconcile) ? { ...obj.reconcile } : {};
  if (typeof reconcile.declaredJobsFile === "string") {
    reconcile.declaredJobsFile = resolvePathValue(reconcile.declaredJobsFile, configDir);
  }
  if (Array.isArray(reconcile.declaredJobsFallbacks)) {
    reconcile.declaredJobsFallbacks = reconcile.declaredJobsFallbacks.map((value) =>
      typeof value === "string" ? resolvePathValue(value, configDir) : value,
    );
  }
  reconcile.runtimeJobsFile =
    typeof reconcile.runtimeJobsFile === "string"
      ? resolvePathValue(reconcile.runtimeJobsFile, configDir)
      : path.join(baseDir, "cron", "jobs.json");
  if (Array.isArray(reconcile.managedFiles)) {
    reconcile.managedFiles = reconcile.managedFiles.map((entry) => {
      if (!isRecord(entry)) {
        return entry;
      }
      return {
        ...entry,
        source:
          typeof entry.source === "string" ? resolvePathValue(entry.source, configDir) : entry.source,
        target:
          typeof entry.target === "string" ? resolvePathValue(entry.target, configDir) : entry.target,
      };
    });
  }
  obj.reconcile = reconcile;

  return obj;
}

function loadConfigLocalEnv(resolvedPath: string): void {
  const envPath = path.join(path.dirname(resolvedPath), ".env");
  if (!fs.existsSync(envPath)) {
    return;
  }
  const result = loadDotEnv({ path: envPath, override: false, quiet: true });
  if (result.error) {
    throw result.error;
  }
}

function validate(raw: unknown, resolvedPath: string, fromFile: boolean): ConfigLoadResult {
  const result = WardenConfigSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    return { success: false, errors, path: resolvedPath, fromFile };
  }
  return { success: true, config: result.data, path: resolvedPath, fromFile };
}

export function loadConfig(configPath?: string): ConfigLoadResult {
  const resolvedPath = resolveConfigPath(configPath);
  const configDir = path.dirname(resolvedPath);

  if (!fs.existsSync(resolvedPath)) {
    return validate(applyConfigDefaults({}, configDir), resolvedPath, false);
  }

  try {
    loadConfigLocalEnv(resolvedPath);
    const raw = fs.readFileSync(resolvedPath, "utf-8");
    const parseErrors: ParseError[] = [];
    let config: unknown = parseJsonc(raw, parseErrors, { allowTrailingComma: true });
    if (parseErrors.length > 0) {
      return {
        success: false,
        errors: parseErrors.map(
          (error) => `offset ${error.offset}: ${printParseErrorCode(error.error)}`,
        ),
        path: resolvedPath,
        fromFile: true,
      };
    }
    config = replaceEnvVars(config ?? {});
    config = applyConfigDefaults(config, configDir);
    return validate(config, resolvedPath, true);
  } catch (error) {
    return {
      success: false,
      errors: [error instanceof Error ? error.message : String(error)],
      path: resolvedPath,
      fromFile: true,
    };
  }
}
