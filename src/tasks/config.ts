export const DEFAULT_LEASE_MS = 60_000; // 60s
export const DEFAULT_MAX_LEASE_MS = 24 * 60 * 60_000; // 1 day
export const DEFAULT_SWEEP_INTERVAL_MS = 1_000; // 1s
export const DEFAULT_SWEEP_BATCH = 100;
export const DEFAULT_CAS_MAX_ATTEMPTS = 5;
export const DEFAULT_WATCH_BUFFER = 256;
export const DEFAULT_DB_PATH = ".orchestrator/tasks.db";

export type Env = Record<string, string | undefined>;

export interface OrchestratorConfig {
  dbPath: string;
  defaultLeaseMs: number;
  maxLeaseMs: number;
  sweepIntervalMs: number;
  sweepBatch: number;
  casMaxAttempts: number;
  watchBuffer: number;
  auditLog: boolean;
  debug: boolean;
}

export interface ServerConfig {
  port: number;
  bindHost: string;
}

export function getEnvInt(name: string, fallback: number, env: Env = process.env): number {
  const v = env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? n : fallback;
}

export function getEnvBool(name: string, fallback: boolean, env: Env = process.env): boolean {
  const v = env[name];
  if (v === undefined) return fallback;
  return v === "1" || v.toLowerCase() === "true" || v.toLowerCase() === "yes";
}

function assertPositiveInt(n: number, name: string): void {
  if (!Number.isInteger(n) || n <= 0) throw new Error(`${name} must be a positive integer`);
}

export function loadConfig(env: Env = process.env): OrchestratorConfig {
  const config: OrchestratorConfig = {
    dbPath: (env.TASKS_DB_PATH || DEFAULT_DB_PATH).trim(),
    defaultLeaseMs: getEnvInt("TASK_DEFAULT_LEASE_MS", DEFAULT_LEASE_MS, env),
    maxLeaseMs: getEnvInt("TASK_MAX_LEASE_MS", DEFAULT_MAX_LEASE_MS, env),
    sweepIntervalMs: getEnvInt("TASK_SWEEP_INTERVAL_MS", DEFAULT_SWEEP_INTERVAL_MS, env),
    sweepBatch: getEnvInt("TASK_SWEEP_BATCH", DEFAULT_SWEEP_BATCH, env),
    casMaxAttempts: getEnvInt("TASK_CAS_MAX_ATTEMPTS", DEFAULT_CAS_MAX_ATTEMPTS, env),
    watchBuffer: getEnvInt("TASK_WATCH_BUFFER", DEFAULT_WATCH_BUFFER, env),
    auditLog: getEnvBool("TASK_AUDIT_LOG", false, env),
    debug: getEnvBool("DEBUG", false, env),
  };

  assertPositiveInt(config.defaultLeaseMs, "TASK_DEFAULT_LEASE_MS");
  assertPositiveInt(config.maxLeaseMs, "TASK_MAX_LEASE_MS");
  assertPositiveInt(config.sweepIntervalMs, "TASK_SWEEP_INTERVAL_MS");
  assertPositiveInt(config.sweepBatch, "TASK_SWEEP_BATCH");
  assertPositiveInt(config.casMaxAttempts, "TASK_CAS_MAX_ATTEMPTS");
  assertPositiveInt(config.watchBuffer, "TASK_WATCH_BUFFER");
  if (config.defaultLeaseMs > config.maxLeaseMs) {
    throw new Error("TASK_DEFAULT_LEASE_MS must not exceed TASK_MAX_LEASE_MS");
  }
  return config;
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  return {
    port: getEnvInt("PORT", 3000, env),
    // Keep localhost-only unless explicitly exposed
    bindHost: (env.BIND_HOST || "127.0.0.1").trim(),
  };
}
