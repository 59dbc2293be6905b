export interface EngineConfig {
  quiet: boolean;
  /** Print a line per task start/finish. */
  logTasks: boolean;
  /** Whole-run deadline; 0 disables it. */
  runTimeoutMs: number;
  httpTimeoutMs: number;
  shell?: string;
  maxRetryDelayMs: number;
}

function num(raw: string | undefined, fallback: number, name: string): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < 0) throw new Error(`${name} must be a non-negative number, got '${raw}'`);
  return n;
}

/** Reads engine settings from the environment (populated from .env by the entry points). */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const quiet = env.QUIET === "1";
  return {
    quiet,
    logTasks: !quiet && (env.LOG_TASKS ?? "1") !== "0",
    runTimeoutMs: num(env.RUN_TIMEOUT_MS, 0, "RUN_TIMEOUT_MS"),
    httpTimeoutMs: num(env.HTTP_TIMEOUT_MS, 30_000, "HTTP_TIMEOUT_MS"),
    shell: env.SHELL_PATH || undefined,
    maxRetryDelayMs: num(env.MAX_RETRY_DELAY_MS, 60_000, "MAX_RETRY_DELAY_MS")
  };
}
