import { execFile as cpExecFile } from "node:child_process";
import { promisify } from "node:util";
const execFile = promisify(cpExecFile);

export interface ProcessRequest {
  command: string;
  args?: readonly string[];
  env?: Readonly<Record<string, string>>;
  cwd?: string;
  signal?: AbortSignal;
}

export interface ProcessResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface ProcessRunner {
  run(req: ProcessRequest): Promise<ProcessResult>;
}

function hasExitInfo(e: unknown): e is { code?: unknown; stdout?: unknown; stderr?: unknown } {
  return typeof e === "object" && e !== null && ("stdout" in e || "code" in e);
}

/**
 * Runs commands through a shell. A non-zero exit is reported in the result,
 * not thrown; spawn failures and aborts are thrown.
 */
export function createShellRunner(shell: string = process.platform === "win32" ? "cmd.exe" : "/bin/bash"): ProcessRunner {
  const flag = shell.endsWith("cmd.exe") ? "/c" : "-c";
  return {
    async run(req) {
      const line = [req.command, ...(req.args ?? []).map(quote)].join(" ");
      try {
        const { stdout, stderr } = await execFile(shell, [flag, line], {
          cwd: req.cwd ?? process.cwd(),
          env: { ...process.env, ...req.env },
          signal: req.signal,
          encoding: "utf8"
        });
        return { code: 0, stdout, stderr };
      } catch (e) {
        if (req.signal?.aborted) throw e;
        if (hasExitInfo(e) && typeof e.code === "number") {
          return { code: e.code, stdout: String(e.stdout ?? ""), stderr: String(e.stderr ?? "") };
        }
        throw e;
      }
    }
  };
}

function quote(arg: string): string {
  return /^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`;
}
