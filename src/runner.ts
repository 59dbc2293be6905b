#!/usr/bin/env node
// src/runner.ts
// CLI: run a workflow document (YAML or JSON) and print its output.
// - --input <json> becomes the root input
// - --kv key=value (repeatable) seeds context variables; values are parsed as JSON when they can be
// - --timeout <ms> overrides RUN_TIMEOUT_MS
import 'dotenv/config';
import path from 'node:path';
import { loadConfig, type EngineConfig } from './config.js';
import { createFetchClient } from './capabilities/http.js';
import { createShellRunner } from './capabilities/process.js';
import { readWorkflowFile } from './orchestrator/compiler.js';
import { ConsoleObserver, COLOR, fmtMs } from './orchestrator/log.js';
import { runWorkflow, type RunResult } from './orchestrator/run.js';
import { toValue, type Value } from './types/values.js';

export interface CliArgs {
  workflowPath?: string;
  input?: string;
  kv: Record<string, string>;
  timeoutMs?: number;
  trace: boolean;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const out: CliArgs = { kv: {}, trace: false };
  const pushKv = (kvp: string) => {
    const eq = kvp.indexOf('=');
    if (eq > 0) out.kv[kvp.slice(0, eq)] = kvp.slice(eq + 1);
  };
  for (let i = 2; i < argv.length; i++) {
    const a = argv[i];
    const hasNext = i + 1 < argv.length;
    if (a.startsWith('--workflow=')) out.workflowPath = a.slice('--workflow='.length);
    else if (a === '--workflow' && hasNext) out.workflowPath = argv[++i];
    else if (a.startsWith('--input=')) out.input = a.slice('--input='.length);
    else if (a === '--input' && hasNext) out.input = argv[++i];
    else if (a.startsWith('--kv=')) pushKv(a.slice('--kv='.length));
    else if (a === '--kv' && hasNext) pushKv(argv[++i]);
    else if (a.startsWith('--timeout=')) out.timeoutMs = Number(a.slice('--timeout='.length));
    else if (a === '--timeout' && hasNext) out.timeoutMs = Number(argv[++i]);
    else if (a === '--trace') out.trace = true;
  }
  return out;
}

function parseLoose(raw: string): Value {
  try {
    return toValue(JSON.parse(raw));
  } catch {
    return raw;
  }
}

export async function runWorkflowFile(args: CliArgs, config: EngineConfig = loadConfig()): Promise<RunResult> {
  if (!args.workflowPath) throw new Error('missing --workflow');
  const workflow = await readWorkflowFile(args.workflowPath);
  let input: Value = {};
  if (args.input !== undefined) {
    try {
      input = toValue(JSON.parse(args.input));
    } catch (e) {
      throw new Error(`--input is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
  }
  const variables: Record<string, Value> = {};
  for (const [k, v] of Object.entries(args.kv)) variables[k] = parseLoose(v);

  if (!config.quiet) {
    console.log(`${COLOR.magenta('[Runner]')} ${workflow.document.namespace}/${workflow.document.name}@${workflow.document.version}`);
  }
  return runWorkflow({
    workflow,
    input,
    variables,
    timeoutMs: args.timeoutMs ?? config.runTimeoutMs,
    capabilities: {
      http: createFetchClient(config.httpTimeoutMs),
      processes: createShellRunner(config.shell)
    },
    executor: {
      maxRetryDelayMs: config.maxRetryDelayMs,
      observer: config.quiet ? undefined : new ConsoleObserver({ logTasks: config.logTasks })
    }
  });
}

if (process.argv[1] && path.basename(process.argv[1]).includes('runner')) {
  (async () => {
    const args = parseArgs(process.argv);
    if (!args.workflowPath) {
      console.error('Usage: node dist/runner.js --workflow path/to/workflow.yaml [--input <json>] [--kv key=value]... [--timeout <ms>] [--trace]');
      process.exit(2);
    }
    const config = loadConfig();
    const result = await runWorkflowFile(args, config);
    if (args.trace) {
      console.log('\n[Trace]');
      for (const r of result.trace) {
        console.log(`• ${r.pointer || '/'} ${r.kind} ${r.status}${r.elapsedMs === undefined ? '' : ` (${fmtMs(r.elapsedMs)})`}`);
      }
    }
    if (!result.ok) {
      console.error(`${COLOR.red('[failed]')} ${result.error.breadcrumb()}: [${result.error.kind}] ${result.error.message}`);
      process.exit(1);
    }
    if (!config.quiet) console.log(COLOR.gray(`\n[done] run complete (${fmtMs(result.elapsedMs)})`));
    console.log(JSON.stringify(result.output, null, 2));
  })().catch(e => { console.error('[fatal]', e); process.exit(1); });
}
