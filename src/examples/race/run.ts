import 'dotenv/config';
import path from 'node:path';
import { loadConfig } from '../../config.js';
import { readWorkflowFile } from '../../orchestrator/compiler.js';
import { ConsoleObserver } from '../../orchestrator/log.js';
import { runWorkflow } from '../../orchestrator/run.js';

async function main() {
  const config = loadConfig();
  const workflow = await readWorkflowFile(path.resolve(process.cwd(), 'src/examples/race/workflow.yaml'));
  const result = await runWorkflow({
    workflow,
    executor: { observer: config.quiet ? undefined : new ConsoleObserver({ logTasks: config.logTasks }) }
  });
  if (!result.ok) throw result.error;
  console.log(JSON.stringify({ output: result.output, winner: result.variables.winner }, null, 2));
}

main().catch(e => { console.error(e); process.exit(1); });
