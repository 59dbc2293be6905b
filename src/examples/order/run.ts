import 'dotenv/config';
import path from 'node:path';
import { loadConfig } from '../../config.js';
import { readWorkflowFile } from '../../orchestrator/compiler.js';
import { ConsoleObserver } from '../../orchestrator/log.js';
import { runWorkflow } from '../../orchestrator/run.js';
import { orderFunctions } from './functions.js';

async function main() {
  const config = loadConfig();
  const workflow = await readWorkflowFile(path.resolve(process.cwd(), 'src/examples/order/workflow.yaml'));
  const result = await runWorkflow({
    workflow,
    input: {
      id: 'A-1001',
      items: [
        { sku: 'kettle', price: 2.5, qty: 2 },
        { sku: 'filter', price: 10, qty: 1 }
      ]
    },
    capabilities: { functions: orderFunctions() },
    executor: { observer: config.quiet ? undefined : new ConsoleObserver({ logTasks: config.logTasks }) }
  });
  if (!result.ok) throw result.error;
  console.log(JSON.stringify(result.output, null, 2));
}

main().catch(e => { console.error(e); process.exit(1); });
