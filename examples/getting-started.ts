import { JSONStore, NodeProcessLauncher, SessionPool, renderText, resolveEngineConfig } from '../src';

async function main() {
  const workingDirectory = process.env.AGENT_WORKDIR || process.cwd();
  const config = resolveEngineConfig({}, process.env, workingDirectory);

  const pool = new SessionPool({
    workingDirectory,
    dependencies: {
      config,
      store: new JSONStore(config.storeDir),
      launcher: new NodeProcessLauncher(),
    },
  });
  const agent = await pool.create({ name: 'main' });

  const printer = (async () => {
    for await (const event of agent.subscribe({ kinds: ['message', 'error', 'done'] })) {
      if (event.type === 'message' && event.message.role === 'assistant' && event.message.isComplete) {
        console.log(renderText(event.message, config.cumulativeResetScope));
      }
      if (event.type === 'error') {
        console.error(`error: ${event.message}`);
      }
      if (event.type === 'done') {
        console.log(`\n--- turn complete (cost $${event.totals.totalCostUsd.toFixed(4)}) ---`);
        break;
      }
    }
  })();

  await agent.sendMessage('Summarize what this repository does in three sentences.');
  await printer;
  await pool.delete();
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
