import { createInterface } from 'readline/promises';
import { JSONStore, NodeProcessLauncher, Session, SettingsFileStore, ProjectRules, resolveEngineConfig } from '../src';

async function main() {
  const workingDirectory = process.env.AGENT_WORKDIR || process.cwd();
  const config = resolveEngineConfig({ askUserBehavior: 'ask' }, process.env, workingDirectory);
  const prompt = createInterface({ input: process.stdin, output: process.stdout });

  const session = await Session.create(
    { workingDirectory, name: 'approval-demo' },
    {
      config,
      store: new JSONStore(config.storeDir),
      launcher: new NodeProcessLauncher(),
      rules: new ProjectRules(new SettingsFileStore(workingDirectory)),
    }
  );

  session.on('permission-request', (event) => {
    const question = `\n${event.toolName} ${JSON.stringify(event.input)}\nallow (y), allow and remember ${event.inferredPattern} (a), deny (n)? `;
    prompt
      .question(question)
      .then(async (answer) => {
        const choice = answer.trim().toLowerCase();
        const remembered = await session.respondToPermission(event.requestId, {
          behavior: choice === 'y' || choice === 'a' ? 'allow' : 'deny',
          remember: choice === 'a',
        });
        if (remembered) console.log(`remembered ${remembered.pattern} (${remembered.scope})`);
      })
      .catch((error) => console.error('failed to answer permission request:', error));
  });

  session.on('tool-use', (event) => console.log(`[tool] ${event.toolName}`));
  session.on('permission-timeout', (event) => console.log(`[timeout] ${event.toolName} was denied`));

  const finished = new Promise<void>((resolve) => {
    const off = session.on('done', () => {
      off();
      resolve();
    });
  });

  await session.sendMessage('Create a file notes/todo.md listing three follow-ups for this project.');
  await finished;
  prompt.close();
  await session.close();
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
