import { HookManager, ToolCallContext } from '../../../src/core/hooks';
import { emptyConversation } from '../../../src/core/session/conversation';
import { TestRunner, expect } from '../../helpers/utils';

const runner = new TestRunner('Hook系统');

const ctx: ToolCallContext = { sessionId: 'session-1', workingDirectory: '/proj' };

runner
  .test('preToolUse 返回决策可阻止执行', async () => {
    const manager = new HookManager();
    let invoked = false;

    manager.register({
      preToolUse: async (call) => {
        invoked = true;
        if (call.toolName === 'Write') {
          return { behavior: 'deny', reason: 'blocked' };
        }
        return undefined;
      },
    });

    const decision = await manager.runPreToolUse({ requestId: 'r1', toolName: 'Write', input: {} }, ctx);
    const passthrough = await manager.runPreToolUse({ requestId: 'r2', toolName: 'Read', input: {} }, ctx);

    expect.toEqual(invoked, true);
    expect.toDeepEqual(decision, { behavior: 'deny', reason: 'blocked' });
    expect.toBeUndefined(passthrough);
  })

  .test('链式注册按顺序触发，第一个决策生效', async () => {
    const manager = new HookManager();
    const order: string[] = [];

    manager.register({ preToolUse: () => { order.push('first'); return undefined; } }, 'pool');
    manager.register({
      preToolUse: () => {
        order.push('second');
        return { behavior: 'allow', updatedInput: { command: 'ls -la' } };
      },
    });
    manager.register({ preToolUse: () => { order.push('third'); return { behavior: 'deny' }; } });

    const decision = await manager.runPreToolUse({ requestId: 'r', toolName: 'Bash', input: { command: 'ls' } }, ctx);
    expect.toDeepEqual(order, ['first', 'second']);
    expect.toDeepEqual(decision, { behavior: 'allow', updatedInput: { command: 'ls -la' } });

    const registered = manager.getRegistered();
    expect.toEqual(registered.length, 3);
    expect.toEqual(registered[0].origin, 'pool');
    expect.toContain(registered[1].names.join(','), 'preToolUse');
  })

  .test('postToolUse 与 messagesChanged 按注册顺序运行', async () => {
    const manager = new HookManager();
    const ledger: string[] = [];

    manager.register({
      postToolUse: async (result) => {
        ledger.push(`post:${result.toolUseId}`);
      },
      messagesChanged: async (snapshot) => {
        ledger.push(`messages:${snapshot.messages.length}`);
      },
    });
    manager.register({ postToolUse: () => { ledger.push('post:second'); } });

    await manager.runPostToolUse({ toolUseId: 't1', content: 'ok', isError: false }, ctx);
    await manager.runMessagesChanged(emptyConversation());

    expect.toDeepEqual(ledger, ['post:t1', 'post:second', 'messages:0']);
    expect.toDeepEqual(manager.getRegistered()[0].names, ['postToolUse', 'messagesChanged']);
  });

export async function run() {
  return await runner.run();
}

if (require.main === module) {
  run().catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
}
