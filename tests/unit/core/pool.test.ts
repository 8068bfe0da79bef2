import path from 'path';
import { SessionPool } from '../../../src/core/pool';
import { resolveEngineConfig } from '../../../src/core/config';
import { EngineError } from '../../../src/core/errors';
import { SessionEvent } from '../../../src/core/types';
import { JSONStore } from '../../../src/infra/store';
import { PermissionRules, SettingsStore } from '../../../src/infra/settings-store';
import { ProjectRules } from '../../../src/permissions/project-rules';
import { FakeProcessLauncher } from '../../helpers/fake-process';
import { MemorySettingsStore } from '../../helpers/memory-settings';
import { TestRunner, expect } from '../../helpers/utils';
import { createTempDir, removeDir, waitFor } from '../../helpers/setup';

const runner = new TestRunner('SessionPool');
const dirs: string[] = [];

class FlakySettingsStore extends MemorySettingsStore {
  failures = 1;

  async readRules(): Promise<PermissionRules> {
    if (this.failures > 0) {
      this.failures--;
      throw new Error('settings unavailable');
    }
    return super.readRules();
  }
}

function createPool(opts: { maxSessions?: number; spawnToolName?: string; settings?: SettingsStore } = {}) {
  const dir = createTempDir('pool');
  dirs.push(dir);
  const launcher = new FakeProcessLauncher();
  const store = new JSONStore(path.join(dir, 'sessions'));
  const pool = new SessionPool({
    networkId: 'net',
    workingDirectory: '/proj',
    maxSessions: opts.maxSessions,
    spawnToolName: opts.spawnToolName,
    dependencies: {
      config: resolveEngineConfig({ abortTimeoutMs: 20 }, {}, dir),
      store,
      launcher,
      rules: new ProjectRules(opts.settings ?? new MemorySettingsStore()),
    },
  });
  return { pool, launcher, store };
}

function agentEvents(pool: SessionPool): string[] {
  const seen: string[] = [];
  pool.on('agent-spawned', (event) => {
    seen.push(`spawned:${event.agentId}:${event.parentId ?? '-'}:${event.name ?? '-'}`);
  });
  pool.on('agent-terminated', (event) => {
    seen.push(`terminated:${event.agentId}:${event.reason}`);
  });
  return seen;
}

async function caughtCode(fn: () => Promise<unknown>): Promise<string | undefined> {
  try {
    await fn();
  } catch (error) {
    if (error instanceof EngineError) return error.code;
    throw error;
  }
  return undefined;
}

runner
  .afterAll(async () => {
    for (const dir of dirs) removeDir(dir);
  })

  .test('创建主 agent 与子 agent，终止级联到后代', async () => {
    const { pool, launcher } = createPool();
    const seen = agentEvents(pool);

    await pool.create({ sessionId: 'main', name: 'lead' });
    const child = await pool.spawn('main', { sessionId: 'child', name: 'helper', initialMessage: 'do it' });
    await pool.spawn('child', { sessionId: 'grand' });

    expect.toEqual(child.info().parentId, 'main');
    expect.toHaveLength(launcher.calls, 1);
    expect.toDeepEqual(pool.children('main'), ['child']);
    expect.toDeepEqual(pool.list(), ['main', 'child', 'grand']);
    expect.toEqual(pool.status('child')?.state, 'PROCESSING');
    expect.toEqual(await caughtCode(() => pool.spawn('missing')), 'SESSION_NOT_FOUND');

    await pool.terminate('main');

    expect.toEqual(pool.size(), 0);
    expect.toEqual(launcher.last.hasExited, true);
    expect.toDeepEqual(seen, [
      'spawned:main:-:lead',
      'spawned:child:main:helper',
      'spawned:grand:child:-',
      'terminated:grand:parent parent terminated',
      'terminated:child:parent terminated',
      'terminated:main:terminated',
    ]);
    expect.toEqual(await caughtCode(() => pool.terminate('main')), 'SESSION_NOT_FOUND');
  })

  .test('容量上限与重复 id', async () => {
    const { pool } = createPool({ maxSessions: 2 });
    await pool.create({ sessionId: 'a' });
    await expect.toThrow(() => pool.create({ sessionId: 'a' }), 'Session already exists: a');
    await pool.spawn('a', { sessionId: 'b' });

    expect.toEqual(await caughtCode(() => pool.spawn('a')), 'POOL_FULL');
    await expect.toThrow(() => pool.spawn('a'), 'Pool is full (max 2 sessions)');
    await pool.delete();
  })

  .test('并发创建在等待前占位，不会超过上限或重复 id', async () => {
    const { pool } = createPool({ maxSessions: 2 });
    const results = await Promise.allSettled([
      pool.create({ sessionId: 'a' }),
      pool.create({ sessionId: 'b' }),
      pool.create({ sessionId: 'c' }),
      pool.create({ sessionId: 'a' }),
    ]);

    const outcomes = results.map((result) => {
      if (result.status === 'fulfilled') return 'ok';
      return result.reason instanceof EngineError ? result.reason.code : 'other';
    });
    expect.toDeepEqual(outcomes, ['ok', 'ok', 'POOL_FULL', 'SESSION_EXISTS']);
    expect.toDeepEqual(pool.list().sort(), ['a', 'b']);
    await pool.delete();
  })

  .test('创建失败时释放占位', async () => {
    const { pool } = createPool({ maxSessions: 1, settings: new FlakySettingsStore() });
    await expect.toThrow(() => pool.create({ sessionId: 'main' }), 'settings unavailable');
    expect.toEqual(pool.size(), 0);

    const session = await pool.create({ sessionId: 'main' });
    expect.toEqual(pool.get('main'), session);
    await pool.delete();
  })

  .test('spawn 工具调用自动创建子 agent', async () => {
    const { pool, launcher } = createPool({ spawnToolName: 'SpawnAgent' });
    const spawned: SessionEvent[] = [];
    pool.on('agent-spawned', (event) => {
      spawned.push(event);
    });

    await pool.create({ sessionId: 'main', initialMessage: 'start' });
    launcher.last.emit({
      type: 'assistant',
      message: {
        id: 'm1',
        role: 'assistant',
        content: [
          { type: 'tool_use', id: 'tu1', name: 'SpawnAgent', input: { initialPrompt: 'research', name: 'researcher' } },
          { type: 'tool_use', id: 'tu2', name: 'SpawnAgent', input: { name: 'no prompt' } },
        ],
        stop_reason: 'tool_use',
      },
    });

    await waitFor(
      () => launcher.processes.length === 2 && launcher.processes[1].lines.length === 1,
      2000,
      'sub-agent'
    );
    expect.toHaveLength(spawned, 2);
    const [childId] = pool.children('main');
    const child = pool.get(childId);
    expect.toEqual(child?.info().name, 'researcher');
    expect.toEqual(child?.conversation.messages[0].responses[0].kind, 'user-message');
    expect.toEqual(pool.size(), 2);
    await pool.delete();
  })

  .test('删除网络并清除存储', async () => {
    const { pool, store } = createPool();
    const ended: string[] = [];
    const pump = (async () => {
      for await (const event of pool.subscribe({ kinds: ['agent-terminated'] })) {
        if (event.type === 'agent-terminated') ended.push(event.agentId);
      }
    })();

    await pool.create({ sessionId: 'main', initialMessage: 'hello' });
    await pool.spawn('main', { sessionId: 'worker' });
    expect.toDeepEqual((await store.list()).sort(), ['main', 'worker']);

    await pool.delete({ purge: true });
    await pump;

    expect.toDeepEqual(ended, ['worker', 'main']);
    expect.toEqual(pool.size(), 0);
    expect.toDeepEqual(await store.list(), []);
  })

  .test('从存储恢复会话到池中', async () => {
    const { pool } = createPool();
    await pool.create({ sessionId: 'main', name: 'lead' });
    await pool.terminate('main');

    const resumed = await pool.resume('main');
    expect.toEqual(resumed.info().name, 'lead');
    expect.toEqual(pool.get('main'), resumed);
    expect.toEqual(await pool.resume('main'), resumed);
    await pool.delete();
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
