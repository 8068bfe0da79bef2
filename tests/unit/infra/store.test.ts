import fs from 'fs';
import path from 'path';
import { JSONStore, PersistedTimeline } from '../../../src/infra/store';
import { TranscriptLoader, agentTranscriptPath, encodeProjectDir } from '../../../src/infra/transcript';
import { EngineError } from '../../../src/core/errors';
import { SessionEvent } from '../../../src/core/types';
import { TestRunner, expect } from '../../helpers/utils';
import { createTempDir, removeDir } from '../../helpers/setup';

const runner = new TestRunner('存储');
const dirs: string[] = [];

function tempDir(prefix: string): string {
  const dir = createTempDir(prefix);
  dirs.push(dir);
  return dir;
}

function errorEvent(seq: number, message: string): SessionEvent {
  return { type: 'error', message, seq, eventId: `e${seq}`, sessionId: 's1', timestamp: 0 };
}

async function collect(iterable: AsyncIterable<PersistedTimeline>): Promise<PersistedTimeline[]> {
  const entries: PersistedTimeline[] = [];
  for await (const entry of iterable) entries.push(entry);
  return entries;
}

runner
  .afterAll(async () => {
    for (const dir of dirs) removeDir(dir);
  })

  .test('转录按写入顺序追加', async () => {
    const store = new JSONStore(tempDir('store'));
    await Promise.all([
      store.appendTranscript('s1', '{"type":"system"}'),
      store.appendTranscript('s1', '{"type":"assistant"}'),
      store.appendTranscript('s1', '{"type":"result"}'),
    ]);

    expect.toDeepEqual(await store.readTranscript('s1'), ['{"type":"system"}', '{"type":"assistant"}', '{"type":"result"}']);
    expect.toDeepEqual(await store.readTranscript('missing'), []);
  })

  .test('事件读取跳过损坏行并支持 since', async () => {
    const baseDir = tempDir('store');
    const store = new JSONStore(baseDir);
    await store.appendEvent('s1', { seq: 0, event: errorEvent(0, 'a') });
    await store.appendEvent('s1', { seq: 1, event: errorEvent(1, 'b') });
    fs.appendFileSync(path.join(baseDir, 's1', 'events.jsonl'), 'not json\n{"seq":"x"}\n');
    await store.appendEvent('s1', { seq: 2, event: errorEvent(2, 'c') });

    const all = await collect(store.readEvents('s1'));
    expect.toDeepEqual(
      all.map((entry) => entry.seq),
      [0, 1, 2]
    );
    expect.toEqual(all[1].event.message, 'b');

    const later = await collect(store.readEvents('s1', 1));
    expect.toDeepEqual(
      later.map((entry) => entry.seq),
      [1, 2]
    );
    expect.toHaveLength(await collect(store.readEvents('missing')), 0);
  })

  .test('会话信息保存、枚举与删除', async () => {
    const store = new JSONStore(tempDir('store'));
    const info = { sessionId: 'net:a', workingDirectory: '/proj', createdAt: '2026-01-01T00:00:00.000Z', name: 'alpha' };
    await store.saveInfo('net:a', info);
    await store.saveInfo('net:b', { ...info, sessionId: 'net:b', parentId: 'net:a' });
    await store.saveInfo('other', { ...info, sessionId: 'other' });

    expect.toDeepEqual(await store.loadInfo('net:a'), info);
    expect.toBeUndefined(await store.loadInfo('missing'));
    expect.toDeepEqual((await store.list('net:')).sort(), ['net:a', 'net:b']);
    expect.toEqual(await store.exists('other'), true);

    await store.delete('other');
    expect.toEqual(await store.exists('other'), false);
    expect.toHaveLength(await store.list(), 2);
  })

  .test('截断的会话信息报 STORE_CORRUPT，形状不符视为缺失', async () => {
    const base = tempDir('store');
    const store = new JSONStore(base);
    fs.mkdirSync(path.join(base, 'broken'));
    fs.writeFileSync(path.join(base, 'broken', 'info.json'), '{"sessionId": "bro');
    fs.mkdirSync(path.join(base, 'odd'));
    fs.writeFileSync(path.join(base, 'odd', 'info.json'), JSON.stringify({ sessionId: 7 }));

    let caught: unknown;
    try {
      await store.loadInfo('broken');
    } catch (error) {
      caught = error;
    }
    expect.toBeTruthy(caught instanceof EngineError && caught.code === 'STORE_CORRUPT');
    await expect.toThrow(() => store.loadInfo('broken'), 'is not valid JSON');
    expect.toBeUndefined(await store.loadInfo('odd'));
  })

  .test('基础目录不存在时列表为空', async () => {
    const store = new JSONStore(path.join(tempDir('store'), 'not-created'));
    expect.toDeepEqual(await store.list(), []);
  })

  .test('项目目录编码', async () => {
    expect.toEqual(encodeProjectDir('/home/dev/my_app'), '-home-dev-my-app');
    expect.toEqual(agentTranscriptPath('/root', '/proj', 'abc'), path.join('/root', '-proj', 'abc.jsonl'));
  })

  .test('转录加载优先当前项目目录，其次搜索其他项目', async () => {
    const root = tempDir('transcripts');
    fs.mkdirSync(path.join(root, '-proj'));
    fs.writeFileSync(path.join(root, '-proj', 'abc.jsonl'), '{"n":1}\n\n{"n":2}\n');
    fs.mkdirSync(path.join(root, '-elsewhere'));
    fs.writeFileSync(path.join(root, '-elsewhere', 'def.jsonl'), '{"n":3}\n');

    const loader = new TranscriptLoader(root);
    expect.toDeepEqual(await loader.load('/proj', 'abc'), ['{"n":1}', '{"n":2}']);
    expect.toEqual(await loader.locate('/proj', 'def'), path.join(root, '-elsewhere', 'def.jsonl'));
    expect.toDeepEqual(await loader.load('/proj', 'def'), ['{"n":3}']);
    expect.toBeUndefined(await loader.load('/proj', 'missing'));
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
