import path from 'path';
import { McpHelperServer, ProcessMcpServer, mcpConfigJson } from '../../../src/mcp/helper-server';
import { Session } from '../../../src/core/session';
import { resolveEngineConfig } from '../../../src/core/config';
import { JsonObject } from '../../../src/core/types';
import { JSONStore } from '../../../src/infra/store';
import { ProjectRules } from '../../../src/permissions/project-rules';
import { FakeProcessLauncher } from '../../helpers/fake-process';
import { MemorySettingsStore } from '../../helpers/memory-settings';
import { TestRunner, expect } from '../../helpers/utils';
import { createTempDir, removeDir, waitFor } from '../../helpers/setup';

class RecordingServer extends McpHelperServer {
  readonly calls: string[] = [];

  protected async onStart(): Promise<void> {
    this.calls.push('start');
  }

  protected async onStop(): Promise<void> {
    this.calls.push('stop');
  }

  toMcpConfig(): JsonObject {
    return { type: 'stdio', command: 'notes-server' };
  }
}

const runner = new TestRunner('MCP 辅助服务');
const dirs: string[] = [];

runner
  .afterAll(async () => {
    for (const dir of dirs) removeDir(dir);
  })

  .test('start/stop 幂等，计数只记录真实切换', async () => {
    const server = new RecordingServer('notes');
    await Promise.all([server.start(), server.start()]);
    await server.start();
    expect.toEqual(server.isRunning, true);
    expect.toEqual(server.startCount, 1);

    await server.stop();
    await server.stop();
    expect.toEqual(server.isRunning, false);
    expect.toEqual(server.stopCount, 1);
    expect.toDeepEqual(server.calls, ['start', 'stop']);
    expect.toEqual(server.toolPrefix, 'mcp__notes__');
  })

  .test('mcp 配置 JSON', async () => {
    const launcher = new FakeProcessLauncher();
    const http = new ProcessMcpServer({ name: 'board', command: 'board-server', cwd: '/proj', port: 4100, launcher });
    const json = mcpConfigJson([new RecordingServer('notes'), http]);
    expect.toEqual(
      json,
      '{"mcpServers":{"notes":{"type":"stdio","command":"notes-server"},"board":{"type":"http","url":"http://localhost:4100/mcp"}}}'
    );
  })

  .test('进程型服务启动子进程，自行退出后标记为停止', async () => {
    const launcher = new FakeProcessLauncher();
    const server = new ProcessMcpServer({
      name: 'board',
      command: 'board-server',
      args: ['--quiet'],
      cwd: '/proj',
      env: { LOG_LEVEL: 'warn' },
      port: 4100,
      launcher,
      stopTimeoutMs: 20,
    });

    await server.start();
    expect.toEqual(server.pid, 1000);
    expect.toDeepEqual(launcher.calls[0], {
      command: 'board-server',
      args: ['--quiet'],
      cwd: '/proj',
      env: { LOG_LEVEL: 'warn', PORT: '4100' },
    });

    launcher.last.exit(1);
    await waitFor(() => !server.isRunning, 2000, 'helper exit');
    expect.toBeUndefined(server.pid);

    await server.start();
    expect.toEqual(server.startCount, 2);
    await server.stop();
    expect.toEqual(launcher.processes[1].hasExited, true);
    expect.toDeepEqual(launcher.processes[1].signals, ['SIGTERM']);
  })

  .test('会话首次启动时启动辅助服务，关闭时停止，并自动允许其工具', async () => {
    const dir = createTempDir('helpers');
    dirs.push(dir);
    const launcher = new FakeProcessLauncher();
    const notes = new RecordingServer('notes');
    const session = await Session.create(
      { sessionId: 's1', workingDirectory: '/proj' },
      {
        config: resolveEngineConfig({ abortTimeoutMs: 20 }, {}, dir),
        store: new JSONStore(path.join(dir, 'sessions')),
        launcher,
        rules: new ProjectRules(new MemorySettingsStore()),
        helperServers: [notes],
      }
    );

    expect.toEqual(notes.isRunning, false);
    expect.toDeepEqual(session.spawnArgs().slice(-2), [
      '--mcp-config',
      '{"mcpServers":{"notes":{"type":"stdio","command":"notes-server"}}}',
    ]);

    await session.sendMessage('take a note');
    expect.toEqual(notes.startCount, 1);

    const proc = launcher.last;
    proc.emit({
      type: 'control_request',
      request_id: 'req-1',
      request: { subtype: 'can_use_tool', tool_name: 'mcp__notes__save', input: { text: 'x' } },
    });
    await waitFor(() => proc.controlResponse('req-1') !== undefined, 2000, 'control response');
    expect.toDeepEqual(proc.controlResponse('req-1'), {
      subtype: 'success',
      request_id: 'req-1',
      response: { behavior: 'allow', updatedInput: { text: 'x' } },
    });

    await session.close();
    expect.toEqual(notes.isRunning, false);
    expect.toEqual(notes.stopCount, 1);
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
