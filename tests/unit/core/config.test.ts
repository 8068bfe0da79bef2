import path from 'path';
import { resolveEngineConfig } from '../../../src/core/config';
import { EngineError } from '../../../src/core/errors';
import { TestRunner, expect } from '../../helpers/utils';

const runner = new TestRunner('引擎配置');

function configError(fn: () => unknown): EngineError | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof EngineError) return error;
    throw error;
  }
  return undefined;
}

runner
  .test('默认值', async () => {
    const config = resolveEngineConfig({}, {}, '/proj');
    expect.toEqual(config.command, 'claude');
    expect.toEqual(config.abortTimeoutMs, 2000);
    expect.toEqual(config.permissionTimeoutMs, 300_000);
    expect.toEqual(config.askUserBehavior, 'ask');
    expect.toEqual(config.cumulativeResetScope, 'segment');
    expect.toDeepEqual(config.env, { MCP_TOOL_TIMEOUT: '30000000' });
    expect.toEqual(config.storeDir, path.join('/proj', '.agent-engine', 'sessions'));
    expect.toEqual(config.debug, false);
    expect.toBeUndefined(config.model);
  })

  .test('环境变量覆盖默认值，显式参数优先', async () => {
    const env = {
      AGENT_ENGINE_COMMAND: '/opt/agent/bin/agent',
      AGENT_ENGINE_ABORT_TIMEOUT_MS: '500',
      AGENT_ENGINE_ASK_USER: 'deny',
      AGENT_ENGINE_DEBUG: 'true',
      AGENT_ENGINE_TRANSCRIPT_ROOT: '/transcripts',
    };
    const config = resolveEngineConfig({ abortTimeoutMs: 50 }, env, '/proj');
    expect.toEqual(config.command, '/opt/agent/bin/agent');
    expect.toEqual(config.abortTimeoutMs, 50);
    expect.toEqual(config.askUserBehavior, 'deny');
    expect.toEqual(config.debug, true);
    expect.toEqual(config.transcriptRoot, '/transcripts');
  })

  .test('非法值报 INVALID_CONFIG', async () => {
    const negative = configError(() => resolveEngineConfig({ permissionTimeoutMs: -1 }, {}, '/proj'));
    expect.toEqual(negative?.code, 'INVALID_CONFIG');
    expect.toContain(negative?.message ?? '', 'permissionTimeoutMs');

    const badEnv = configError(() => resolveEngineConfig({}, { AGENT_ENGINE_ABORT_TIMEOUT_MS: 'soon' }, '/proj'));
    expect.toBeUndefined(badEnv);
  })

  .test('未知权限模式报错并列出已知模式', async () => {
    const error = configError(() => resolveEngineConfig({ askUserBehavior: 'sometimes' }, {}, '/proj'));
    expect.toEqual(error?.code, 'INVALID_CONFIG');
    expect.toContain(error?.message ?? '', 'unknown permission mode "sometimes"');
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
