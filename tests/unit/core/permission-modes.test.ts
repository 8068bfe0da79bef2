import { permissionModes, PermissionModeRegistry } from '../../../src/core/permission-modes';
import { TestRunner, expect } from '../../helpers/utils';

const runner = new TestRunner('Permission Modes');

runner
  .test('可注册自定义模式并区分内置模式', async () => {
    const registry = new PermissionModeRegistry();
    registry.register('auto', () => 'allow', true);
    registry.register('custom', () => 'deny');

    expect.toDeepEqual(registry.list(), ['auto', 'custom']);
    expect.toEqual(registry.isBuiltIn('auto'), true);
    expect.toEqual(registry.isBuiltIn('custom'), false);
    expect.toEqual(registry.isBuiltIn('missing'), false);
  })

  .test('处理器收到推断模式', async () => {
    const registry = new PermissionModeRegistry();
    const seen: string[] = [];
    registry.register('audit', (ctx) => {
      seen.push(`${ctx.toolName}:${ctx.inferredPattern}`);
      return 'ask';
    });

    const handler = registry.get('audit');
    expect.toEqual(handler?.({ toolName: 'Bash', input: { command: 'make' }, inferredPattern: 'Bash(make:*)' }), 'ask');
    expect.toDeepEqual(seen, ['Bash:Bash(make:*)']);
  })

  .test('全局registry包含内置模式', async () => {
    const list = permissionModes.list();
    expect.toContain(list, 'ask');
    expect.toContain(list, 'deny');
    expect.toContain(list, 'allow');
    expect.toEqual(permissionModes.isBuiltIn('ask'), true);
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
