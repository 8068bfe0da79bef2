import { inferBashPrefix, inferPattern } from '../../../src/permissions/inference';
import { matchesPattern, parsePermissionPattern } from '../../../src/permissions/pattern';
import { TestRunner, expect } from '../../helpers/utils';

const runner = new TestRunner('权限模式推断');

runner
  .test('Bash 前缀在参数、路径和引号处停止', async () => {
    expect.toEqual(inferBashPrefix('npm run test -- --watch'), 'npm run test');
    expect.toEqual(inferBashPrefix('cd app && cargo add serde'), 'cargo add serde');
    expect.toEqual(inferBashPrefix('python ./scripts/run.py'), 'python');
    expect.toEqual(inferBashPrefix('git commit -m "msg"'), 'git commit');
    expect.toEqual(inferBashPrefix("echo 'hi'"), 'echo');
    expect.toEqual(inferBashPrefix('cd app'), '');
  })

  .test('各类工具的推断模式', async () => {
    expect.toEqual(inferPattern('Bash', { command: 'cargo build --release' }), 'Bash(cargo build:*)');
    expect.toEqual(inferPattern('Bash', { command: '' }), 'Bash(*)');
    expect.toEqual(inferPattern('Write', { file_path: '/proj/src/a.ts' }), 'Write(/proj/src/**)');
    expect.toEqual(inferPattern('Edit', { file_path: 'a.ts' }), 'Edit(**)');
    expect.toEqual(inferPattern('Edit', { file_path: '/a.ts' }), 'Edit(/**)');
    expect.toEqual(inferPattern('Read', { file_path: '' }), 'Read()');
    expect.toEqual(inferPattern('WebFetch', { url: 'https://Docs.Example.com/page' }), 'WebFetch(domain:docs.example.com)');
    expect.toEqual(inferPattern('WebFetch', { url: 'nope' }), 'WebFetch(*)');
    expect.toEqual(inferPattern('WebSearch', { query: 'x' }), 'WebSearch');
    expect.toEqual(inferPattern('Grep', { pattern: 'x' }), 'Grep');
    expect.toEqual(inferPattern('mcp__db__query', { sql: 'select 1' }), 'mcp__db__query');
  })

  .test('推断出的模式可解析并覆盖原调用', async () => {
    const calls: Array<[string, Record<string, unknown>]> = [
      ['Bash', { command: 'npm run lint -- --fix' }],
      ['Write', { file_path: '/proj/src/a.ts' }],
      ['WebFetch', { url: 'https://api.example.com/v1' }],
      ['Edit', { file_path: '/a.ts' }],
    ];
    for (const [toolName, input] of calls) {
      const pattern = parsePermissionPattern(inferPattern(toolName, input));
      expect.toBeTruthy(matchesPattern(pattern, toolName, input), `${pattern.raw} should cover its own call`);
    }
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
