import fs from 'fs';
import path from 'path';
import { GitignoreMatcher } from '../../../src/permissions/gitignore';
import { TestRunner, expect } from '../../helpers/utils';
import { createTempDir, removeDir } from '../../helpers/setup';

const runner = new TestRunner('gitignore 匹配');
const dirs: string[] = [];

runner
  .afterAll(async () => {
    for (const dir of dirs) removeDir(dir);
  })

  .test('按工作目录相对路径匹配规则', async () => {
    const matcher = GitignoreMatcher.fromRules('/proj', 'node_modules/\n*.env\n!example.env\n/dist\n');
    expect.toBeTruthy(matcher.ignores('/proj/node_modules/zod/index.js'));
    expect.toBeTruthy(matcher.ignores('config/prod.env'));
    expect.toBeFalsy(matcher.ignores('config/example.env'));
    expect.toBeTruthy(matcher.ignores('/proj/dist/index.js'));
    expect.toBeFalsy(matcher.ignores('/proj/src/dist/index.js'));
    expect.toBeFalsy(matcher.ignores('/proj/src/index.ts'));
  })

  .test('工作目录之外与空路径不匹配', async () => {
    const matcher = GitignoreMatcher.fromRules('/proj', '*.env\n');
    expect.toBeFalsy(matcher.ignores('/other/prod.env'));
    expect.toBeFalsy(matcher.ignores('../prod.env'));
    expect.toBeFalsy(matcher.ignores('/proj'));
    expect.toBeFalsy(matcher.ignores(''));
  })

  .test('从磁盘加载，缺少文件时不忽略任何路径', async () => {
    const dir = createTempDir('gitignore');
    dirs.push(dir);
    expect.toBeFalsy((await GitignoreMatcher.load(dir)).ignores('secret.env'));

    fs.writeFileSync(path.join(dir, '.gitignore'), '*.env\n');
    const matcher = await GitignoreMatcher.load(dir);
    expect.toBeTruthy(matcher.ignores(path.join(dir, 'secret.env')));
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
