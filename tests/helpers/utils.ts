/**
 * 测试辅助工具函数
 */

import assert from 'assert';

/**
 * 测试结果
 */
export interface TestResult {
  passed: number;
  failed: number;
  failures: Array<{
    name: string;
    error: Error;
  }>;
}

type Hook = () => Promise<void> | void;

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * 测试套件运行器
 */
export class TestRunner {
  private tests: Array<[string, () => Promise<void>]> = [];
  private suiteName: string;
  private beforeAllHooks: Hook[] = [];
  private afterAllHooks: Hook[] = [];
  private beforeEachHooks: Hook[] = [];
  private afterEachHooks: Hook[] = [];

  constructor(suiteName: string) {
    this.suiteName = suiteName;
  }

  /**
   * 添加测试用例
   */
  test(name: string, fn: () => Promise<void>): this {
    this.tests.push([name, fn]);
    return this;
  }

  beforeAll(fn: Hook): this {
    this.beforeAllHooks.push(fn);
    return this;
  }

  afterAll(fn: Hook): this {
    this.afterAllHooks.push(fn);
    return this;
  }

  beforeEach(fn: Hook): this {
    this.beforeEachHooks.push(fn);
    return this;
  }

  afterEach(fn: Hook): this {
    this.afterEachHooks.push(fn);
    return this;
  }

  /**
   * 运行所有测试
   */
  async run(): Promise<TestResult> {
    console.log(`\n${'='.repeat(70)}`);
    console.log(`${this.suiteName}`);
    console.log(`${'='.repeat(70)}\n`);

    let passed = 0;
    let failed = 0;
    const failures: Array<{ name: string; error: Error }> = [];

    for (const hook of this.beforeAllHooks) {
      await hook();
    }

    for (const [name, fn] of this.tests) {
      for (const hook of this.beforeEachHooks) {
        await hook();
      }

      process.stdout.write(`  • ${name}... `);
      try {
        const start = Date.now();
        await fn();
        const duration = Date.now() - start;
        console.log(`✓ (${duration}ms)`);
        passed++;
      } catch (caught) {
        const error = toError(caught);
        console.log('✗');
        console.error(`    ${error.message}`);
        failures.push({ name, error });
        failed++;
      }

      for (const hook of this.afterEachHooks) {
        await hook();
      }
    }

    for (const hook of this.afterAllHooks) {
      await hook();
    }

    console.log(`\n  总计: ${passed} 通过, ${failed} 失败\n`);

    return { passed, failed, failures };
  }
}

/**
 * 断言辅助函数
 */
export const expect = {
  toBeTruthy(value: unknown, message?: string): void {
    assert.ok(value, message || 'Expected value to be truthy');
  },

  toBeFalsy(value: unknown, message?: string): void {
    assert.ok(!value, message || 'Expected value to be falsy');
  },

  toBeUndefined(value: unknown, message?: string): void {
    assert.strictEqual(value, undefined, message || `Expected ${String(value)} to be undefined`);
  },

  /**
   * 断言相等
   */
  toEqual<T>(actual: T, expected: T, message?: string): void {
    assert.strictEqual(actual, expected, message || `Expected ${String(actual)} to equal ${String(expected)}`);
  },

  /**
   * 断言深度相等
   */
  toDeepEqual<T>(actual: T, expected: T, message?: string): void {
    assert.deepStrictEqual(actual, expected, message || 'Expected deep equality');
  },

  /**
   * 断言包含
   */
  toContain<T>(haystack: string | readonly T[], needle: string | T, message?: string): void {
    if (typeof haystack === 'string') {
      assert.ok(haystack.includes(String(needle)), message || `Expected "${haystack}" to contain "${String(needle)}"`);
    } else {
      assert.ok(haystack.some((item) => item === needle), message || `Expected array to contain ${String(needle)}`);
    }
  },

  /**
   * 断言抛出错误
   */
  async toThrow(fn: () => unknown, expectedMessage?: string): Promise<void> {
    let thrown = false;
    try {
      await fn();
    } catch (caught) {
      thrown = true;
      const error = toError(caught);
      if (expectedMessage) {
        assert.ok(
          error.message.includes(expectedMessage),
          `Expected error message to include "${expectedMessage}", got "${error.message}"`
        );
      }
    }
    assert.ok(thrown, 'Expected function to throw an error');
  },

  toBeGreaterThan(actual: number, expected: number, message?: string): void {
    assert.ok(actual > expected, message || `Expected ${actual} to be greater than ${expected}`);
  },

  /**
   * 断言数组长度
   */
  toHaveLength(array: readonly unknown[], length: number, message?: string): void {
    assert.strictEqual(
      array.length,
      length,
      message || `Expected array to have length ${length}, got ${array.length}`
    );
  },
};
