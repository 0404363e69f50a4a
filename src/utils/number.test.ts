import * as assert from 'node:assert';
import { test } from 'node:test';

import { parseInteger } from './number.js';

test('parseInteger - 有效的整数字符串', () => {
  assert.strictEqual(parseInteger('123'), 123);
  assert.strictEqual(parseInteger('0'), 0);
  assert.strictEqual(parseInteger('007'), 7);
});

test('parseInteger - 无效输入返回 null', () => {
  assert.strictEqual(parseInteger('abc'), null);
  assert.strictEqual(parseInteger('12.5'), null);
  assert.strictEqual(parseInteger('-1'), null);
  assert.strictEqual(parseInteger('+1'), null);
  assert.strictEqual(parseInteger('1e2'), null);
  assert.strictEqual(parseInteger(' 12'), null);
  assert.strictEqual(parseInteger(''), null);
});

test('parseInteger - 超出安全整数范围返回 null', () => {
  assert.strictEqual(parseInteger('9007199254740991'), 9007199254740991);
  assert.strictEqual(parseInteger('9007199254740993'), null);
});
