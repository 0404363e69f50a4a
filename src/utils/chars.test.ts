import * as assert from 'node:assert';
import { describe, it } from 'node:test';

import { CR, LF } from '../specs.js';
import {
  equalsAsciiIgnoreCase,
  indexOfCode,
  isWhitespace,
  trimSpan,
} from './chars.js';

describe('equalsAsciiIgnoreCase', () => {
  it('应该忽略 ASCII 大小写比较片段', () => {
    assert.strictEqual(equalsAsciiIgnoreCase('gzip', 'x: GZip\r\n', 3, 4), true);
    assert.strictEqual(equalsAsciiIgnoreCase('Content-Type', 'content-type', 0, 12), true);
  });

  it('长度不同时应该返回 false', () => {
    assert.strictEqual(equalsAsciiIgnoreCase('gzip', 'gzipx', 0, 5), false);
  });

  it('内容不同时应该返回 false', () => {
    assert.strictEqual(equalsAsciiIgnoreCase('gzip', 'gzap', 0, 4), false);
  });

  it('非字母字符不做大小写折叠', () => {
    assert.strictEqual(equalsAsciiIgnoreCase('a-b', 'A-B', 0, 3), true);
    assert.strictEqual(equalsAsciiIgnoreCase('a-b', 'A\rB', 0, 3), false);
  });
});

describe('trimSpan', () => {
  it('应该去掉片段两端的空白', () => {
    const buffer = 'Name:  \t value \t';
    assert.deepStrictEqual(trimSpan(buffer, { start: 5, length: 11 }), { start: 9, length: 5 });
  });

  it('全空白片段应该收缩为空', () => {
    assert.deepStrictEqual(trimSpan('a:   ', { start: 2, length: 3 }), { start: 5, length: 0 });
  });

  it('没有空白时保持不变', () => {
    assert.deepStrictEqual(trimSpan('abc', { start: 0, length: 3 }), { start: 0, length: 3 });
  });
});

describe('indexOfCode', () => {
  it('只在给定范围内查找', () => {
    assert.strictEqual(indexOfCode('a:b:c', 0x3a, 0, 5), 1);
    assert.strictEqual(indexOfCode('a:b:c', 0x3a, 2, 3), 3);
    assert.strictEqual(indexOfCode('a:b:c', 0x3a, 2, 1), -1);
  });
});

describe('isWhitespace', () => {
  it('should accept SP, HTAB, CR and LF only', () => {
    assert.ok(isWhitespace(0x20));
    assert.ok(isWhitespace(0x09));
    assert.ok(isWhitespace(0x0d));
    assert.ok(isWhitespace(0x0a));
    assert.ok(!isWhitespace(0x41));
  });

  it('应该识别共享的 CR、LF 常量', () => {
    assert.ok(isWhitespace(CR));
    assert.ok(isWhitespace(LF));
  });
});
