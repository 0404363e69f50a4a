import * as assert from 'node:assert';
import { describe, it } from 'node:test';

import {
  createParserTable,
  DEFAULT_HEADER_PARSERS,
  getHeaderParser,
  httpDateParser,
  integerParser,
  rawStringParser,
  tokenListParser,
} from './header-parsers.js';

describe('tokenListParser', () => {
  it('应该按逗号拆分并去掉空白', () => {
    assert.deepStrictEqual(tokenListParser.parse(' gzip ,custom,  chunked'), {
      valid: true,
      value: ['gzip', 'custom', 'chunked'],
    });
  });

  it('应该跳过空的列表成员', () => {
    assert.deepStrictEqual(tokenListParser.parse('close,, ,keep-alive'), {
      valid: true,
      value: ['close', 'keep-alive'],
    });
  });

  it('空值应该解析为空列表', () => {
    assert.deepStrictEqual(tokenListParser.parse(''), { valid: true, value: [] });
  });

  it('应该拒绝非法令牌', () => {
    assert.deepStrictEqual(tokenListParser.parse('close, bad token'), {
      valid: false,
      reason: 'invalid token: "bad token"',
    });
  });

  it('应该拒绝 CR/LF', () => {
    const result = tokenListParser.parse('close\r\nX-Injected: 1');
    assert.strictEqual(result.valid, false);
  });

  it('令牌比较不区分大小写', () => {
    assert.strictEqual(tokenListParser.equals('Close', 'close'), true);
    assert.strictEqual(tokenListParser.equals('close', 'keep-alive'), false);
  });
});

describe('integerParser', () => {
  it('应该解析非负整数', () => {
    assert.deepStrictEqual(integerParser.parse(' 42 '), { valid: true, value: [42] });
  });

  it('应该拒绝非整数', () => {
    assert.deepStrictEqual(integerParser.parse('4.2'), { valid: false, reason: 'invalid integer: "4.2"' });
  });

  it('should format back to decimal text', () => {
    assert.strictEqual(integerParser.format(1024), '1024');
  });
});

describe('httpDateParser', () => {
  it('应该解析为 Date 并按时间比较', () => {
    const result = httpDateParser.parse('Wed, 09 Jun 2021 10:18:14 GMT');
    assert.ok(result.valid);
    const [date] = result.value;
    assert.ok(date);
    assert.strictEqual(httpDateParser.equals(date, new Date('2021-06-09T10:18:14Z')), true);
    assert.strictEqual(httpDateParser.format(date), 'Wed, 09 Jun 2021 10:18:14 GMT');
  });

  it('应该拒绝无效日期', () => {
    assert.deepStrictEqual(httpDateParser.parse('0'), { valid: false, reason: 'invalid HTTP date: "0"' });
  });

  it('isValue 只接受 Date', () => {
    assert.strictEqual(httpDateParser.isValue(new Date(0)), true);
    assert.strictEqual(httpDateParser.isValue('Thu, 01 Jan 1970 00:00:00 GMT'), false);
  });

  it('isValue 不接受无效的 Date', () => {
    assert.strictEqual(httpDateParser.isValue(new Date(Number.NaN)), false);
  });
});

describe('rawStringParser', () => {
  it('应该把整个值作为一个成员保留逗号', () => {
    assert.deepStrictEqual(rawStringParser.parse('a=1, b=2'), { valid: true, value: ['a=1, b=2'] });
  });

  it('空值也是合法的', () => {
    assert.deepStrictEqual(rawStringParser.parse(''), { valid: true, value: [''] });
  });

  it('比较区分大小写', () => {
    assert.strictEqual(rawStringParser.equals('Abc', 'abc'), false);
  });
});

describe('getHeaderParser', () => {
  it('应该按名称不区分大小写查找', () => {
    assert.strictEqual(getHeaderParser(DEFAULT_HEADER_PARSERS, 'Connection'), tokenListParser);
    assert.strictEqual(getHeaderParser(DEFAULT_HEADER_PARSERS, 'CONTENT-LENGTH'), integerParser);
    assert.strictEqual(getHeaderParser(DEFAULT_HEADER_PARSERS, 'Last-Modified'), httpDateParser);
  });

  it('未注册的名称应该使用原始字符串解析', () => {
    assert.strictEqual(getHeaderParser(DEFAULT_HEADER_PARSERS, 'X-Custom'), rawStringParser);
    assert.strictEqual(getHeaderParser(DEFAULT_HEADER_PARSERS, 'Set-Cookie'), rawStringParser);
  });
});

describe('createParserTable', () => {
  it('覆盖项应该生效且不影响默认表', () => {
    const table = createParserTable({ 'X-Count': integerParser, Connection: rawStringParser });
    assert.strictEqual(getHeaderParser(table, 'x-count'), integerParser);
    assert.strictEqual(getHeaderParser(table, 'connection'), rawStringParser);
    assert.strictEqual(getHeaderParser(DEFAULT_HEADER_PARSERS, 'connection'), tokenListParser);
  });
});
