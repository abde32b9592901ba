import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  MAX_CALLS_PER_RESPONSE,
  extractJsonObjects,
  jsonFenceBodies,
  parseToolCalls,
  toolCallExample,
} from '../src/agent/tool-calls.js';

describe('extractJsonObjects', () => {
  it('finds objects in prose and skips braces inside strings', () => {
    const text = 'first {"a":"}{"} then {"b":2} and a stray { brace';
    assert.deepEqual(extractJsonObjects(text), [{ a: '}{' }, { b: 2 }]);
  });

  it('steps over unparseable prose braces', () => {
    assert.deepEqual(extractJsonObjects('{not json} {"ok":true}'), [{ ok: true }]);
  });

  it('ignores arrays and scalars', () => {
    assert.deepEqual(extractJsonObjects('[1,2] 3 "x"'), []);
  });
});

describe('jsonFenceBodies', () => {
  it('returns fenced json bodies in order', () => {
    const text = 'a\n```json\n{"x":1}\n```\nb\n```JSON title\n{"y":2}\n```';
    assert.deepEqual(jsonFenceBodies(text), ['{"x":1}\n', '{"y":2}\n']);
  });
});

describe('parseToolCalls', () => {
  it('parses the bare wire format', () => {
    const res = parseToolCalls('{"tool_calls":[{"tool":"shell","command":"ls -la"}]}');
    assert.deepEqual(res, { calls: [{ tool: 'shell', command: 'ls -la' }], dropped: [], hint: 'none' });
  });

  it('parses a payload inside a json fence surrounded by prose', () => {
    const raw = [
      'Let me look around first.',
      '```json',
      '{"tool_calls":[{"tool":"shell","command":"git status"},{"tool":"shell","command":"  rg TODO  "}]}',
      '```',
      'Then I will report back.',
    ].join('\n');
    assert.deepEqual(parseToolCalls(raw).calls, [
      { tool: 'shell', command: 'git status' },
      { tool: 'shell', command: 'rg TODO' },
    ]);
  });

  it('takes the payload after a line of prose', () => {
    const res = parseToolCalls('Sure, done.\n{"tool_calls":[{"tool":"shell","command":"ls"}]}');
    assert.deepEqual(res, { calls: [{ tool: 'shell', command: 'ls' }], dropped: [], hint: 'none' });
  });

  it('skips commentary objects before the payload', () => {
    const raw = 'plan: {"step":1} now {"tool_calls":[{"tool":"shell","command":"pwd"}]}';
    assert.deepEqual(parseToolCalls(raw).calls, [{ tool: 'shell', command: 'pwd' }]);
  });

  it('accepts the tool name in any case', () => {
    const res = parseToolCalls('{"tool_calls":[{"tool":" Shell ","command":"ls"}]}');
    assert.deepEqual(res.calls, [{ tool: 'shell', command: 'ls' }]);
  });

  it('drops bad entries one by one', () => {
    const raw = JSON.stringify({
      tool_calls: [
        { tool: 'shell', command: 'ls' },
        'ls',
        { command: 'pwd' },
        { tool: 'browser', command: 'open' },
        { tool: 'shell', command: '   ' },
        { tool: 'shell', command: 'wc -l a.txt' },
      ],
    });
    const res = parseToolCalls(raw);
    assert.deepEqual(res.calls, [
      { tool: 'shell', command: 'ls' },
      { tool: 'shell', command: 'wc -l a.txt' },
    ]);
    assert.deepEqual(res.dropped, [
      { index: 1, reason: 'entry is not an object' },
      { index: 2, reason: 'missing "tool"' },
      { index: 3, reason: 'unknown tool "browser"' },
      { index: 4, reason: 'missing "command"' },
    ]);
    assert.equal(res.hint, 'none');
  });

  it(`keeps at most ${MAX_CALLS_PER_RESPONSE} calls`, () => {
    const entries = Array.from({ length: 10 }, (_, i) => ({ tool: 'shell', command: `echo ${i}` }));
    const res = parseToolCalls(JSON.stringify({ tool_calls: entries }));
    assert.equal(res.calls.length, 8);
    assert.equal(res.calls[7]?.command, 'echo 7');
    assert.deepEqual(
      res.dropped.map((d) => d.index),
      [8, 9]
    );
    assert.equal(res.dropped[0]?.reason, 'more than 8 calls in one response');
  });

  it('reports plain prose as a final answer with no hint', () => {
    assert.deepEqual(parseToolCalls('All done. Tests pass.'), { calls: [], dropped: [], hint: 'none' });
  });

  it('hints malformed when the payload looks intended but does not parse', () => {
    const res = parseToolCalls('{"tool_calls": [{"tool": "shell", "command": "ls"}');
    assert.deepEqual(res, { calls: [], dropped: [], hint: 'malformed' });
  });

  it('hints malformed when every entry was dropped', () => {
    const res = parseToolCalls('{"tool_calls":[{"tool":"python","command":"x"}]}');
    assert.equal(res.calls.length, 0);
    assert.equal(res.hint, 'malformed');
  });

  it('hints legacy shell blocks', () => {
    const res = parseToolCalls('Run this:\n```bash\nls -la\n```');
    assert.deepEqual(res, { calls: [], dropped: [], hint: 'legacy_shell_block' });
  });

  it('never throws on junk', () => {
    for (const raw of ['', '{', '}}}{{{', '```json\n{\n```', '\u0000{"tool_calls":7}']) {
      const res = parseToolCalls(raw);
      assert.deepEqual(res.calls, []);
    }
  });
});

describe('toolCallExample', () => {
  it('renders the wire format', () => {
    assert.equal(toolCallExample('ls'), '{"tool_calls":[{"tool":"shell","command":"ls"}]}');
  });
});
