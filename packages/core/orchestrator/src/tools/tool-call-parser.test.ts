import { describe, it, expect } from 'vitest';
import { hasToolCalls, parseAttributes, parseToolCalls } from './tool-call-parser.js';

describe('parseToolCalls', () => {
  it('parses a single call with its body', () => {
    expect(parseToolCalls('<tool_call name="shell">ls -la</tool_call>')).toEqual([
      { name: 'shell', args: {}, body: 'ls -la' },
    ]);
  });

  it('finds calls embedded in prose', () => {
    const text = 'Check this: <tool_call name="shell">ls -la</tool_call> and tell me.';
    expect(parseToolCalls(text)).toEqual([{ name: 'shell', args: {}, body: 'ls -la' }]);
  });

  it('keeps extra attributes as arguments', () => {
    expect(parseToolCalls('<tool_call name="write_file" path="test.py">print("hello")</tool_call>')).toEqual([
      { name: 'write_file', args: { path: 'test.py' }, body: 'print("hello")' },
    ]);
  });

  it('parses several calls in order', () => {
    const text = `
      <tool_call name="read_file">old.txt</tool_call>
      <tool_call name="write_file" path="new.txt">content</tool_call>
    `;
    expect(parseToolCalls(text).map((call) => [call.name, call.body])).toEqual([
      ['read_file', 'old.txt'],
      ['write_file', 'content'],
    ]);
  });

  it('matches bodies non-greedily across lines and drops the framing newlines', () => {
    const text = '<tool_call name="write_file" path="a.ts">\nline 1\nline 2\n</tool_call>x</tool_call>';
    expect(parseToolCalls(text)).toEqual([
      { name: 'write_file', args: { path: 'a.ts' }, body: 'line 1\nline 2' },
    ]);
  });

  it('keeps indentation and blank lines inside the body', () => {
    const text = '<tool_call name="write_file" path="a.py">    indented()\n\n</tool_call>';
    expect(parseToolCalls(text)).toEqual([
      { name: 'write_file', args: { path: 'a.py' }, body: '    indented()\n' },
    ]);
  });

  it('strips only one framing newline on each side, including CRLF', () => {
    const text = '<tool_call name="write_file" path="b.txt">\r\n\nbody\n\n</tool_call>';
    expect(parseToolCalls(text)[0]?.body).toBe('\nbody\n');
  });

  it('accepts self-closing calls and single-quoted attributes', () => {
    expect(parseToolCalls(`<tool_call name='list_files' path="src" />`)).toEqual([
      { name: 'list_files', args: { path: 'src' }, body: '' },
    ]);
  });

  it('drops calls without a name', () => {
    expect(parseToolCalls('<tool_call path="a">x</tool_call>')).toEqual([]);
    expect(parseToolCalls('<tool_call name="">x</tool_call>')).toEqual([]);
  });

  it('ignores unterminated tags and plain text', () => {
    expect(parseToolCalls('<tool_call name="shell">ls')).toEqual([]);
    expect(parseToolCalls('no tools here')).toEqual([]);
    expect(hasToolCalls('no tools here')).toBe(false);
  });
});

describe('parseAttributes', () => {
  it('lets later duplicates win', () => {
    expect(parseAttributes('path="a" path="b" mode=\'x\'')).toEqual({ path: 'b', mode: 'x' });
  });
});
