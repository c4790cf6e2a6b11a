import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { WriteFileTool } from './write-tool.js';
import { PathValidator } from './path-validator.js';

describe('WriteFileTool', () => {
  let tempDir: string;
  let tool: WriteFileTool;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'crewroom-write-tool-'));
    tool = new WriteFileTool({ validator: new PathValidator({ allowedPaths: [tempDir] }) });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('writes content and creates parent directories', async () => {
    const result = await tool.execute({ path: 'src/app.ts', content: 'console.log(1);' });

    expect(result).toBe('Successfully wrote to src/app.ts');
    await expect(fs.readFile(path.join(tempDir, 'src', 'app.ts'), 'utf-8')).resolves.toBe(
      'console.log(1);'
    );
  });

  it('overwrites existing files', async () => {
    await fs.writeFile(path.join(tempDir, 'a.txt'), 'old');
    await tool.execute({ path: 'a.txt', content: 'new' });

    await expect(fs.readFile(path.join(tempDir, 'a.txt'), 'utf-8')).resolves.toBe('new');
  });

  it('requires a path', async () => {
    await expect(tool.execute({ content: 'x' })).resolves.toBe(
      "Error: write_file requires a 'path' attribute."
    );
  });

  it('rejects paths outside the workspace', async () => {
    const outside = path.join(os.tmpdir(), 'crewroom-outside.txt');
    const result = await tool.execute({ path: outside, content: 'x' });

    expect(result.startsWith(`Error: Path "${outside}" is not in allowed directories`)).toBe(true);
  });

  it('reads the current content for previews', async () => {
    await fs.writeFile(path.join(tempDir, 'a.txt'), 'before');

    await expect(tool.readCurrent({ path: 'a.txt' })).resolves.toEqual({
      path: path.join(tempDir, 'a.txt'),
      content: 'before',
    });
    await expect(tool.readCurrent({ path: 'new.txt' })).resolves.toEqual({
      path: path.join(tempDir, 'new.txt'),
      content: '',
    });
  });
});
