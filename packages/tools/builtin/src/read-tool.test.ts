import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { ListFilesTool, ReadFileTool } from './read-tool.js';
import { PathValidator } from './path-validator.js';

describe('filesystem read tools', () => {
  let tempDir: string;
  let validator: PathValidator;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'crewroom-read-tool-'));
    validator = new PathValidator({ allowedPaths: [tempDir] });
    await fs.writeFile(path.join(tempDir, 'notes.txt'), 'first line\nsecond line');
    await fs.mkdir(path.join(tempDir, 'src'));
    await fs.writeFile(path.join(tempDir, 'src', 'main.ts'), 'export {};');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('ReadFileTool', () => {
    it('returns file contents for relative paths', async () => {
      const tool = new ReadFileTool({ validator });
      await expect(tool.execute({ path: 'notes.txt' })).resolves.toBe('first line\nsecond line');
    });

    it('reports missing files', async () => {
      const tool = new ReadFileTool({ validator });
      await expect(tool.execute({ path: 'missing.txt' })).resolves.toBe(
        "Error: File 'missing.txt' does not exist."
      );
    });

    it('refuses directories', async () => {
      const tool = new ReadFileTool({ validator });
      await expect(tool.execute({ path: 'src' })).resolves.toBe(
        "Error: 'src' is a directory, not a file."
      );
    });

    it('refuses files over the size limit', async () => {
      const tool = new ReadFileTool({ validator, maxFileSize: 5 });
      await expect(tool.execute({ path: 'notes.txt' })).resolves.toBe(
        "Error: File 'notes.txt' is too large (22 bytes, limit 5)."
      );
    });

    it('rejects paths that fail validation', async () => {
      const tool = new ReadFileTool({ validator });
      await expect(tool.execute({ path: '../escape.txt' })).resolves.toBe(
        'Error: Path traversal detected: ".." not allowed'
      );
    });

    it('requires a path', async () => {
      const tool = new ReadFileTool({ validator });
      await expect(tool.execute({})).resolves.toBe("Error: read_file requires a 'path' argument.");
    });
  });

  describe('ListFilesTool', () => {
    it('lists the workspace root by default, sorted, with directories marked', async () => {
      const tool = new ListFilesTool({ validator });
      await expect(tool.execute({})).resolves.toBe('notes.txt\nsrc/');
    });

    it('lists a subdirectory', async () => {
      const tool = new ListFilesTool({ validator });
      await expect(tool.execute({ path: 'src' })).resolves.toBe('main.ts');
    });

    it('reports empty directories', async () => {
      await fs.mkdir(path.join(tempDir, 'empty'));
      const tool = new ListFilesTool({ validator });
      await expect(tool.execute({ path: 'empty' })).resolves.toBe('Directory is empty.');
    });

    it('reports missing directories', async () => {
      const tool = new ListFilesTool({ validator });
      await expect(tool.execute({ path: 'nope' })).resolves.toBe(
        "Error: Directory 'nope' does not exist."
      );
    });

    it('refuses files', async () => {
      const tool = new ListFilesTool({ validator });
      await expect(tool.execute({ path: 'notes.txt' })).resolves.toBe(
        "Error: 'notes.txt' is not a directory."
      );
    });
  });
});
