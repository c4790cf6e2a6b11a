import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { SearchTool } from './search-tool.js';
import { PathValidator } from './path-validator.js';

describe('SearchTool', () => {
  let tempDir: string;
  let validator: PathValidator;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'crewroom-search-tool-'));
    validator = new PathValidator({ allowedPaths: [tempDir] });

    await fs.mkdir(path.join(tempDir, 'src'));
    await fs.writeFile(path.join(tempDir, 'src', 'auth.ts'), 'import x;\n  function Login() {}\n');
    await fs.writeFile(path.join(tempDir, 'README.md'), '# Login flow\n');
    await fs.mkdir(path.join(tempDir, 'node_modules'));
    await fs.writeFile(path.join(tempDir, 'node_modules', 'dep.js'), 'login();\n');
    await fs.writeFile(path.join(tempDir, 'package.lock'), 'login\n');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('finds case-insensitive matches with file and line numbers', async () => {
    const tool = new SearchTool({ validator });

    await expect(tool.execute({ query: 'login' })).resolves.toBe(
      'README.md:1: # Login flow\nsrc/auth.ts:2: function Login() {}'
    );
  });

  it('restricts the search to a subdirectory', async () => {
    const tool = new SearchTool({ validator });

    await expect(tool.execute({ query: 'login', path: 'src' })).resolves.toBe(
      'src/auth.ts:2: function Login() {}'
    );
  });

  it('reports when nothing matches', async () => {
    const tool = new SearchTool({ validator });
    await expect(tool.execute({ query: 'logout' })).resolves.toBe("No results found for 'logout'.");
  });

  it('caps the number of results', async () => {
    await fs.writeFile(path.join(tempDir, 'many.txt'), 'login\nlogin\nlogin\n');
    const tool = new SearchTool({ validator, maxResults: 2 });

    await expect(tool.execute({ query: 'login' })).resolves.toBe(
      'README.md:1: # Login flow\nmany.txt:1: login\n... (more results found, please refine your search)'
    );
  });

  it('requires a query', async () => {
    const tool = new SearchTool({ validator });
    await expect(tool.execute({ query: '  ' })).resolves.toBe('Error: search requires a query.');
  });
});
