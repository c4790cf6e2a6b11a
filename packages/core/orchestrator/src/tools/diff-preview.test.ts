import { describe, it, expect } from 'vitest';
import { createDiffPreview } from './diff-preview.js';

describe('createDiffPreview', () => {
  it('shows removed and added lines with file headers', () => {
    const lines = createDiffPreview('src/a.ts', 'keep\nold\n', 'keep\nnew\n').split('\n');

    expect(lines).toContain('--- a/src/a.ts');
    expect(lines).toContain('+++ b/src/a.ts');
    expect(lines).toContain(' keep');
    expect(lines).toContain('-old');
    expect(lines).toContain('+new');
  });

  it('treats a missing file as empty', () => {
    const lines = createDiffPreview('new.txt', '', 'hello\n').split('\n');

    expect(lines).toContain('+hello');
    expect(lines.some((line) => line.startsWith('-') && !line.startsWith('---'))).toBe(false);
  });

  it('returns nothing when the content is unchanged', () => {
    expect(createDiffPreview('a.txt', 'same\n', 'same\n')).toBe('');
  });
});
