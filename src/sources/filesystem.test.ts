import path from 'path';
import { makeTempDir, removeDir, writeFiles } from '../test/fixtures.js';
import {
  hasAllowedExtension,
  listProjectFiles,
  readCandidateFile,
  readTextFileWithin,
  truncateContent,
} from './filesystem.js';

describe('listProjectFiles', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir('fs-');
    await writeFiles(root, {
      'README.md': '# demo\n',
      '.env.example': 'KEY=value\n',
      'src/index.ts': 'export {};\n',
      'src/lib/deep/util.ts': 'export {};\n',
      'dist/index.js': '',
      '.git/config': '[core]\n',
      'packages/app/node_modules/pkg/index.js': '',
    });
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('lists files sorted, including dotfiles, pruning skipped directories at any depth', async () => {
    expect(await listProjectFiles(root)).toEqual([
      '.env.example',
      'README.md',
      'src/index.ts',
      'src/lib/deep/util.ts',
    ]);
  });

  it('limits recursion depth', async () => {
    expect(await listProjectFiles(root, { maxDepth: 2 })).toEqual(['.env.example', 'README.md', 'src/index.ts']);
  });
});

describe('readCandidateFile', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir('fs-read-');
    await writeFiles(root, {
      'ok.ts': 'const ok = true;\n',
      'yarn.lock': '# lock\n',
      'image.png': 'not really',
      'src/inner.py': 'pass\n',
    });
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('reads allowed text files', async () => {
    expect(await readCandidateFile(root, 'ok.ts')).toBe('const ok = true;\n');
  });

  it('rejects lock files, other extensions, directories and missing paths', async () => {
    expect(await readCandidateFile(root, 'yarn.lock')).toBeNull();
    expect(await readCandidateFile(root, 'image.png')).toBeNull();
    expect(await readCandidateFile(root, 'missing.ts')).toBeNull();
    expect(await readCandidateFile(root, 'src')).toBeNull();
  });

  it('rejects files over the byte cap', async () => {
    expect(await readCandidateFile(root, 'ok.ts', { maxFileBytes: 10 })).toBeNull();
  });

  it('checks the size before reading any text', async () => {
    expect(await readTextFileWithin(path.join(root, 'ok.ts'), 17)).toBe('const ok = true;\n');
    expect(await readTextFileWithin(path.join(root, 'ok.ts'), 16)).toBeNull();
    expect(await readTextFileWithin(path.join(root, 'src'), 1000)).toBeNull();
    expect(await readTextFileWithin(path.join(root, 'missing.ts'), 1000)).toBeNull();
  });
});

describe('hasAllowedExtension', () => {
  it('matches extensions case-insensitively', () => {
    expect(hasAllowedExtension('Main.TS')).toBe(true);
    expect(hasAllowedExtension('photo.jpg')).toBe(false);
    expect(hasAllowedExtension('Makefile')).toBe(false);
  });
});

describe('truncateContent', () => {
  it('leaves short content alone', () => {
    expect(truncateContent('abc', 3)).toBe('abc');
  });

  it('cuts long content and marks the cut', () => {
    expect(truncateContent('abcdef', 4)).toBe('abcd\n\n... [truncated]');
  });
});
