/**
 * Document discovery tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { collectDocuments } from '../../src/lib/discovery';
import type { Logger } from '../../src/types';

// Directories named "locked" fail to list, as an unreadable directory would
jest.mock('fs', () => {
  const actual = jest.requireActual<typeof import('fs')>('fs');
  return {
    ...actual,
    readdirSync: (...args: Parameters<typeof actual.readdirSync>) => {
      const dir = String(args[0]);
      if (dir.endsWith('locked')) {
        throw Object.assign(new Error(`EACCES: permission denied, scandir '${dir}'`), { code: 'EACCES' });
      }
      return actual.readdirSync(...args);
    },
  };
});

function recordingLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = [];
  return {
    warnings,
    info: jest.fn(),
    warn: (message: string) => warnings.push(message),
    error: jest.fn(),
  };
}

const OPTIONS = { patterns: ['**/*.md'], ignore: ['**/node_modules/**', '**/.git/**'] };

describe('collectDocuments', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'concept-graph-docs-'));
    const files = [
      'zeta.md',
      'alpha.md',
      'notes.txt',
      'posts/2024/first.md',
      'posts/draft.markdown',
      'node_modules/pkg/readme.md',
      '.git/info.md',
    ];
    for (const file of files) {
      fs.mkdirSync(path.dirname(path.join(root, file)), { recursive: true });
      fs.writeFileSync(path.join(root, file), '# doc\n');
    }
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('should collect matching files recursively in sorted order', () => {
    expect(collectDocuments(root, OPTIONS)).toEqual([
      path.join(root, 'alpha.md'),
      path.join(root, 'posts/2024/first.md'),
      path.join(root, 'zeta.md'),
    ]);
  });

  it('should honour custom include patterns', () => {
    const files = collectDocuments(root, { patterns: ['**/*.txt', 'posts/*.markdown'], ignore: [] });

    expect(files).toEqual([path.join(root, 'notes.txt'), path.join(root, 'posts/draft.markdown')]);
  });

  it('should apply ignore patterns to files', () => {
    const files = collectDocuments(root, { patterns: ['**/*.md'], ignore: ['**/node_modules/**', 'posts/**', 'zeta.md'] });

    expect(files).toEqual([path.join(root, 'alpha.md')]);
  });

  it('should include files in ignored-by-default directories when ignore is empty', () => {
    const files = collectDocuments(root, { patterns: ['**/*.md'], ignore: [] });

    expect(files).toContain(path.join(root, 'node_modules/pkg/readme.md'));
  });

  it('should warn and return nothing for a missing root', () => {
    const logger = recordingLogger();
    const missing = path.join(root, 'missing');

    expect(collectDocuments(missing, OPTIONS, logger)).toEqual([]);
    expect(logger.warnings).toEqual([`Document root ${missing} does not exist`]);
  });

  it('should skip unreadable directories with a warning', () => {
    const locked = path.join(root, 'locked');
    fs.mkdirSync(locked);
    fs.writeFileSync(path.join(locked, 'hidden.md'), '# hidden\n');
    const logger = recordingLogger();

    expect(collectDocuments(root, OPTIONS, logger)).toEqual([
      path.join(root, 'alpha.md'),
      path.join(root, 'posts/2024/first.md'),
      path.join(root, 'zeta.md'),
    ]);
    expect(logger.warnings).toEqual([
      `Skipping directory ${locked}: EACCES: permission denied, scandir '${locked}'`,
    ]);
  });

  it('should accept a single matching file as the root', () => {
    const file = path.join(root, 'alpha.md');

    expect(collectDocuments(file, OPTIONS)).toEqual([file]);
    expect(collectDocuments(path.join(root, 'notes.txt'), OPTIONS)).toEqual([]);
  });
});
