import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, writeFileSync, rmSync } from 'fs';
import { dirname, join } from 'path';
import { tmpdir } from 'os';
import {
  formatSectionHeader,
  renderStack,
  stackPaths,
  writeStacks,
  formatStamp,
} from '../../../src/stack/index.js';
import { EmptySelectionError } from '../../../src/selection/index.js';

// Monday 19 October 2026, 14:47 local time
const NOW = new Date(2026, 9, 19, 14, 47);
const STAMP = 'MON-19-OCTOBER-2026-02-47-PM';

function write(root: string, relPath: string, content: string): void {
  const full = join(root, relPath);
  mkdirSync(dirname(full), { recursive: true });
  writeFileSync(full, content);
}

describe('formatStamp', () => {
  it('renders day, date, month, year and a 12-hour clock', () => {
    expect(formatStamp(NOW)).toBe(STAMP);
  });

  it('renders midnight as 12 AM and noon as 12 PM', () => {
    expect(formatStamp(new Date(2026, 0, 5, 0, 5))).toBe('MON-05-JANUARY-2026-12-05-AM');
    expect(formatStamp(new Date(2026, 2, 1, 12, 0))).toBe('SUN-01-MARCH-2026-12-00-PM');
  });
});

describe('formatSectionHeader', () => {
  it('wraps the path in horizontal rules', () => {
    expect(formatSectionHeader('routes/a.py')).toBe('\n\n---\n## routes/a.py\n---\n');
  });
});

describe('stack writer', () => {
  let fixture: string;

  beforeEach(() => {
    fixture = mkdtempSync(join(tmpdir(), 'codestack-writer-'));
    write(fixture, 'routes/a.py', 'print("a")\n');
    write(fixture, 'routes/b.py', 'print("b")');
    write(fixture, 'app.py', 'app = 1\n');
  });

  afterEach(() => {
    rmSync(fixture, { recursive: true, force: true });
  });

  describe('renderStack', () => {
    it('writes title, header and verbatim contents', () => {
      const result = renderStack('# T', fixture, ['routes/a.py', 'routes/b.py']);

      expect(result.document.toString('utf-8')).toBe(
        '# T\n' +
        '\n\n---\n## routes/a.py\n---\nprint("a")\n' +
        '\n\n---\n## routes/b.py\n---\nprint("b")'
      );
      expect(result.included).toEqual(['routes/a.py', 'routes/b.py']);
      expect(result.skipped).toEqual([]);
    });

    it('reports unreadable files and keeps going', () => {
      const result = renderStack('# T', fixture, ['gone.py', 'app.py']);

      expect(result.document.toString('utf-8')).toBe('# T\n\n\n---\n## app.py\n---\napp = 1\n');
      expect(result.included).toEqual(['app.py']);
      expect(result.skipped).toEqual([{ path: 'gone.py', reason: 'read-error' }]);
    });
  });

  describe('writeStacks', () => {
    it('writes both documents under code-stacks', () => {
      const result = writeStacks(
        fixture,
        { directoryFiles: ['routes/a.py'], rootFiles: ['app.py'] },
        { now: NOW }
      );

      expect(result.fullStackPath).toBe(join(fixture, 'code-stacks', 'full-code-stack', `code-stack-${STAMP}.md`));
      expect(result.rootStackPath).toBe(
        join(fixture, 'code-stacks', 'root-files-code-stack', `root-files-code-stack-${STAMP}.md`)
      );
      expect(result.fileCount).toBe(1);
      expect(result.rootFileCount).toBe(1);

      expect(readFileSync(result.fullStackPath, 'utf-8')).toBe(
        `# FULL CODE STACK (${STAMP})\n\n\n---\n## routes/a.py\n---\nprint("a")\n`
      );
      expect(readFileSync(result.rootStackPath, 'utf-8')).toBe(
        `# ROOT FILES CODE STACK (${STAMP})\n\n\n---\n## app.py\n---\napp = 1\n`
      );
    });

    it('writes a title-only document for an empty partition', () => {
      const result = writeStacks(fixture, { directoryFiles: ['routes/b.py'], rootFiles: [] }, { now: NOW });

      expect(readFileSync(result.rootStackPath, 'utf-8')).toBe(`# ROOT FILES CODE STACK (${STAMP})\n`);
      expect(result.rootFileCount).toBe(0);
    });

    it('copies non-UTF-8 bytes verbatim', () => {
      const latin1 = Buffer.from([0x63, 0x61, 0x66, 0xe9, 0x0a]);
      writeFileSync(join(fixture, 'latin1.py'), latin1);

      const result = writeStacks(fixture, { directoryFiles: [], rootFiles: ['latin1.py'] }, { now: NOW });

      const expected = Buffer.concat([
        Buffer.from(`# ROOT FILES CODE STACK (${STAMP})\n\n\n---\n## latin1.py\n---\n`, 'utf-8'),
        latin1,
      ]);
      expect(Buffer.compare(readFileSync(result.rootStackPath), expected)).toBe(0);
    });

    it('honours a custom output directory', () => {
      const result = writeStacks(fixture, { directoryFiles: [], rootFiles: ['app.py'] }, { outDir: 'out', now: NOW });

      expect(result.fullStackPath).toBe(stackPaths(fixture, STAMP, 'out').fullStackPath);
      expect(existsSync(join(fixture, 'out', 'root-files-code-stack'))).toBe(true);
    });

    it('collects skipped files from both documents', () => {
      const result = writeStacks(
        fixture,
        { directoryFiles: ['routes/gone.py', 'routes/a.py'], rootFiles: ['missing.py'] },
        { now: NOW }
      );

      expect(result.fileCount).toBe(1);
      expect(result.rootFileCount).toBe(0);
      expect(result.skipped).toEqual([
        { path: 'routes/gone.py', reason: 'read-error' },
        { path: 'missing.py', reason: 'read-error' },
      ]);
    });

    it('throws EmptySelectionError and writes nothing for an empty selection', () => {
      expect(() => writeStacks(fixture, { directoryFiles: [], rootFiles: [] }, { now: NOW }))
        .toThrow(EmptySelectionError);
      expect(existsSync(join(fixture, 'code-stacks'))).toBe(false);
    });
  });
});
