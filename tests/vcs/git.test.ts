import fs from 'fs';
import os from 'os';
import path from 'path';
import { VcsError } from '../../src/graph/errors';
import { GitRepository, parseCommitRange, validateGitRef } from '../../src/vcs/git';

const mockRaw = jest.fn<Promise<string>, [string[]]>();

jest.mock('simple-git', () => ({
  __esModule: true,
  default: jest.fn(() => ({
    raw: (args: string[]) => mockRaw(args),
  })),
}));

function respondWith(responses: Record<string, string | Error>): void {
  mockRaw.mockImplementation(async args => {
    const response = responses[args.join(' ')];
    if (response === undefined) {
      throw new Error(`unexpected git ${args.join(' ')}`);
    }
    if (response instanceof Error) {
      throw response;
    }
    return response;
  });
}

describe('parseCommitRange', () => {
  it('should split three-dot and two-dot ranges', () => {
    expect(parseCommitRange('main...feature')).toEqual({ from: 'main', to: 'feature', isRange: true });
    expect(parseCommitRange('v1..v2')).toEqual({ from: 'v1', to: 'v2', isRange: true });
  });

  it('should treat anything else as a single commit', () => {
    expect(parseCommitRange('HEAD~2')).toEqual({ to: 'HEAD~2', isRange: false });
  });
});

describe('validateGitRef', () => {
  it('should reject empty and option-like revisions', () => {
    expect(() => validateGitRef(' ')).toThrow('Git revision must not be empty');
    expect(() => validateGitRef('--all')).toThrow(new VcsError('Invalid git revision: --all'));
    expect(() => validateGitRef('HEAD')).not.toThrow();
  });
});

describe('GitRepository', () => {
  let repository: GitRepository;

  beforeEach(() => {
    mockRaw.mockReset();
    repository = new GitRepository('/repo');
  });

  it('should cache the repository root', async () => {
    respondWith({ 'rev-parse --show-toplevel': '/repo\n' });

    expect(await repository.root()).toBe('/repo');
    expect(await repository.root()).toBe('/repo');
    expect(mockRaw).toHaveBeenCalledTimes(1);
  });

  it('should list files changed by a commit as sorted absolute paths', async () => {
    respondWith({
      'rev-parse --show-toplevel': '/repo\n',
      'diff-tree --no-commit-id --name-only -r --root --diff-filter=d abc123': 'src/b.ts\nsrc/a.ts\n\n',
    });

    expect(await repository.commitFiles('abc123')).toEqual(['/repo/src/a.ts', '/repo/src/b.ts']);
  });

  it('should list uncommitted files without deleted ones', async () => {
    respondWith({
      'rev-parse --show-toplevel': '/repo\n',
      'status --porcelain --untracked-files=all': ' M src/a.ts\n D src/gone.ts\n?? src/new.ts\nR  old.ts -> src/renamed.ts\n',
    });

    expect(await repository.uncommittedFiles()).toEqual([
      '/repo/src/a.ts',
      '/repo/src/new.ts',
      '/repo/src/renamed.ts',
    ]);
  });

  it('should list every file of a revision tree', async () => {
    respondWith({
      'rev-parse --show-toplevel': '/repo\n',
      'ls-tree -r --name-only HEAD': 'README.md\nsrc/a.ts\n',
    });

    expect(await repository.treeFiles('HEAD')).toEqual(['/repo/README.md', '/repo/src/a.ts']);
  });

  it('should report whether the working tree has changes', async () => {
    respondWith({ 'status --porcelain': '' });

    expect(await repository.hasUncommittedChanges()).toBe(false);
  });

  it('should label a range with short hashes', async () => {
    respondWith({
      'rev-parse --short v1': 'aaaaaaa\n',
      'rev-parse --short v2': 'bbbbbbb\n',
    });

    expect(await repository.rangeLabel('v1', 'v2')).toBe('aaaaaaa...bbbbbbb');
  });

  it('should combine numstat and name-status for a commit', async () => {
    respondWith({
      'rev-parse --show-toplevel': '/repo\n',
      'show --numstat --format= abc123': '3\t1\tsrc/a.ts\n10\t0\tsrc/new.ts\n-\t-\timg.png\n',
      'show --name-status --format= abc123': 'M\tsrc/a.ts\nA\tsrc/new.ts\nM\timg.png\n',
    });

    const stats = await repository.commitStats('abc123');

    expect(stats.get('/repo/src/a.ts')).toEqual({ additions: 3, deletions: 1, isNew: false });
    expect(stats.get('/repo/src/new.ts')).toEqual({ additions: 10, deletions: 0, isNew: true });
    expect(stats.get('/repo/img.png')).toEqual({ additions: 0, deletions: 0, isNew: false });
  });

  it('should only treat added files as new across a range', async () => {
    respondWith({
      'rev-parse --show-toplevel': '/repo\n',
      'diff --numstat v1 v2': '5\t0\tx.ts\n1\t1\t{old.ts => new.ts}\n',
      'diff --name-status v1 v2': 'A\tx.ts\nR100\told.ts\tnew.ts\n',
    });

    const stats = await repository.commitRangeStats('v1', 'v2');

    expect(stats.get('/repo/x.ts')).toEqual({ additions: 5, deletions: 0, isNew: true });
    expect(stats.get('/repo/new.ts')).toEqual({ additions: 1, deletions: 1, isNew: false });
  });

  it('should count the lines of untracked files', async () => {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), 'depweave-git-'));
    fs.writeFileSync(path.join(root, 'new.ts'), 'a\nb\nc\n');
    respondWith({
      'rev-parse --show-toplevel': `${root}\n`,
      'diff --numstat HEAD': '2\t0\tsrc/a.ts\n',
      'status --porcelain --untracked-files=all': ' M src/a.ts\n?? new.ts\n',
    });

    try {
      const stats = await repository.uncommittedStats();

      expect(stats.get(path.join(root, 'src/a.ts'))).toEqual({ additions: 2, deletions: 0, isNew: false });
      expect(stats.get(path.join(root, 'new.ts'))).toEqual({ additions: 3, deletions: 0, isNew: true });
    } finally {
      fs.rmSync(root, { recursive: true, force: true });
    }
  });

  it('should reorder a range given newest first', async () => {
    respondWith({
      'merge-base new old': 'h_old\n',
      'merge-base old new': 'h_old\n',
      'rev-parse new': 'h_new\n',
      'rev-parse old': 'h_old\n',
    });

    expect(await repository.normalizeCommitRange('new', 'old')).toEqual({
      from: 'old',
      to: 'new',
      swapped: true,
    });
  });

  it('should keep a range that is already ordered', async () => {
    respondWith({
      'merge-base old new': 'h_old\n',
      'rev-parse old': 'h_old\n',
    });

    expect(await repository.normalizeCommitRange('old', 'new')).toEqual({
      from: 'old',
      to: 'new',
      swapped: false,
    });
  });

  it('should wrap git failures in VcsError', async () => {
    respondWith({ 'rev-parse --short nope': new Error('fatal: bad revision') });

    const result = repository.shortHash('nope');

    await expect(result).rejects.toBeInstanceOf(VcsError);
    await expect(result).rejects.toThrow('git rev-parse failed: fatal: bad revision');
  });

  it('should refuse option-like revisions without running git', async () => {
    await expect(repository.commitFiles('--output=x')).rejects.toBeInstanceOf(VcsError);
    expect(mockRaw).not.toHaveBeenCalled();
  });

  it('should refuse paths that climb out of the repository', async () => {
    await expect(repository.showFile('HEAD', '../secret')).rejects.toThrow('Invalid repository path: ../secret');
  });
});
