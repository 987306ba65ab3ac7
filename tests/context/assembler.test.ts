import { describe, it, expect } from 'vitest';
import { ContextAssembler, buildTrendReport, contextSha } from '../../engine/context/assembler.js';
import type { ContextSettings } from '../../engine/context/assembler.js';
import {
  ContextTooLargeError,
  ContextUnavailableError,
  RequestCancelledError,
  SourceUnavailableError,
  UpstreamTimeoutError,
} from '../../engine/errors.js';
import type { ContextBundle, TrendStatistics, Turn } from '../../engine/types.js';
import { FakeSourceClient, REPO, makeCommit, makeConfig, makeDiff } from '../helpers/fakes.js';

// ─── Helpers ─────────────────────────────────────────────────────────────────

function makeAssembler(source: FakeSourceClient, overrides: Partial<ContextSettings> = {}): ContextAssembler {
  return new ContextAssembler(source, makeConfig({ context: overrides }).context);
}

function labels(bundle: ContextBundle): string[] {
  return bundle.segments.map(segment => segment.label);
}

function segmentText(bundle: ContextBundle, label: string): string | undefined {
  return bundle.segments.find(segment => segment.label === label)?.text;
}

function commitSource(): FakeSourceClient {
  return new FakeSourceClient({
    commits: [makeCommit({ sha: 'abc1234def', message: 'Fix cache\n\nDetails' })],
    diffs: { abc1234def: makeDiff('src/a.ts') },
  });
}

// ─── Commit Review ───────────────────────────────────────────────────────────

describe('ContextAssembler — commit', () => {
  it('builds a header and diff segment', async () => {
    const bundle = await makeAssembler(commitSource()).assemble({ kind: 'commit', repo: REPO, sha: 'abc1234def' });

    expect(bundle.task).toBe('commit-review');
    expect(labels(bundle)).toEqual(['Commit', 'Diff']);
    expect(segmentText(bundle, 'Commit')).toBe(
      'Repository: octo/widgets\nCommit: abc1234def\nAuthor: dev\nDate: 2024-05-01T10:00:00Z\nFiles changed: 0\n\nFix cache\n\nDetails',
    );
    expect(segmentText(bundle, 'Diff')).toBe(makeDiff('src/a.ts'));
    expect(bundle.droppedItems).toEqual([]);
    expect(bundle.tokenEstimate).toBeLessThanOrEqual(bundle.budget);
  });

  it('produces identical bundles for the same target', async () => {
    const assembler = makeAssembler(commitSource());
    const first = await assembler.assemble({ kind: 'commit', repo: REPO, sha: 'abc1234def' });
    const second = await assembler.assemble({ kind: 'commit', repo: REPO, sha: 'abc1234def' });
    expect(second).toEqual(first);
  });

  it('notes a commit without textual changes', async () => {
    const source = new FakeSourceClient({ commits: [makeCommit({ sha: 'empty01' })], diffs: { empty01: '' } });
    const bundle = await makeAssembler(source).assemble({ kind: 'commit', repo: REPO, sha: 'empty01' });

    expect(bundle.segments[1]).toEqual({ kind: 'note', label: 'Diff', text: 'No textual changes.' });
  });

  it('drops low-priority files to fit a small budget', async () => {
    const lockLines = Array.from({ length: 400 }, (_, i) => `dep-${i}@1.0.0`);
    const source = new FakeSourceClient({
      commits: [makeCommit({ sha: 'abc1234' })],
      diffs: { abc1234: [makeDiff('yarn.lock', lockLines), makeDiff('src/a.ts')].join('\n') },
    });
    const bundle = await makeAssembler(source, { tokenBudget: 300 }).assemble({ kind: 'commit', repo: REPO, sha: 'abc1234' });

    expect(bundle.droppedItems).toEqual(['file:yarn.lock']);
    expect(segmentText(bundle, 'Diff')).toBe(
      `${makeDiff('src/a.ts')}\n[omitted 1 file(s) to fit the context budget: yarn.lock]`,
    );
    expect(bundle.tokenEstimate).toBeLessThanOrEqual(300);
  });

  it('keeps the leading part of a single file too large for the budget', async () => {
    const rows = Array.from({ length: 3000 }, (_, i) => `export const row${i} = '${'x'.repeat(24)}';`);
    const source = new FakeSourceClient({
      commits: [makeCommit({ sha: 'abc1234' })],
      diffs: { abc1234: makeDiff('src/table.ts', rows) },
    });
    const bundle = await makeAssembler(source).assemble({ kind: 'commit', repo: REPO, sha: 'abc1234' });

    expect(bundle.droppedItems).toHaveLength(1);
    expect(bundle.droppedItems[0]).toMatch(/^lines:src\/table\.ts:\d+$/);
    expect(segmentText(bundle, 'Diff')?.startsWith(
      [
        'diff --git a/src/table.ts b/src/table.ts',
        'index 1111111..2222222 100644',
        '--- a/src/table.ts',
        '+++ b/src/table.ts',
        '@@ -1,0 +1,3000 @@',
        `+export const row0 = '${'x'.repeat(24)}';`,
      ].join('\n'),
    )).toBe(true);
    expect(segmentText(bundle, 'Diff')).toMatch(/\n\[\.\.\. \d+ more line\(s\) truncated\]$/);
    expect(bundle.tokenEstimate).toBeLessThanOrEqual(bundle.budget);
  });

  it('throws ContextTooLargeError when the header alone exceeds the budget', async () => {
    await expect(
      makeAssembler(commitSource(), { tokenBudget: 10 }).assemble({ kind: 'commit', repo: REPO, sha: 'abc1234def' }),
    ).rejects.toBeInstanceOf(ContextTooLargeError);
  });

  it('wraps fetch failures in ContextUnavailableError', async () => {
    const error = await makeAssembler(commitSource())
      .assemble({ kind: 'commit', repo: REPO, sha: 'missing' })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ContextUnavailableError);
    expect(error).toMatchObject({ kind: 'ContextUnavailable' });
  });

  it('lets upstream timeouts through unchanged', async () => {
    const source = commitSource();
    source.failWith = call => (call.startsWith('getCommitDiff') ? new UpstreamTimeoutError('GitHub getCommitDiff', 100) : undefined);

    await expect(
      makeAssembler(source).assemble({ kind: 'commit', repo: REPO, sha: 'abc1234def' }),
    ).rejects.toBeInstanceOf(UpstreamTimeoutError);
  });
});

// ─── Pull Request Review ─────────────────────────────────────────────────────

describe('ContextAssembler — pull request', () => {
  it('builds a header from the pull request and its diff', async () => {
    const summary = { number: 7, title: 'Add cache', body: '', headSha: 'head123', headRef: 'feature', baseRef: 'main', author: 'mona' };
    const source = new FakeSourceClient({ pulls: { 7: { summary, diff: makeDiff('src/cache.ts') } } });

    const bundle = await makeAssembler(source).assemble({ kind: 'pull-request', repo: REPO, number: 7 });

    expect(bundle.task).toBe('pull-request-review');
    expect(labels(bundle)).toEqual(['Pull request', 'Diff']);
    expect(segmentText(bundle, 'Pull request')).toBe(
      'Repository: octo/widgets\nPull request: #7 Add cache\nAuthor: mona\nBranches: feature -> main\nHead: head123',
    );
  });

  it('reports a missing pull request as ContextUnavailableError', async () => {
    await expect(
      makeAssembler(new FakeSourceClient()).assemble({ kind: 'pull-request', repo: REPO, number: 99 }),
    ).rejects.toBeInstanceOf(ContextUnavailableError);
  });
});

// ─── Overview ────────────────────────────────────────────────────────────────

describe('ContextAssembler — overview', () => {
  it('combines metadata, recent commits, the top-level tree and the README', async () => {
    const source = new FakeSourceClient({
      commits: [makeCommit({ sha: 'aaaaaaa111', message: 'Add widgets\n\nbody', date: '2024-05-02T09:00:00Z' })],
    });
    const bundle = await makeAssembler(source).assemble({ kind: 'overview', repo: REPO });

    expect(bundle.task).toBe('overview');
    expect(labels(bundle)).toEqual(['Task', 'Repository', 'Top-level tree', 'README', 'Recent commits']);
    expect(segmentText(bundle, 'Repository')).toBe(
      'Name: octo/widgets\nDescription: Widget toolkit\nDefault branch: main\nPrimary language: TypeScript\nStars: 42',
    );
    expect(segmentText(bundle, 'Recent commits')).toBe('aaaaaaa 2024-05-02 dev: Add widgets');
    expect(segmentText(bundle, 'Top-level tree')).toBe('README.md\nsrc/');
    expect(segmentText(bundle, 'README')).toBe('# Widgets\n\nA toolkit.');
    expect(source.calls).toContain('listCommits:20');
    expect(source.calls).toContain('getFileTree:main');
  });

  it('leaves out the README when the repository has none', async () => {
    const bundle = await makeAssembler(new FakeSourceClient({ readme: null })).assemble({ kind: 'overview', repo: REPO });

    expect(labels(bundle)).toEqual(['Task', 'Repository', 'Top-level tree']);
    expect(bundle.droppedItems).toEqual([]);
  });
});

// ─── Chat ────────────────────────────────────────────────────────────────────

describe('ContextAssembler — chat', () => {
  const history: Turn[] = [
    { role: 'user', text: 'Earlier question', timestamp: '2024-05-01T10:00:00.000Z' },
    { role: 'assistant', text: 'Earlier answer', timestamp: '2024-05-01T10:00:01.000Z' },
  ];

  it('answers repository questions against the overview', async () => {
    const source = new FakeSourceClient({ commits: [makeCommit({ sha: 'aaaaaaa111' })] });
    const bundle = await makeAssembler(source).assemble({
      kind: 'chat',
      repo: REPO,
      target: { mode: 'repository' },
      question: 'What does this do?',
      history,
    });

    expect(bundle.task).toBe('chat-answer');
    expect(labels(bundle)).toEqual([
      'Conversation',
      'Repository',
      'Top-level tree',
      'README',
      'Recent commits',
      'Conversation so far',
      'Question',
    ]);
    expect(segmentText(bundle, 'Conversation')).toBe('Repository: octo/widgets\nMode: repository');
    expect(segmentText(bundle, 'Conversation so far')).toBe('User: Earlier question\nAssistant: Earlier answer');
    expect(segmentText(bundle, 'Question')).toBe('What does this do?');
  });

  it('includes previous versions of modified source files, read at the first parent', async () => {
    const diff = [
      makeDiff('src/a.ts', ['new a'], ['old a']),
      makeDiff('yarn.lock', ['dep@2'], ['dep@1']),
      'diff --git a/src/new.ts b/src/new.ts\nnew file mode 100644\n--- /dev/null\n+++ b/src/new.ts\n@@ -0,0 +1 @@\n+x',
    ].join('\n');
    const source = new FakeSourceClient({
      commits: [makeCommit({ sha: 'abc1234', parents: ['parent1234', 'other999'] })],
      diffs: { abc1234: diff },
      files: { 'parent1234:src/a.ts': 'old a\n' },
    });

    const bundle = await makeAssembler(source).assemble({
      kind: 'chat',
      repo: REPO,
      target: { mode: 'commit', sha: 'abc1234' },
      question: 'Why?',
      history: [],
    });

    expect(labels(bundle)).toEqual(['Conversation', 'Diff', 'src/a.ts before parent1', 'Question']);
    expect(segmentText(bundle, 'src/a.ts before parent1')).toBe('old a\n');
    expect(source.calls.filter(call => call.startsWith('getFileContent'))).toEqual(['getFileContent:parent1234:src/a.ts']);
  });

  it('limits how many previous files are fetched', async () => {
    const source = new FakeSourceClient({
      commits: [makeCommit({ sha: 'abc1234', parents: ['parent1234'] })],
      diffs: { abc1234: [makeDiff('src/b.ts'), makeDiff('src/a.ts')].join('\n') },
      files: { 'parent1234:src/a.ts': 'a', 'parent1234:src/b.ts': 'b' },
    });

    const bundle = await makeAssembler(source, { maxPreviousFiles: 1 }).assemble({
      kind: 'chat',
      repo: REPO,
      target: { mode: 'commit', sha: 'abc1234' },
      question: 'Why?',
      history: [],
    });

    expect(labels(bundle)).toContain('src/a.ts before parent1');
    expect(labels(bundle)).not.toContain('src/b.ts before parent1');
  });

  it('skips previous files that cannot be fetched', async () => {
    const source = new FakeSourceClient({
      commits: [makeCommit({ sha: 'abc1234', parents: ['parent1234'] })],
      diffs: { abc1234: makeDiff('src/a.ts') },
    });
    source.failWith = call => (call.startsWith('getFileContent') ? new SourceUnavailableError('GitHub down') : undefined);

    const bundle = await makeAssembler(source).assemble({
      kind: 'chat',
      repo: REPO,
      target: { mode: 'commit', sha: 'abc1234' },
      question: 'Why?',
      history: [],
    });

    expect(labels(bundle)).toEqual(['Conversation', 'Diff', 'Question']);
    expect(bundle.droppedItems).toEqual(['previous-file:src/a.ts']);
  });

  it('propagates cancellation while fetching previous files', async () => {
    const source = new FakeSourceClient({
      commits: [makeCommit({ sha: 'abc1234', parents: ['parent1234'] })],
      diffs: { abc1234: makeDiff('src/a.ts') },
    });
    source.failWith = call => (call.startsWith('getFileContent') ? new RequestCancelledError() : undefined);

    await expect(
      makeAssembler(source).assemble({
        kind: 'chat',
        repo: REPO,
        target: { mode: 'commit', sha: 'abc1234' },
        question: 'Why?',
        history: [],
      }),
    ).rejects.toBeInstanceOf(RequestCancelledError);
  });

  it('evaluates a hypothetical commit in place of the persisted what-if anchor', async () => {
    const source = new FakeSourceClient({
      commits: [makeCommit({ sha: 'deadbeef' }), makeCommit({ sha: 'cafe1234', message: 'Try another approach' })],
      diffs: { deadbeef: makeDiff('src/a.ts'), cafe1234: makeDiff('src/b.ts') },
    });

    const bundle = await makeAssembler(source).assemble({
      kind: 'chat',
      repo: REPO,
      target: { mode: 'what-if', sha: 'deadbeef', hypotheticalSha: 'cafe1234' },
      question: 'Would this break the API?',
      history: [],
    });

    expect(segmentText(bundle, 'Conversation')).toBe([
      'Repository: octo/widgets',
      'Mode: what-if',
      'Persisted commit: deadbeef',
      'Evaluating hypothetical commit: cafe1234',
      'Commit: cafe1234',
      'Author: dev',
      'Date: 2024-05-01T10:00:00Z',
      'Files changed: 0',
      '',
      'Try another approach',
    ].join('\n'));
    expect(segmentText(bundle, 'Diff')).toBe(makeDiff('src/b.ts'));
    expect(source.calls).not.toContain('getCommit:deadbeef');
  });

  it('uses the anchor itself when no hypothetical is given', async () => {
    const source = new FakeSourceClient({
      commits: [makeCommit({ sha: 'deadbeef' })],
      diffs: { deadbeef: makeDiff('src/a.ts') },
    });

    const bundle = await makeAssembler(source).assemble({
      kind: 'chat',
      repo: REPO,
      target: { mode: 'what-if', sha: 'deadbeef' },
      question: 'What if?',
      history: [],
    });

    expect(segmentText(bundle, 'Conversation')).toMatch(/^Repository: octo\/widgets\nMode: what-if\nCommit: deadbeef\n/);
  });
});

// ─── Pure Builders ───────────────────────────────────────────────────────────

// ─── Tech Debt ───────────────────────────────────────────────────────────────

describe('ContextAssembler — tech debt', () => {
  const activity = {
    modules: [{ name: 'src', count: 5 }],
    files: [
      { name: 'src/big.ts', count: 3 },
      { name: 'package-lock.json', count: 2 },
      { name: 'src/small.ts', count: 1 },
    ],
  };

  it('caps each hotspot file and skips lock files', async () => {
    const source = new FakeSourceClient({
      files: { 'head999:src/big.ts': 'x'.repeat(6_000), 'head999:src/small.ts': 'export {};' },
    });

    const bundle = await makeAssembler(source).assemble({ kind: 'tech-debt', repo: REPO, ref: 'head999', activity });

    expect(bundle.task).toBe('tech-debt');
    expect(labels(bundle)).toEqual(['Task', 'Change activity', 'src/big.ts at head999', 'src/small.ts at head999']);
    expect(segmentText(bundle, 'Task')).toBe('Repository: octo/widgets\nAt commit: head999');
    expect(segmentText(bundle, 'Change activity')).toBe(
      'Most active modules:\n- src: 5\n\nMost changed files:\n- src/big.ts: 3\n- package-lock.json: 2\n- src/small.ts: 1',
    );
    expect(segmentText(bundle, 'src/big.ts at head999')).toBe(`${'x'.repeat(5_000)}\n[... truncated 1000 chars]`);
    expect(source.countCalls('getFileContent:head999:package-lock.json')).toBe(0);
    expect(bundle.droppedItems).toEqual([]);
  });

  it('notes a window without file changes', async () => {
    const source = new FakeSourceClient();
    const bundle = await makeAssembler(source).assemble({
      kind: 'tech-debt',
      repo: REPO,
      ref: 'head999',
      activity: { modules: [], files: [] },
    });

    expect(labels(bundle)).toEqual(['Task', 'Hotspots']);
    expect(segmentText(bundle, 'Hotspots')).toBe('No file changes were found in the analysed commits.');
    expect(source.calls).toEqual([]);
  });
});

describe('buildTrendReport', () => {
  const stats: TrendStatistics = {
    repository: 'octo/widgets',
    windowSize: 2,
    commits: [
      { sha: 'aaaaaaa111', subject: 'Add widgets', category: 'feature' },
      { sha: 'bbbbbbb222', subject: 'Tweak', category: 'unclassified' },
    ],
    categories: { feature: 1, fix: 0, perf: 0, refactor: 0, docs: 0, test: 0, other: 0 },
    classified: 1,
    unclassified: 1,
    activity: { modules: [], files: [] },
  };

  it('renders statistics and a categorized commit list', () => {
    const bundle = buildTrendReport(REPO, stats, 2000);

    expect(bundle.task).toBe('trend-report');
    expect(labels(bundle)).toEqual(['Task', 'Statistics', 'Commits']);
    expect(segmentText(bundle, 'Commits')).toBe('aaaaaaa [feature] Add widgets\nbbbbbbb [unclassified] Tweak');
  });

  it('drops commit lines that do not fit', () => {
    const bundle = buildTrendReport(REPO, stats, 65);

    expect(bundle.droppedItems).toEqual(['commits:1']);
    expect(segmentText(bundle, 'Commits')).toBe('aaaaaaa [feature] Add widgets');
  });
});

describe('contextSha', () => {
  it('prefers the hypothetical sha in what-if mode', () => {
    expect(contextSha({ mode: 'what-if', sha: 'deadbeef', hypotheticalSha: 'cafe1234' })).toBe('cafe1234');
    expect(contextSha({ mode: 'what-if', sha: 'deadbeef' })).toBe('deadbeef');
    expect(contextSha({ mode: 'commit', sha: 'abc1234' })).toBe('abc1234');
  });
});
