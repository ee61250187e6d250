import { classifyCommit, parseCommits } from '@/commit-classifier';
import { createCommit } from '@/tests/helpers/commits';
import { DEFAULT_COMMITS_CONFIG } from '@/utils/constants';
import { describe, expect, it } from 'vitest';

const BREAKING_PATTERN = /BREAKING[ -]CHANGE:/;

describe('commit-classifier', () => {
  describe('classifyCommit', () => {
    it('should classify a conventional commit', () => {
      const commit = createCommit('feat(api): add user endpoint');
      expect(classifyCommit(commit, BREAKING_PATTERN)).toEqual({
        isConventional: true,
        type: 'feat',
        scope: 'api',
        description: 'add user endpoint',
        isBreaking: false,
        commit,
      });
    });

    it('should keep the commit by identity', () => {
      const commit = createCommit('fix: patch');
      expect(classifyCommit(commit, BREAKING_PATTERN).commit).toBe(commit);
    });

    it('should use only the first line of the trimmed message as the header', () => {
      const commit = createCommit('\n\n  fix: handle nulls  \n\nLonger explanation\nover several lines');
      expect(classifyCommit(commit, BREAKING_PATTERN)).toMatchObject({
        isConventional: true,
        type: 'fix',
        description: 'handle nulls',
      });
    });

    it('should classify a non-conventional commit with the trimmed header as description', () => {
      const commit = createCommit('  Update README  \n\nsome body');
      expect(classifyCommit(commit, BREAKING_PATTERN)).toEqual({
        isConventional: false,
        type: null,
        scope: null,
        description: 'Update README',
        isBreaking: false,
        commit,
      });
    });

    it('should detect the breaking marker in the header', () => {
      expect(classifyCommit(createCommit('refactor!: rename options'), BREAKING_PATTERN).isBreaking).toBe(true);
    });

    it('should detect a breaking footer in the body', () => {
      const commit = createCommit('feat: new config format\n\nBREAKING CHANGE: the old format is gone');
      expect(classifyCommit(commit, BREAKING_PATTERN).isBreaking).toBe(true);
    });

    it('should detect a hyphenated breaking footer with CRLF line endings', () => {
      const commit = createCommit('fix: parser\r\n\r\nBREAKING-CHANGE: stricter input');
      expect(classifyCommit(commit, BREAKING_PATTERN).isBreaking).toBe(true);
    });

    it('should detect a breaking footer on a non-conventional commit', () => {
      const commit = createCommit('Rework storage\n\nBREAKING CHANGE: new schema');
      expect(classifyCommit(commit, BREAKING_PATTERN)).toMatchObject({
        isConventional: false,
        isBreaking: true,
      });
    });

    it('should not flag a lowercase mention as breaking', () => {
      const commit = createCommit('docs: explain what a breaking change: is');
      expect(classifyCommit(commit, BREAKING_PATTERN).isBreaking).toBe(false);
    });

    it('should honour a custom breaking pattern', () => {
      const commit = createCommit('chore: deps\n\n!!MAJOR!!');
      expect(classifyCommit(commit, /^!!MAJOR!!$/).isBreaking).toBe(true);
      expect(classifyCommit(commit, BREAKING_PATTERN).isBreaking).toBe(false);
    });

    it('should give the same answer for repeated calls with a global pattern', () => {
      const pattern = /BREAKING CHANGE:/g;
      const commit = createCommit('feat: x\n\nBREAKING CHANGE: y');
      expect(classifyCommit(commit, pattern).isBreaking).toBe(true);
      expect(classifyCommit(commit, pattern).isBreaking).toBe(true);
    });

    it('should not throw for an empty message', () => {
      expect(classifyCommit(createCommit(''), BREAKING_PATTERN)).toMatchObject({
        isConventional: false,
        description: '',
        isBreaking: false,
      });
    });
  });

  describe('parseCommits', () => {
    it('should classify every commit in order', () => {
      const commits = [createCommit('fix: a'), createCommit('random'), createCommit('feat: b')];
      const result = parseCommits(commits, DEFAULT_COMMITS_CONFIG);
      expect(result.map(({ commit }) => commit)).toEqual(commits);
      expect(result.map(({ type }) => type)).toEqual(['fix', null, 'feat']);
    });

    it('should keep only commits whose scope matches the scope pattern', () => {
      const commits = [
        createCommit('feat(api): a'),
        createCommit('feat(api-v2): b'),
        createCommit('fix(web): c'),
        createCommit('fix: d'),
        createCommit('not conventional'),
        createCommit('chore(my-api): e'),
      ];
      const result = parseCommits(commits, { ...DEFAULT_COMMITS_CONFIG, scopePattern: 'api' });
      expect(result.map(({ description }) => description)).toEqual(['a', 'b']);
    });

    it('should anchor the scope pattern at the start of the scope only', () => {
      const commits = [createCommit('feat(core): a'), createCommit('feat(core-utils): b'), createCommit('fix(ui): c')];
      const result = parseCommits(commits, { ...DEFAULT_COMMITS_CONFIG, scopePattern: 'core|ui' });
      expect(result.map(({ description }) => description)).toEqual(['a', 'b', 'c']);
    });

    it('should use the configured breaking pattern', () => {
      const commits = [createCommit('fix: a\n\nMAJOR: yes')];
      expect(parseCommits(commits, { ...DEFAULT_COMMITS_CONFIG, breakingPattern: '^MAJOR:' })[0].isBreaking).toBe(
        true,
      );
    });

    it('should return an empty array for no commits', () => {
      expect(parseCommits([], DEFAULT_COMMITS_CONFIG)).toEqual([]);
    });
  });
});
