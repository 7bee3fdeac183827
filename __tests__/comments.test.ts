import { describe, it, expect } from 'vitest';
import { countPrComments } from '../comments.ts';
import { comment, makeDiscussion, makeIssue, makePullRequest } from './helpers.ts';

describe('countPrComments', () => {
  it('returns null for a plain issue', () => {
    expect(countPrComments(makeIssue({ comments: [comment('helper', 1)] }))).toBeNull();
  });

  it('returns null for a discussion', () => {
    expect(countPrComments(makeDiscussion({ comments: [comment('helper', 1)] }))).toBeNull();
  });

  it('counts conversation and review comments from people', () => {
    const issue = makeIssue({
      comments: [comment('helper', 1), comment('ci-bot', 2, true), comment('ignored', 3)],
      pullRequest: makePullRequest({
        reviewComments: [comment('reviewer', 2), comment('lint-bot', 3, true)],
      }),
    });
    expect(countPrComments(issue, ['ignored'])).toBe(2);
  });

  it('returns zero for a pull request without comments', () => {
    expect(countPrComments(makeIssue({ pullRequest: makePullRequest() }))).toBe(0);
  });
});
