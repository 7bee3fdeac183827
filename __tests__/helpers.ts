import type {
  Comment,
  DiscussionItem,
  IssueItem,
  MetricsOptions,
  OutputOptions,
  PullRequestDetails,
  Review,
  UserRef,
} from '../types.ts';
import { days } from '../utils.ts';

export const T0 = new Date('2024-01-01T00:00:00Z');

export function at(dayOffset: number): Date {
  return new Date(T0.getTime() + days(dayOffset));
}

export function user(login: string, bot = false): UserRef {
  return { login, bot };
}

export function comment(login: string, dayOffset: number, bot = false): Comment {
  return { author: user(login, bot), createdAt: at(dayOffset) };
}

export function review(login: string, dayOffset: number | null): Review {
  return { author: user(login), submittedAt: dayOffset === null ? null : at(dayOffset) };
}

export function makeIssue(overrides: Partial<IssueItem> = {}): IssueItem {
  return {
    kind: 'issue',
    title: 'Test issue',
    url: 'https://github.com/octo-org/octo-repo/issues/1',
    author: user('author'),
    assignee: null,
    assignees: [],
    createdAt: T0,
    closedAt: null,
    state: 'open',
    labelEvents: [],
    comments: [],
    pullRequest: null,
    ...overrides,
  };
}

export function makePullRequest(overrides: Partial<PullRequestDetails> = {}): PullRequestDetails {
  return {
    draft: false,
    mergedAt: null,
    draftEvents: [],
    reviews: [],
    reviewComments: [],
    ...overrides,
  };
}

export function makeDiscussion(overrides: Partial<DiscussionItem> = {}): DiscussionItem {
  return {
    kind: 'discussion',
    title: 'Test discussion',
    url: 'https://github.com/octo-org/octo-repo/discussions/1',
    author: user('author'),
    createdAt: T0,
    closedAt: null,
    answerChosenAt: null,
    comments: [],
    ...overrides,
  };
}

export function makeOptions(overrides: Partial<MetricsOptions> = {}): MetricsOptions {
  return {
    ignoreUsers: [],
    labelsToMeasure: [],
    enableMentorCount: false,
    minMentorComments: 10,
    maxCommentsEval: 20,
    heavilyInvolvedCutoff: 3,
    firstResponseWindow: 50,
    draftPrTracking: false,
    hideTimeToFirstResponse: false,
    hideTimeToClose: false,
    hideTimeToAnswer: false,
    hideLabelMetrics: false,
    ...overrides,
  };
}

export function makeOutputOptions(overrides: Partial<OutputOptions> = {}): OutputOptions {
  return {
    reportTitle: 'Issue Metrics',
    outputFile: 'issue_metrics.md',
    hideAuthor: false,
    hideAssignee: false,
    hideCreatedAt: true,
    hideItemsClosedCount: false,
    hidePrStatistics: false,
    nonMentioningLinks: false,
    ...overrides,
  };
}
