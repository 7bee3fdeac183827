import type { DiscussionItem, Duration, IssueItem, Item, PullRequestDetails } from './types.ts';
import { durationBetween } from './utils.ts';

export function measureTimeToClose(item: Item): Duration | null {
  if (!item.closedAt) return null;
  if (item.kind === 'issue' && item.state !== 'closed') return null;

  return durationBetween(item.createdAt, item.closedAt);
}

/**
 * Measure the time to merge a pull request, counted from when it was marked
 * ready for review if it used to be a draft
 */
export function measureTimeToMerge(
  item: IssueItem,
  pullRequest: PullRequestDetails,
  readyForReviewAt: Date | null
): Duration | null {
  if (!pullRequest.mergedAt) return null;

  return durationBetween(readyForReviewAt ?? item.createdAt, pullRequest.mergedAt);
}

export function measureTimeToAnswer(discussion: DiscussionItem): Duration | null {
  if (!discussion.answerChosenAt) return null;

  return durationBetween(discussion.createdAt, discussion.answerChosenAt);
}
