import type { Duration, Item, MetricsOptions, UserRef } from './types.ts';
import { durationBetween } from './utils.ts';

/**
 * Check if a comment or review should not count as a response: left by the
 * item's author, a bot or an ignored user, never submitted, or written before
 * the item was ready for review.
 */
export function ignoreComment(
  itemAuthor: UserRef,
  commentAuthor: UserRef,
  ignoreUsers: string[],
  createdAt: Date | null,
  readyForReviewAt: Date | null
): boolean {
  return (
    ignoreUsers.includes(commentAuthor.login) ||
    commentAuthor.bot ||
    commentAuthor.login === itemAuthor.login ||
    createdAt === null ||
    (readyForReviewAt !== null && createdAt < readyForReviewAt)
  );
}

function earliest(dates: Date[]): Date | null {
  if (dates.length === 0) return null;
  return dates.reduce((min, curr) => (curr < min ? curr : min));
}

/**
 * Measure the time from creation (or from ready-for-review, for a PR that was
 * a draft) until the first comment or review from someone other than the
 * author. Only the first `firstResponseWindow` comments and reviews are looked at.
 */
export function measureTimeToFirstResponse(
  item: Item,
  options: Pick<MetricsOptions, 'ignoreUsers' | 'firstResponseWindow'>,
  readyForReviewAt: Date | null = null
): Duration | null {
  const window = options.firstResponseWindow;

  const responses: Date[] = [];
  for (const comment of item.comments.slice(0, window)) {
    if (ignoreComment(item.author, comment.author, options.ignoreUsers, comment.createdAt, readyForReviewAt)) {
      continue;
    }
    responses.push(comment.createdAt);
  }

  if (item.kind === 'issue' && item.pullRequest) {
    for (const review of item.pullRequest.reviews.slice(0, window)) {
      if (
        review.submittedAt === null ||
        ignoreComment(item.author, review.author, options.ignoreUsers, review.submittedAt, readyForReviewAt)
      ) {
        continue;
      }
      responses.push(review.submittedAt);
    }
  }

  const firstResponse = earliest(responses);
  if (!firstResponse) return null;

  return durationBetween(readyForReviewAt ?? item.createdAt, firstResponse);
}
