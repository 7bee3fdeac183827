/**
 * Mentor activity.
 *
 * A mentor is anyone who keeps showing up in other people's threads. Activity
 * is measured by comments and reviews, on the assumption that they are left
 * to help the author along. Only the first `maxCommentsEval` comments and
 * reviews of an item are sampled, so the counts are an approximation on very
 * long threads.
 */

import type { Item, MetricRecord, MetricsOptions } from './types.ts';
import { ignoreComment } from './responses.ts';

/**
 * Count the qualifying comments and reviews each user left on one item,
 * counting at most `heavilyInvolvedCutoff` per user
 */
export function countCommentsPerUser(
  item: Item,
  options: Pick<MetricsOptions, 'ignoreUsers' | 'maxCommentsEval' | 'heavilyInvolvedCutoff'>,
  readyForReviewAt: Date | null = null
): Record<string, number> {
  const mentorCount: Record<string, number> = {};

  const tally = (login: string) => {
    const current = mentorCount[login] ?? 0;
    if (current < options.heavilyInvolvedCutoff) {
      mentorCount[login] = current + 1;
    }
  };

  for (const comment of item.comments.slice(0, options.maxCommentsEval)) {
    if (ignoreComment(item.author, comment.author, options.ignoreUsers, comment.createdAt, readyForReviewAt)) {
      continue;
    }
    tally(comment.author.login);
  }

  if (item.kind === 'issue' && item.pullRequest) {
    for (const review of item.pullRequest.reviews.slice(0, options.maxCommentsEval)) {
      if (ignoreComment(item.author, review.author, options.ignoreUsers, review.submittedAt, readyForReviewAt)) {
        continue;
      }
      tally(review.author.login);
    }
  }

  return mentorCount;
}

/**
 * Count the users whose comments across all items reach the given minimum
 */
export function getMentorCount(records: MetricRecord[], minComments: number): number {
  const totals = new Map<string, number>();

  for (const record of records) {
    if (!record.mentorActivity) continue;
    for (const [login, count] of Object.entries(record.mentorActivity)) {
      totals.set(login, (totals.get(login) ?? 0) + count);
    }
  }

  let activeMentors = 0;
  for (const total of totals.values()) {
    if (total >= minComments) activeMentors++;
  }

  return activeMentors;
}
