import type { Comment, Item } from './types.ts';

function countHumanComments(comments: Comment[], ignoreUsers: string[]): number {
  return comments.filter(c => !c.author.bot && !ignoreUsers.includes(c.author.login)).length;
}

/**
 * Count the conversation and review comments on a pull request, leaving out
 * bots and ignored users. Returns null for anything that is not a PR.
 */
export function countPrComments(item: Item, ignoreUsers: string[] = []): number | null {
  if (item.kind !== 'issue' || !item.pullRequest) return null;

  return (
    countHumanComments(item.comments, ignoreUsers) +
    countHumanComments(item.pullRequest.reviewComments, ignoreUsers)
  );
}
