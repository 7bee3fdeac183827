import type { DraftEvent, Duration, IssueItem, PullRequestDetails } from './types.ts';
import { measureStateDuration } from './intervals.ts';

function sortDraftEvents(events: DraftEvent[]): DraftEvent[] {
  return [...events].sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
}

/**
 * If a pull request was a draft and is not one anymore, get the time it was
 * first marked ready for review
 */
export function getTimeToReadyForReview(pullRequest: PullRequestDetails): Date | null {
  if (pullRequest.draft) return null;

  const event = sortDraftEvents(pullRequest.draftEvents).find(e => e.kind === 'ready_for_review');
  return event ? event.createdAt : null;
}

/**
 * Total time a pull request spent in draft. A PR whose history starts with
 * ready_for_review was opened as a draft. Events after closure are dropped.
 * Still-open drafts are measured up to now; a closed PR that never left draft
 * gives null.
 */
export function measureTimeInDraft(
  item: IssueItem,
  pullRequest: PullRequestDetails,
  now: Date = new Date()
): Duration | null {
  const events = sortDraftEvents(pullRequest.draftEvents);

  const createdAsDraft = events.length > 0
    ? events[0].kind === 'ready_for_review'
    : pullRequest.draft;

  return measureStateDuration(
    events.map(event => ({ entered: event.kind === 'converted_to_draft', at: event.createdAt })),
    {
      createdAt: item.createdAt,
      closedAt: item.state === 'closed' ? item.closedAt : null,
      now,
      ignoreAfterClose: true,
      activeAtCreation: createdAsDraft,
      openIntervalOnClosedItem: 'unknown',
    }
  );
}
