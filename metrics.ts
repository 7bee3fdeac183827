import type { DiscussionItem, Duration, IssueItem, Item, MetricRecord, MetricsOptions, MetricsReport } from './types.ts';
import { getTimeToReadyForReview, measureTimeInDraft } from './draft.ts';
import { measureTimeToAnswer, measureTimeToClose, measureTimeToMerge } from './durations.ts';
import { getLabelMetrics, getStatsTimeInLabels } from './labels.ts';
import { countCommentsPerUser, getMentorCount } from './mentors.ts';
import { countPrComments } from './comments.ts';
import { measureTimeToFirstResponse } from './responses.ts';
import { getStatsFor, summarizeCounts } from './stats.ts';

export interface PerItemMetrics {
  records: MetricRecord[];
  numItemsOpened: number;
  numItemsClosed: number;
}

function emptyRecord(item: Item): MetricRecord {
  return {
    title: item.title,
    url: item.url,
    author: item.author.login,
    assignee: item.kind === 'issue' ? item.assignee : null,
    assignees: item.kind === 'issue' ? item.assignees : [],
    createdAt: item.createdAt,
    timeToFirstResponse: null,
    timeToClose: null,
    timeToAnswer: null,
    timeInDraft: null,
    labelMetrics: null,
    mentorActivity: null,
    prCommentCount: null,
  };
}

function discussionMetrics(item: DiscussionItem, options: MetricsOptions): MetricRecord {
  return {
    ...emptyRecord(item),
    timeToFirstResponse: options.hideTimeToFirstResponse ? null : measureTimeToFirstResponse(item, options),
    mentorActivity: options.enableMentorCount ? countCommentsPerUser(item, options) : null,
    timeToAnswer: options.hideTimeToAnswer ? null : measureTimeToAnswer(item),
    timeToClose: options.hideTimeToClose ? null : measureTimeToClose(item),
  };
}

function issueMetrics(item: IssueItem, options: MetricsOptions, now: Date): MetricRecord {
  const pullRequest = item.pullRequest;
  const readyForReviewAt = pullRequest ? getTimeToReadyForReview(pullRequest) : null;

  let timeToClose: Duration | null = null;
  if (!options.hideTimeToClose && item.state === 'closed') {
    timeToClose = pullRequest
      ? measureTimeToMerge(item, pullRequest, readyForReviewAt)
      : measureTimeToClose(item);
  }

  return {
    ...emptyRecord(item),
    timeInDraft: pullRequest && options.draftPrTracking ? measureTimeInDraft(item, pullRequest, now) : null,
    timeToFirstResponse: options.hideTimeToFirstResponse
      ? null
      : measureTimeToFirstResponse(item, options, readyForReviewAt),
    mentorActivity: options.enableMentorCount ? countCommentsPerUser(item, options, readyForReviewAt) : null,
    labelMetrics: options.labelsToMeasure.length > 0 && !options.hideLabelMetrics
      ? getLabelMetrics(item, options.labelsToMeasure, now)
      : null,
    timeToClose,
    prCommentCount: countPrComments(item, options.ignoreUsers),
  };
}

/**
 * Calculate the metrics of every item, and how many are open and closed
 */
export function getPerItemMetrics(
  items: Item[],
  options: MetricsOptions,
  now: Date = new Date()
): PerItemMetrics {
  const records: MetricRecord[] = [];
  let numItemsOpened = 0;
  let numItemsClosed = 0;

  for (const item of items) {
    records.push(item.kind === 'discussion' ? discussionMetrics(item, options) : issueMetrics(item, options, now));

    const closed = item.kind === 'discussion' ? item.closedAt !== null : item.state === 'closed';
    if (closed) {
      numItemsClosed++;
    } else {
      numItemsOpened++;
    }
  }

  return { records, numItemsOpened, numItemsClosed };
}

/**
 * Reduce per-item metrics to the report's summary statistics
 */
export function calculateOverallMetrics(
  perItem: PerItemMetrics,
  options: MetricsOptions,
  searchQuery: string
): MetricsReport {
  const { records } = perItem;

  return {
    items: records,
    numItemsOpened: perItem.numItemsOpened,
    numItemsClosed: perItem.numItemsClosed,
    timeToFirstResponse: getStatsFor(records, 'timeToFirstResponse'),
    timeToClose: getStatsFor(records, 'timeToClose'),
    timeToAnswer: getStatsFor(records, 'timeToAnswer'),
    timeInDraft: getStatsFor(records, 'timeInDraft'),
    timeInLabels: getStatsTimeInLabels(records),
    prComments: summarizeCounts(records.map(record => record.prCommentCount)),
    mentorCount: options.enableMentorCount ? getMentorCount(records, options.minMentorComments) : null,
    searchQuery,
  };
}
