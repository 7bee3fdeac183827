/** Milliseconds */
export type Duration = number;

export interface UserRef {
  login: string;
  bot: boolean;
}

export interface Comment {
  author: UserRef;
  createdAt: Date;
}

export interface Review {
  author: UserRef;
  submittedAt: Date | null;  // null while the review is pending
}

export interface LabelEvent {
  kind: 'applied' | 'removed';
  label: string;
  createdAt: Date;
}

export interface DraftEvent {
  kind: 'converted_to_draft' | 'ready_for_review';
  createdAt: Date;
}

export interface PullRequestDetails {
  draft: boolean;
  mergedAt: Date | null;
  draftEvents: DraftEvent[];
  reviews: Review[];
  reviewComments: Comment[];
}

export interface IssueItem {
  kind: 'issue';
  title: string;
  url: string;
  author: UserRef;
  assignee: string | null;
  assignees: string[];
  createdAt: Date;
  closedAt: Date | null;
  state: 'open' | 'closed';
  labelEvents: LabelEvent[];
  comments: Comment[];
  pullRequest: PullRequestDetails | null;  // null for plain issues
}

export interface DiscussionItem {
  kind: 'discussion';
  title: string;
  url: string;
  author: UserRef;
  createdAt: Date;
  closedAt: Date | null;
  answerChosenAt: Date | null;
  comments: Comment[];
}

export type Item = IssueItem | DiscussionItem;

export interface MetricRecord {
  title: string;
  url: string;
  author: string;
  assignee: string | null;
  assignees: string[];
  createdAt: Date;
  timeToFirstResponse: Duration | null;
  timeToClose: Duration | null;
  timeToAnswer: Duration | null;
  timeInDraft: Duration | null;
  labelMetrics: Record<string, Duration | null> | null;
  mentorActivity: Record<string, number> | null;
  prCommentCount: number | null;
}

export interface StatSummary {
  avg: number;
  med: number;
  p90: number;
}

export interface LabelStats {
  avg: Record<string, Duration>;
  med: Record<string, Duration>;
  p90: Record<string, Duration>;
}

export interface MetricsReport {
  items: MetricRecord[];
  numItemsOpened: number;
  numItemsClosed: number;
  timeToFirstResponse: StatSummary | null;
  timeToClose: StatSummary | null;
  timeToAnswer: StatSummary | null;
  timeInDraft: StatSummary | null;
  timeInLabels: LabelStats;
  prComments: StatSummary | null;
  mentorCount: number | null;
  searchQuery: string;
}

/**
 * Knobs the metric functions read. Built once from the environment and passed
 * down explicitly.
 */
export interface MetricsOptions {
  ignoreUsers: string[];
  labelsToMeasure: string[];
  enableMentorCount: boolean;
  minMentorComments: number;
  maxCommentsEval: number;
  heavilyInvolvedCutoff: number;
  firstResponseWindow: number;
  draftPrTracking: boolean;
  hideTimeToFirstResponse: boolean;
  hideTimeToClose: boolean;
  hideTimeToAnswer: boolean;
  hideLabelMetrics: boolean;
}

export interface OutputOptions {
  reportTitle: string;
  outputFile: string;
  hideAuthor: boolean;
  hideAssignee: boolean;
  hideCreatedAt: boolean;
  hideItemsClosedCount: boolean;
  hidePrStatistics: boolean;
  nonMentioningLinks: boolean;
}

export interface Config {
  githubToken: string;
  enterpriseUrl: string | null;
  searchQuery: string;
  rateLimitBypass: boolean;
  metrics: MetricsOptions;
  output: OutputOptions;
}
