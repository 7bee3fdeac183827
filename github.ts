import { Octokit, type RestEndpointMethodTypes } from '@octokit/rest';
import type {
  Comment,
  Config,
  DiscussionItem,
  DraftEvent,
  IssueItem,
  LabelEvent,
  PullRequestDetails,
  Review,
  UserRef,
} from './types.ts';
import { describeRepositories } from './search.ts';
import { sleep as defaultSleep } from './utils.ts';

export type SearchResult =
  RestEndpointMethodTypes['search']['issuesAndPullRequests']['response']['data']['items'][number];

interface RawUser {
  login: string;
  type?: string;
}

interface RawComment {
  user?: RawUser | null;
  created_at: string;
}

interface RawReview {
  user?: RawUser | null;
  submitted_at?: string | null;
}

interface RawIssueEvent {
  event: string;
  created_at: string;
  label?: { name: string | null } | null;
}

interface RawDiscussion {
  title: string;
  url: string;
  createdAt: string;
  closedAt: string | null;
  answerChosenAt: string | null;
  author: { login: string; __typename: string } | null;
  comments: {
    nodes: Array<{ createdAt: string; author: { login: string; __typename: string } | null }>;
  };
}

interface DiscussionSearchResponse {
  search: {
    nodes: Array<RawDiscussion | null>;
    pageInfo: { hasNextPage: boolean; endCursor: string | null };
  };
}

const SEARCH_LOW_WATER_MARK = 5;
const MAX_RATE_LIMIT_RETRIES = 5;
const RATE_LIMIT_SLEEP_SECONDS = 70;

const DISCUSSION_SEARCH = `
  query($searchQuery: String!, $cursor: String) {
    search(query: $searchQuery, type: DISCUSSION, first: 100, after: $cursor) {
      nodes {
        ... on Discussion {
          title
          url
          createdAt
          closedAt
          answerChosenAt
          author { login __typename }
          comments(first: 100) {
            nodes { createdAt author { login __typename } }
          }
        }
      }
      pageInfo { hasNextPage endCursor }
    }
  }
`;

/**
 * A failure talking to GitHub that should end the run, with a message meant
 * for the person running it
 */
export class GitHubApiError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'GitHubApiError';
  }
}

export function getStatusCode(error: unknown): number | undefined {
  if (error && typeof error === 'object' && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isRateLimitError(error: unknown): boolean {
  const status = getStatusCode(error);
  return status === 429 || (status === 403 && errorMessage(error).toLowerCase().includes('rate limit'));
}

/**
 * Turn a failed search into the message shown to the user
 */
export function describeSearchFailure(error: unknown, searchQuery: string): string {
  const repositories = describeRepositories(searchQuery);

  if (isRateLimitError(error)) {
    return 'GitHub API rate limit exceeded; wait for the limit to reset and try again.';
  }

  switch (getStatusCode(error)) {
    case 401:
      return 'Authentication failed; Check your API Token.';
    case 403:
      return `You do not have permission to view a repository from: '${repositories}'; Check your API Token.`;
    case 404:
      return `The repository could not be found; Check the repository owner and names: '${repositories}'`;
    case 422:
      return 'The search query is invalid; Check the search query.';
    default:
      return `There was a connection error; Check your internet connection or API Token. (${errorMessage(error)})`;
  }
}

export function toUserRef(user: RawUser | null | undefined): UserRef {
  if (!user) return { login: 'ghost', bot: false };
  return { login: user.login, bot: (user.type ?? '').toLowerCase() === 'bot' };
}

function toDate(value: string | null | undefined): Date | null {
  return value ? new Date(value) : null;
}

export function toComment(comment: RawComment): Comment {
  return { author: toUserRef(comment.user), createdAt: new Date(comment.created_at) };
}

export function toReview(review: RawReview): Review {
  return { author: toUserRef(review.user), submittedAt: toDate(review.submitted_at) };
}

export function toLabelEvents(events: RawIssueEvent[]): LabelEvent[] {
  const labelEvents: LabelEvent[] = [];
  for (const event of events) {
    if ((event.event === 'labeled' || event.event === 'unlabeled') && event.label?.name) {
      labelEvents.push({
        kind: event.event === 'labeled' ? 'applied' : 'removed',
        label: event.label.name,
        createdAt: new Date(event.created_at),
      });
    }
  }
  return labelEvents;
}

export function toDraftEvents(events: RawIssueEvent[]): DraftEvent[] {
  const draftEvents: DraftEvent[] = [];
  for (const event of events) {
    if (event.event === 'converted_to_draft' || event.event === 'ready_for_review') {
      draftEvents.push({ kind: event.event, createdAt: new Date(event.created_at) });
    }
  }
  return draftEvents;
}

export function toIssueItem(
  result: SearchResult,
  comments: RawComment[],
  events: RawIssueEvent[],
  pullRequest: PullRequestDetails | null
): IssueItem {
  const closed = result.state === 'closed';

  return {
    kind: 'issue',
    title: result.title,
    url: result.html_url,
    author: toUserRef(result.user),
    assignee: result.assignee?.login ?? null,
    assignees: (result.assignees ?? []).map(assignee => assignee.login),
    createdAt: new Date(result.created_at),
    closedAt: closed ? toDate(result.closed_at) : null,
    state: closed ? 'closed' : 'open',
    labelEvents: toLabelEvents(events),
    comments: comments.map(toComment),
    pullRequest,
  };
}

function toGraphqlUser(author: { login: string; __typename: string } | null): UserRef {
  return toUserRef(author ? { login: author.login, type: author.__typename } : null);
}

export function toDiscussionItem(discussion: RawDiscussion): DiscussionItem {
  return {
    kind: 'discussion',
    title: discussion.title,
    url: discussion.url,
    author: toGraphqlUser(discussion.author),
    createdAt: new Date(discussion.createdAt),
    closedAt: toDate(discussion.closedAt),
    answerChosenAt: toDate(discussion.answerChosenAt),
    comments: discussion.comments.nodes.map(comment => ({
      author: toGraphqlUser(comment.author),
      createdAt: new Date(comment.createdAt),
    })),
  };
}

/**
 * Split ".../repos/{owner}/{repo}" into owner and repo
 */
export function parseRepositoryUrl(repositoryUrl: string): { owner: string; repo: string } {
  const parts = repositoryUrl.split('/');
  return { owner: parts[parts.length - 2], repo: parts[parts.length - 1] };
}

export interface GitHubMetricsClientOptions {
  octokit?: Octokit;
  sleep?: (ms: number) => Promise<void>;
}

export class GitHubMetricsClient {
  private octokit: Octokit;
  private rateLimitBypass: boolean;
  private sleep: (ms: number) => Promise<void>;

  constructor(
    config: Pick<Config, 'githubToken' | 'enterpriseUrl' | 'rateLimitBypass'>,
    options: GitHubMetricsClientOptions = {}
  ) {
    this.octokit = options.octokit ?? new Octokit({
      auth: config.githubToken,
      ...(config.enterpriseUrl ? { baseUrl: `${config.enterpriseUrl.replace(/\/$/, '')}/api/v3` } : {}),
    });
    this.rateLimitBypass = config.rateLimitBypass;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Check and display API rate limit status
   */
  async checkRateLimit(): Promise<void> {
    try {
      const { data } = await this.octokit.rateLimit.get();
      const core = data.resources.core;
      const search = data.resources.search;

      console.log('\n⚡ GitHub API Rate Limit Status:');
      console.log(`  Core API: ${core.remaining}/${core.limit} requests remaining`);
      console.log(`  Search API: ${search.remaining}/${search.limit} requests remaining`);
      if (search.remaining < SEARCH_LOW_WATER_MARK) {
        const resetTime = new Date(search.reset * 1000);
        console.log(`    ⚠️  Low! Resets at ${resetTime.toLocaleTimeString()}`);
      }
    } catch (error) {
      console.warn(`  ⚠️  Could not fetch rate limit: ${errorMessage(error)}`);
    }
  }

  /**
   * Sleep while the search quota is below the low-water mark, backing off
   * exponentially, and give up after a bounded number of retries
   */
  private async waitForApiRefresh(remaining: number): Promise<void> {
    if (this.rateLimitBypass) return;

    let retries = 0;
    let sleepSeconds = RATE_LIMIT_SLEEP_SECONDS;
    let left = remaining;

    while (left < SEARCH_LOW_WATER_MARK) {
      if (retries >= MAX_RATE_LIMIT_RETRIES) {
        throw new GitHubApiError('Exceeded maximum retries for API rate limit');
      }

      console.warn(`⚠️  GitHub API rate limit low, waiting ${sleepSeconds} seconds to refresh.`);
      await this.sleep(sleepSeconds * 1000);
      sleepSeconds *= 2;
      retries++;

      const { data } = await this.octokit.rateLimit.get();
      left = data.resources.search.remaining;
    }
  }

  /**
   * Search for issues and pull requests, one page of 100 at a time
   */
  async searchItems(searchQuery: string): Promise<SearchResult[]> {
    console.log('Searching for issues...');
    const results: SearchResult[] = [];

    try {
      const pages = this.octokit.paginate.iterator('GET /search/issues', {
        q: searchQuery,
        per_page: 100,
      });

      for await (const page of pages) {
        for (const item of page.data) {
          console.log(`  ${item.title}`);
          results.push(item);
        }
        const remaining = Number(page.headers['x-ratelimit-remaining'] ?? SEARCH_LOW_WATER_MARK);
        await this.waitForApiRefresh(Number.isNaN(remaining) ? SEARCH_LOW_WATER_MARK : remaining);
      }
    } catch (error) {
      if (error instanceof GitHubApiError) throw error;
      throw new GitHubApiError(describeSearchFailure(error, searchQuery), getStatusCode(error));
    }

    console.log(`✓ Found ${results.length} items`);
    return results;
  }

  private async fetchPullRequest(
    owner: string,
    repo: string,
    pullNumber: number,
    events: RawIssueEvent[]
  ): Promise<PullRequestDetails> {
    const [{ data: pr }, reviews, reviewComments] = await Promise.all([
      this.octokit.pulls.get({ owner, repo, pull_number: pullNumber }),
      this.octokit.paginate(this.octokit.pulls.listReviews, {
        owner,
        repo,
        pull_number: pullNumber,
        per_page: 100,
      }),
      this.octokit.paginate(this.octokit.pulls.listReviewComments, {
        owner,
        repo,
        pull_number: pullNumber,
        per_page: 100,
        sort: 'created',
        direction: 'asc',
      }),
    ]);

    return {
      draft: pr.draft ?? false,
      mergedAt: toDate(pr.merged_at),
      draftEvents: toDraftEvents(events),
      reviews: reviews.map(toReview),
      reviewComments: reviewComments.map(toComment),
    };
  }

  /**
   * Fetch everything the metrics need for one search result. If the pull
   * request behind it cannot be resolved, the item is measured as a plain issue.
   */
  async fetchIssueItem(result: SearchResult): Promise<IssueItem> {
    const { owner, repo } = parseRepositoryUrl(result.repository_url);

    const [comments, events] = await Promise.all([
      this.octokit.paginate(this.octokit.issues.listComments, {
        owner,
        repo,
        issue_number: result.number,
        per_page: 100,
      }),
      this.octokit.paginate(this.octokit.issues.listEvents, {
        owner,
        repo,
        issue_number: result.number,
        per_page: 100,
      }),
    ]);

    let pullRequest: PullRequestDetails | null = null;
    if (result.pull_request) {
      try {
        pullRequest = await this.fetchPullRequest(owner, repo, result.number, events);
      } catch (error) {
        if (isRateLimitError(error)) throw error;
        console.warn(
          `⚠️  Could not load pull request details for ${result.html_url}, ` +
          `perhaps it involves a ghost user: ${errorMessage(error)}`
        );
      }
    }

    return toIssueItem(result, comments, events, pullRequest);
  }

  /**
   * Fetch all items a search matches, processed in parallel batches
   */
  async fetchIssueItems(results: SearchResult[]): Promise<IssueItem[]> {
    const BATCH_SIZE = 10;
    const items: IssueItem[] = [];

    for (let i = 0; i < results.length; i += BATCH_SIZE) {
      const batch = results.slice(i, i + BATCH_SIZE);
      items.push(...await Promise.all(batch.map(result => this.fetchIssueItem(result))));
    }

    console.log(`✓ Processed ${items.length} issues and pull requests`);
    return items;
  }

  /**
   * Search discussions through GraphQL, following the cursor to the end
   */
  async searchDiscussions(searchQuery: string): Promise<DiscussionItem[]> {
    console.log('Searching for discussions...');
    const query = searchQuery.replace('type:discussions', '').replace(/\s+/g, ' ').trim();
    const discussions: DiscussionItem[] = [];
    let cursor: string | null = null;

    try {
      do {
        const response: DiscussionSearchResponse = await this.octokit.graphql<DiscussionSearchResponse>(
          DISCUSSION_SEARCH,
          { searchQuery: query, cursor }
        );

        for (const node of response.search.nodes) {
          if (node) discussions.push(toDiscussionItem(node));
        }

        cursor = response.search.pageInfo.hasNextPage ? response.search.pageInfo.endCursor : null;
      } while (cursor);
    } catch (error) {
      throw new GitHubApiError(describeSearchFailure(error, searchQuery), getStatusCode(error));
    }

    console.log(`✓ Found ${discussions.length} discussions`);
    return discussions;
  }
}
