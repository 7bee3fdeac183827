import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { generateJson, generateMarkdown, getColumns, jsonPathFor, writeReports } from '../output.ts';
import type { MetricRecord, MetricsReport } from '../types.ts';
import { days } from '../utils.ts';
import { at, makeOptions, makeOutputOptions } from './helpers.ts';

function makeRecord(overrides: Partial<MetricRecord> = {}): MetricRecord {
  return {
    title: 'Fix a | b',
    url: 'https://github.com/octo-org/octo-repo/issues/1',
    author: 'bob',
    assignee: 'alice',
    assignees: ['alice'],
    createdAt: at(0),
    timeToFirstResponse: days(1),
    timeToClose: null,
    timeToAnswer: null,
    timeInDraft: null,
    labelMetrics: null,
    mentorActivity: null,
    prCommentCount: null,
    ...overrides,
  };
}

function makeReport(overrides: Partial<MetricsReport> = {}): MetricsReport {
  return {
    items: [makeRecord()],
    numItemsOpened: 1,
    numItemsClosed: 0,
    timeToFirstResponse: { avg: days(1), med: days(1), p90: days(1) },
    timeToClose: null,
    timeToAnswer: null,
    timeInDraft: null,
    timeInLabels: { avg: {}, med: {}, p90: {} },
    prComments: null,
    mentorCount: null,
    searchQuery: 'repo:octo-org/octo-repo is:issue',
    ...overrides,
  };
}

const config = { metrics: makeOptions(), output: makeOutputOptions() };

describe('generateMarkdown', () => {
  it('reports an empty search', () => {
    expect(generateMarkdown(makeReport({ items: [], numItemsOpened: 0 }), config)).toBe(
      '# Issue Metrics\n\n' +
      'no issues found for the given search criteria\n\n' +
      'Search query used to find these items: `repo:octo-org/octo-repo is:issue`\n'
    );
  });

  it('renders the statistics table', () => {
    const lines = generateMarkdown(makeReport(), config).split('\n');

    expect(lines[0]).toBe('# Issue Metrics');
    expect(lines).toContain('| Metric | Average | Median | 90th percentile |');
    expect(lines).toContain('| Time to first response | 1 day, 0:00:00 | 1 day, 0:00:00 | 1 day, 0:00:00 |');
    expect(lines).toContain('| Time to close | None | None | None |');
    expect(lines).toContain('| Time to answer | None | None | None |');
    expect(lines).toContain('| Number of comments per PR | None | None | None |');
  });

  it('renders the counts table', () => {
    const lines = generateMarkdown(makeReport(), config).split('\n');

    expect(lines).toContain('| Number of items that remain open | 1 |');
    expect(lines).toContain('| Number of items closed | 0 |');
    expect(lines).toContain('| Total number of items created | 1 |');
    expect(lines.some(line => line.startsWith('| Number of most active mentors'))).toBe(false);
  });

  it('renders one row per item with escaped titles and user links', () => {
    const lines = generateMarkdown(makeReport(), config).split('\n');

    expect(lines).toContain(
      '| Title | URL | Assignee | Author | Time to first response | Time to close | Time to answer | Number of PR comments |'
    );
    expect(lines).toContain(
      '| Fix a \\| b | https://github.com/octo-org/octo-repo/issues/1 | [alice](https://github.com/alice) | ' +
      '[bob](https://github.com/bob) | 1 day, 0:00:00 | None | None | None |'
    );
    expect(lines[lines.length - 2]).toBe('Search query used to find these items: `repo:octo-org/octo-repo is:issue`');
  });

  it('rewrites links so they do not mention anyone', () => {
    const lines = generateMarkdown(makeReport(), {
      metrics: makeOptions(),
      output: makeOutputOptions({ nonMentioningLinks: true }),
    }).split('\n');

    expect(lines).toContain(
      '| Fix a \\| b | https://www.github.com/octo-org/octo-repo/issues/1 | [alice](https://www.github.com/alice) | ' +
      '[bob](https://www.github.com/bob) | 1 day, 0:00:00 | None | None | None |'
    );
  });

  it('adds label, draft and mentor rows when configured', () => {
    const report = makeReport({
      timeInLabels: { avg: { bug: days(2) }, med: { bug: days(2) }, p90: { bug: days(3) } },
      timeInDraft: { avg: days(1), med: days(1), p90: days(1) },
      mentorCount: 2,
    });
    const lines = generateMarkdown(report, {
      metrics: makeOptions({ labelsToMeasure: ['bug', 'docs'], draftPrTracking: true }),
      output: makeOutputOptions(),
    }).split('\n');

    expect(lines).toContain('| Time in draft | 1 day, 0:00:00 | 1 day, 0:00:00 | 1 day, 0:00:00 |');
    expect(lines).toContain('| Time spent in bug | 2 days, 0:00:00 | 2 days, 0:00:00 | 3 days, 0:00:00 |');
    expect(lines).toContain('| Time spent in docs | None | None | None |');
    expect(lines).toContain('| Number of most active mentors | 2 |');
  });

  it('leaves out the closed count when hidden', () => {
    const lines = generateMarkdown(makeReport(), {
      metrics: makeOptions(),
      output: makeOutputOptions({ hideItemsClosedCount: true }),
    }).split('\n');
    expect(lines.some(line => line.startsWith('| Number of items closed'))).toBe(false);
  });
});

describe('getColumns', () => {
  it('follows the hide flags', () => {
    const columns = getColumns({
      metrics: makeOptions({ hideTimeToAnswer: true, hideTimeToClose: true, labelsToMeasure: ['bug'] }),
      output: makeOutputOptions({ hideAuthor: true, hideAssignee: true, hidePrStatistics: true, hideCreatedAt: false }),
    });

    expect(columns.map(column => column.header)).toEqual([
      'Title',
      'URL',
      'Time to first response',
      'Time spent in bug',
      'Created At',
    ]);
  });

  it('lists every assignee', () => {
    const columns = getColumns(config);
    const assignee = columns.find(column => column.header === 'Assignee');

    expect(assignee?.cell(makeRecord({ assignees: ['alice', 'carol'] }))).toBe(
      '[alice](https://github.com/alice), [carol](https://github.com/carol)'
    );
    expect(assignee?.cell(makeRecord({ assignee: null, assignees: [] }))).toBe('None');
  });
});

describe('generateJson', () => {
  it('formats statistics and items', () => {
    const report = makeReport({
      items: [makeRecord({ labelMetrics: { bug: days(2), docs: null }, prCommentCount: 4 })],
      timeInLabels: { avg: { bug: days(2) }, med: { bug: days(2) }, p90: { bug: days(2) } },
      prComments: { avg: 4, med: 4, p90: 4 },
    });
    const json = generateJson(report);

    expect(json.average_time_to_first_response).toBe('1 day, 0:00:00');
    expect(json.median_time_to_close).toBe('None');
    expect(json['90_percentile_time_in_draft']).toBe('None');
    expect(json.average_time_in_labels).toEqual({ bug: '2 days, 0:00:00' });
    expect(json.average_pr_comments).toBe(4);
    expect(json.num_items_opened).toBe(1);
    expect(json.num_items_closed).toBe(0);
    expect(json.num_mentor_count).toBeNull();
    expect(json.total_item_count).toBe(1);
    expect(json.search_query).toBe('repo:octo-org/octo-repo is:issue');
    expect(json.issues).toEqual([
      {
        title: 'Fix a | b',
        html_url: 'https://github.com/octo-org/octo-repo/issues/1',
        author: 'bob',
        assignee: 'alice',
        assignees: ['alice'],
        time_to_first_response: '1 day, 0:00:00',
        time_to_close: 'None',
        time_to_answer: 'None',
        time_in_draft: 'None',
        label_metrics: { bug: '2 days, 0:00:00', docs: 'None' },
        pr_comment_count: 4,
        created_at: '2024-01-01T00:00:00.000Z',
      },
    ]);
  });
});

describe('jsonPathFor', () => {
  it('swaps the Markdown extension', () => {
    expect(jsonPathFor('issue_metrics.md')).toBe('issue_metrics.json');
    expect(jsonPathFor('report')).toBe('report.json');
  });
});

describe('writeReports', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'issue-metrics-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes both reports and the workflow output', async () => {
    const report = makeReport();
    const outputFile = join(dir, 'report.md');
    const githubOutput = join(dir, 'github_output');

    const paths = await writeReports(
      report,
      { metrics: makeOptions(), output: makeOutputOptions({ outputFile }) },
      githubOutput
    );

    expect(paths).toEqual({ markdownPath: outputFile, jsonPath: join(dir, 'report.json') });
    expect(await readFile(outputFile, 'utf8')).toBe(generateMarkdown(report, config));
    expect(JSON.parse(await readFile(paths.jsonPath, 'utf8'))).toEqual(generateJson(report));
    expect(await readFile(githubOutput, 'utf8')).toBe(`metrics=${JSON.stringify(generateJson(report))}\n`);
  });
});
