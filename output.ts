import { appendFile, writeFile } from 'node:fs/promises';
import type { Config, Duration, MetricRecord, MetricsReport, OutputOptions, StatSummary } from './types.ts';
import { formatDuration } from './utils.ts';

type ReportConfig = Pick<Config, 'metrics' | 'output'>;

interface Column {
  header: string;
  cell: (record: MetricRecord) => string;
}

const NO_ITEMS_MESSAGE = 'no issues found for the given search criteria';

function toLink(url: string, output: OutputOptions): string {
  return output.nonMentioningLinks ? url.replace(/^https:\/\/github\.com/, 'https://www.github.com') : url;
}

function userLink(login: string, output: OutputOptions): string {
  return `[${login}](${toLink(`https://github.com/${login}`, output)})`;
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

function formatAssignees(record: MetricRecord, output: OutputOptions): string {
  const logins = record.assignees.length > 0
    ? record.assignees
    : record.assignee ? [record.assignee] : [];

  if (logins.length === 0) return 'None';
  return logins.map(login => userLink(login, output)).join(', ');
}

function formatCount(value: number | null): string {
  return value === null ? 'None' : String(value);
}

function tableRow(cells: string[]): string {
  return `| ${cells.join(' | ')} |`;
}

function durationRow(name: string, stats: StatSummary | null): string {
  return tableRow([
    name,
    formatDuration(stats?.avg ?? null),
    formatDuration(stats?.med ?? null),
    formatDuration(stats?.p90 ?? null),
  ]);
}

/**
 * Per-item table columns, honouring the hide flags
 */
export function getColumns(config: ReportConfig): Column[] {
  const { metrics, output } = config;

  const columns: Column[] = [
    { header: 'Title', cell: record => escapeCell(record.title) },
    { header: 'URL', cell: record => toLink(record.url, output) },
  ];

  if (!output.hideAssignee) {
    columns.push({ header: 'Assignee', cell: record => formatAssignees(record, output) });
  }
  if (!output.hideAuthor) {
    columns.push({ header: 'Author', cell: record => userLink(record.author, output) });
  }
  if (!metrics.hideTimeToFirstResponse) {
    columns.push({ header: 'Time to first response', cell: record => formatDuration(record.timeToFirstResponse) });
  }
  if (!metrics.hideTimeToClose) {
    columns.push({ header: 'Time to close', cell: record => formatDuration(record.timeToClose) });
  }
  if (!metrics.hideTimeToAnswer) {
    columns.push({ header: 'Time to answer', cell: record => formatDuration(record.timeToAnswer) });
  }
  if (metrics.draftPrTracking) {
    columns.push({ header: 'Time in draft', cell: record => formatDuration(record.timeInDraft) });
  }
  if (!metrics.hideLabelMetrics) {
    for (const label of metrics.labelsToMeasure) {
      columns.push({
        header: `Time spent in ${label}`,
        cell: record => formatDuration(record.labelMetrics?.[label] ?? null),
      });
    }
  }
  if (!output.hidePrStatistics) {
    columns.push({ header: 'Number of PR comments', cell: record => formatCount(record.prCommentCount) });
  }
  if (!output.hideCreatedAt) {
    columns.push({ header: 'Created At', cell: record => record.createdAt.toISOString() });
  }

  return columns;
}

function statsTable(report: MetricsReport, config: ReportConfig): string[] {
  const { metrics, output } = config;
  const lines = [
    tableRow(['Metric', 'Average', 'Median', '90th percentile']),
    tableRow(['---', '---', '---', '---']),
  ];

  if (!metrics.hideTimeToFirstResponse) lines.push(durationRow('Time to first response', report.timeToFirstResponse));
  if (!metrics.hideTimeToClose) lines.push(durationRow('Time to close', report.timeToClose));
  if (!metrics.hideTimeToAnswer) lines.push(durationRow('Time to answer', report.timeToAnswer));
  if (metrics.draftPrTracking) lines.push(durationRow('Time in draft', report.timeInDraft));

  if (!metrics.hideLabelMetrics) {
    const { avg, med, p90 } = report.timeInLabels;
    for (const label of metrics.labelsToMeasure) {
      const known = label in avg;
      lines.push(durationRow(`Time spent in ${label}`, known ? { avg: avg[label], med: med[label], p90: p90[label] } : null));
    }
  }

  if (!output.hidePrStatistics) {
    const stats = report.prComments;
    lines.push(tableRow([
      'Number of comments per PR',
      formatCount(stats?.avg ?? null),
      formatCount(stats?.med ?? null),
      formatCount(stats?.p90 ?? null),
    ]));
  }

  // Only the header rows means nothing to show
  return lines.length > 2 ? lines : [];
}

function countsTable(report: MetricsReport, config: ReportConfig): string[] {
  const lines = [
    tableRow(['Metric', 'Count']),
    tableRow(['---', '---']),
    tableRow(['Number of items that remain open', String(report.numItemsOpened)]),
  ];

  if (!config.output.hideItemsClosedCount) {
    lines.push(tableRow(['Number of items closed', String(report.numItemsClosed)]));
  }
  if (report.mentorCount !== null) {
    lines.push(tableRow(['Number of most active mentors', String(report.mentorCount)]));
  }
  lines.push(tableRow(['Total number of items created', String(report.items.length)]));

  return lines;
}

/**
 * Render the Markdown report
 */
export function generateMarkdown(report: MetricsReport, config: ReportConfig): string {
  const lines = [`# ${config.output.reportTitle}`, ''];

  if (report.items.length === 0) {
    lines.push(NO_ITEMS_MESSAGE, '');
  } else {
    const stats = statsTable(report, config);
    if (stats.length > 0) lines.push(...stats, '');

    lines.push(...countsTable(report, config), '');

    const columns = getColumns(config);
    lines.push(tableRow(columns.map(column => column.header)));
    lines.push(tableRow(columns.map(() => '---')));
    for (const record of report.items) {
      lines.push(tableRow(columns.map(column => column.cell(record))));
    }
    lines.push('');
  }

  lines.push(`Search query used to find these items: \`${report.searchQuery}\``);
  return lines.join('\n') + '\n';
}

export interface JsonItem {
  title: string;
  html_url: string;
  author: string;
  assignee: string | null;
  assignees: string[];
  time_to_first_response: string;
  time_to_close: string;
  time_to_answer: string;
  time_in_draft: string;
  label_metrics: Record<string, string>;
  pr_comment_count: number | null;
  created_at: string;
}

export interface JsonReport {
  average_time_to_first_response: string;
  average_time_to_close: string;
  average_time_to_answer: string;
  average_time_in_draft: string;
  average_time_in_labels: Record<string, string>;
  median_time_to_first_response: string;
  median_time_to_close: string;
  median_time_to_answer: string;
  median_time_in_draft: string;
  median_time_in_labels: Record<string, string>;
  '90_percentile_time_to_first_response': string;
  '90_percentile_time_to_close': string;
  '90_percentile_time_to_answer': string;
  '90_percentile_time_in_draft': string;
  '90_percentile_time_in_labels': Record<string, string>;
  average_pr_comments: number | null;
  median_pr_comments: number | null;
  '90_percentile_pr_comments': number | null;
  num_items_opened: number;
  num_items_closed: number;
  num_mentor_count: number | null;
  total_item_count: number;
  issues: JsonItem[];
  search_query: string;
}

function formatLabelDurations(durations: Record<string, Duration | null>): Record<string, string> {
  const formatted: Record<string, string> = {};
  for (const [label, duration] of Object.entries(durations)) {
    formatted[label] = formatDuration(duration);
  }
  return formatted;
}

/**
 * Build the JSON document, durations rendered the same way as in Markdown
 */
export function generateJson(report: MetricsReport): JsonReport {
  const { timeToFirstResponse, timeToClose, timeToAnswer, timeInDraft, timeInLabels, prComments } = report;

  return {
    average_time_to_first_response: formatDuration(timeToFirstResponse?.avg ?? null),
    average_time_to_close: formatDuration(timeToClose?.avg ?? null),
    average_time_to_answer: formatDuration(timeToAnswer?.avg ?? null),
    average_time_in_draft: formatDuration(timeInDraft?.avg ?? null),
    average_time_in_labels: formatLabelDurations(timeInLabels.avg),
    median_time_to_first_response: formatDuration(timeToFirstResponse?.med ?? null),
    median_time_to_close: formatDuration(timeToClose?.med ?? null),
    median_time_to_answer: formatDuration(timeToAnswer?.med ?? null),
    median_time_in_draft: formatDuration(timeInDraft?.med ?? null),
    median_time_in_labels: formatLabelDurations(timeInLabels.med),
    '90_percentile_time_to_first_response': formatDuration(timeToFirstResponse?.p90 ?? null),
    '90_percentile_time_to_close': formatDuration(timeToClose?.p90 ?? null),
    '90_percentile_time_to_answer': formatDuration(timeToAnswer?.p90 ?? null),
    '90_percentile_time_in_draft': formatDuration(timeInDraft?.p90 ?? null),
    '90_percentile_time_in_labels': formatLabelDurations(timeInLabels.p90),
    average_pr_comments: prComments?.avg ?? null,
    median_pr_comments: prComments?.med ?? null,
    '90_percentile_pr_comments': prComments?.p90 ?? null,
    num_items_opened: report.numItemsOpened,
    num_items_closed: report.numItemsClosed,
    num_mentor_count: report.mentorCount,
    total_item_count: report.items.length,
    issues: report.items.map(record => ({
      title: record.title,
      html_url: record.url,
      author: record.author,
      assignee: record.assignee,
      assignees: record.assignees,
      time_to_first_response: formatDuration(record.timeToFirstResponse),
      time_to_close: formatDuration(record.timeToClose),
      time_to_answer: formatDuration(record.timeToAnswer),
      time_in_draft: formatDuration(record.timeInDraft),
      label_metrics: formatLabelDurations(record.labelMetrics ?? {}),
      pr_comment_count: record.prCommentCount,
      created_at: record.createdAt.toISOString(),
    })),
    search_query: report.searchQuery,
  };
}

export function jsonPathFor(markdownPath: string): string {
  return `${markdownPath.replace(/\.md$/i, '')}.json`;
}

/**
 * Write the Markdown and JSON reports. When running inside a workflow the
 * JSON is also exposed as the `metrics` step output.
 */
export async function writeReports(
  report: MetricsReport,
  config: ReportConfig,
  githubOutput: string | undefined = process.env.GITHUB_OUTPUT
): Promise<{ markdownPath: string; jsonPath: string }> {
  const markdownPath = config.output.outputFile;
  const jsonPath = jsonPathFor(markdownPath);
  const json = JSON.stringify(generateJson(report));

  await writeFile(markdownPath, generateMarkdown(report, config));
  await writeFile(jsonPath, json);

  if (githubOutput) {
    await appendFile(githubOutput, `metrics=${json}\n`);
  }

  return { markdownPath, jsonPath };
}

/**
 * Display the headline numbers in the console
 */
export function displayConsoleOutput(report: MetricsReport, config: ReportConfig): void {
  console.log('\n' + '='.repeat(80));
  console.log(config.output.reportTitle);
  console.log('='.repeat(80));
  console.log(`Search query: ${report.searchQuery}`);
  console.log('='.repeat(80));

  console.log('\n📊 ITEMS\n');
  console.log(`  Open: ${report.numItemsOpened}`);
  console.log(`  Closed: ${report.numItemsClosed}`);
  console.log(`  Total: ${report.items.length}`);
  if (report.mentorCount !== null) {
    console.log(`  Active mentors: ${report.mentorCount}`);
  }

  console.log('\n⏱️  AVERAGE TIMES\n');
  console.log(`  First response: ${formatDuration(report.timeToFirstResponse?.avg ?? null)}`);
  console.log(`  Close: ${formatDuration(report.timeToClose?.avg ?? null)}`);
  console.log(`  Answer: ${formatDuration(report.timeToAnswer?.avg ?? null)}`);
  if (config.metrics.draftPrTracking) {
    console.log(`  Draft: ${formatDuration(report.timeInDraft?.avg ?? null)}`);
  }

  console.log('\n' + '='.repeat(80));
}

/**
 * Display summary footer
 */
export function displaySummary(paths: { markdownPath: string; jsonPath: string }): void {
  console.log(`\n✅ Analysis complete!`);
  console.log(`📄 Markdown report saved to: ${paths.markdownPath}`);
  console.log(`📄 JSON report saved to: ${paths.jsonPath}\n`);
}
