import { z } from 'zod';
import type { Config } from './types.ts';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const emptyToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const flag = (defaultValue: boolean) =>
  z.preprocess(
    emptyToUndefined,
    z.string().optional().transform(value =>
      value === undefined ? defaultValue : value.trim().toLowerCase() === 'true'
    )
  );

const positiveInt = (defaultValue: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(defaultValue));

const list = z.preprocess(
  emptyToUndefined,
  z.string().optional().transform(value =>
    value === undefined ? [] : value.split(',').map(entry => entry.trim()).filter(Boolean)
  )
);

const EnvSchema = z.object({
  SEARCH_QUERY: z.string({ required_error: 'SEARCH_QUERY environment variable not set' })
    .trim()
    .min(1, 'SEARCH_QUERY environment variable not set'),
  GH_TOKEN: z.string({ required_error: 'GH_TOKEN environment variable not set' })
    .trim()
    .min(1, 'GH_TOKEN environment variable not set'),
  GH_ENTERPRISE_URL: z.preprocess(emptyToUndefined, z.string().trim().url().optional()),
  IGNORE_USERS: list,
  LABELS_TO_MEASURE: list,
  ENABLE_MENTOR_COUNT: flag(false),
  MIN_MENTOR_COMMENTS: positiveInt(10),
  MAX_COMMENTS_EVAL: positiveInt(20),
  HEAVILY_INVOLVED_CUTOFF: positiveInt(3),
  FIRST_RESPONSE_WINDOW: positiveInt(50),
  DRAFT_PR_TRACKING: flag(false),
  HIDE_AUTHOR: flag(false),
  HIDE_ASSIGNEE: flag(false),
  HIDE_TIME_TO_FIRST_RESPONSE: flag(false),
  HIDE_TIME_TO_CLOSE: flag(false),
  HIDE_TIME_TO_ANSWER: flag(false),
  HIDE_LABEL_METRICS: flag(false),
  HIDE_ITEMS_CLOSED_COUNT: flag(false),
  HIDE_PR_STATISTICS: flag(false),
  HIDE_CREATED_AT: flag(true),
  NON_MENTIONING_LINKS: flag(false),
  REPORT_TITLE: z.preprocess(emptyToUndefined, z.string().default('Issue Metrics')),
  OUTPUT_FILE: z.preprocess(emptyToUndefined, z.string().default('issue_metrics.md')),
  RATE_LIMIT_BYPASS: flag(false),
});

/**
 * Build the run configuration from environment variables.
 * A query given on the command line wins over SEARCH_QUERY.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  queryOverride: string | null = null
): Config {
  const parsed = EnvSchema.safeParse(queryOverride ? { ...env, SEARCH_QUERY: queryOverride } : env);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue.path.join('.');
    throw new ConfigError(
      issue.message.includes(variable) ? issue.message : `Invalid ${variable}: ${issue.message}`
    );
  }

  const vars = parsed.data;

  return {
    githubToken: vars.GH_TOKEN,
    enterpriseUrl: vars.GH_ENTERPRISE_URL ?? null,
    searchQuery: vars.SEARCH_QUERY,
    rateLimitBypass: vars.RATE_LIMIT_BYPASS,
    metrics: {
      ignoreUsers: vars.IGNORE_USERS,
      labelsToMeasure: vars.LABELS_TO_MEASURE,
      enableMentorCount: vars.ENABLE_MENTOR_COUNT,
      minMentorComments: vars.MIN_MENTOR_COMMENTS,
      maxCommentsEval: vars.MAX_COMMENTS_EVAL,
      heavilyInvolvedCutoff: vars.HEAVILY_INVOLVED_CUTOFF,
      firstResponseWindow: vars.FIRST_RESPONSE_WINDOW,
      draftPrTracking: vars.DRAFT_PR_TRACKING,
      hideTimeToFirstResponse: vars.HIDE_TIME_TO_FIRST_RESPONSE,
      hideTimeToClose: vars.HIDE_TIME_TO_CLOSE,
      hideTimeToAnswer: vars.HIDE_TIME_TO_ANSWER,
      hideLabelMetrics: vars.HIDE_LABEL_METRICS,
    },
    output: {
      reportTitle: vars.REPORT_TITLE,
      outputFile: vars.OUTPUT_FILE,
      hideAuthor: vars.HIDE_AUTHOR,
      hideAssignee: vars.HIDE_ASSIGNEE,
      hideCreatedAt: vars.HIDE_CREATED_AT,
      hideItemsClosedCount: vars.HIDE_ITEMS_CLOSED_COUNT,
      hidePrStatistics: vars.HIDE_PR_STATISTICS,
      nonMentioningLinks: vars.NON_MENTIONING_LINKS,
    },
  };
}
