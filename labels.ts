import type { Duration, IssueItem, LabelEvent, LabelStats, MetricRecord } from './types.ts';
import { measureStateDuration } from './intervals.ts';
import { summarizeDurations } from './stats.ts';

/**
 * Get the label events of an issue that concern one of the given labels
 */
export function getLabelEvents(item: IssueItem, labels: string[]): LabelEvent[] {
  return item.labelEvents.filter(event => labels.includes(event.label));
}

/**
 * Calculate how long each label of interest was applied to an issue.
 * Labels that were never applied map to null.
 */
export function getLabelMetrics(
  item: IssueItem,
  labels: string[],
  now: Date = new Date()
): Record<string, Duration | null> {
  const events = getLabelEvents(item, labels);
  const metrics: Record<string, Duration | null> = {};

  for (const label of labels) {
    const transitions = events
      .filter(event => event.label === label)
      .map(event => ({ entered: event.kind === 'applied', at: event.createdAt }));

    metrics[label] = measureStateDuration(transitions, {
      createdAt: item.createdAt,
      closedAt: item.state === 'closed' ? item.closedAt : null,
      now,
      ignoreAfterClose: true,
      activeAtCreation: false,
      openIntervalOnClosedItem: 'close-at-closure',
    });
  }

  return metrics;
}

/**
 * Summarize time spent in each label across items. A label without any
 * measured duration gets no entry.
 */
export function getStatsTimeInLabels(records: MetricRecord[]): LabelStats {
  const durationsByLabel = new Map<string, Duration[]>();

  for (const record of records) {
    if (!record.labelMetrics) continue;

    for (const [label, duration] of Object.entries(record.labelMetrics)) {
      if (duration === null) continue;
      const durations = durationsByLabel.get(label) ?? [];
      durations.push(duration);
      durationsByLabel.set(label, durations);
    }
  }

  const stats: LabelStats = { avg: {}, med: {}, p90: {} };
  for (const [label, durations] of durationsByLabel) {
    const summary = summarizeDurations(durations);
    if (!summary) continue;
    stats.avg[label] = summary.avg;
    stats.med[label] = summary.med;
    stats.p90[label] = summary.p90;
  }

  return stats;
}
