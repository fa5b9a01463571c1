import { logger as defaultLogger, Logger } from "../config/logger";
import { ReshapeError } from "../domain/errors";
import { compareIds } from "../domain/keys";
import { toBucket } from "../domain/time";
import { InteractionCount, MergedRecord, ReshapedRow, ReshapedTable, TimeGranularity } from "../domain/types";

export interface ReshapeOptions {
  granularity?: TimeGranularity;
  logger?: Logger;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Pivots merged records to one row per (user, bucket) with a count column
 * for every component seen; absent combinations are 0.
 */
export function reshape(records: readonly MergedRecord[], options: ReshapeOptions = {}): ReshapedTable {
  const { granularity = "month", logger = defaultLogger } = options;
  if (records.length === 0) {
    throw new ReshapeError("pivot has no rows: no merged records survived cleaning and joins");
  }

  const components = [...new Set(records.map((r) => r.componentName))].sort(compareText);
  const groups = new Map<string, { userId: string; bucket: string; counts: Map<string, number> }>();

  for (const record of records) {
    const bucket = toBucket(record.timestamp, granularity);
    const key = `${record.userId}\u0000${bucket}`;
    let group = groups.get(key);
    if (!group) {
      group = { userId: record.userId, bucket, counts: new Map() };
      groups.set(key, group);
    }
    group.counts.set(record.componentName, (group.counts.get(record.componentName) ?? 0) + 1);
  }

  const rows: ReshapedRow[] = [...groups.values()]
    .map(({ userId, bucket, counts }) => {
      const cells = Object.fromEntries(components.map((c) => [c, counts.get(c) ?? 0]));
      const total = components.reduce((sum, c) => sum + (counts.get(c) ?? 0), 0);
      return { userId, bucket, counts: cells, total };
    })
    .sort((a, b) => compareIds(a.userId, b.userId) || compareText(a.bucket, b.bucket));

  logger.info("reshape:done", { granularity, rows: rows.length, components: components.length });
  return { granularity, components, rows };
}

/** Long-form interaction counts grouped by user, component and bucket. */
export function countInteractions(
  records: readonly MergedRecord[],
  options: Pick<ReshapeOptions, "granularity"> = {}
): InteractionCount[] {
  const { granularity = "month" } = options;
  const counts = new Map<string, InteractionCount>();
  for (const record of records) {
    const bucket = toBucket(record.timestamp, granularity);
    const key = [record.userId, record.componentName, bucket].join("\u0000");
    const entry = counts.get(key);
    if (entry) entry.count++;
    else counts.set(key, { userId: record.userId, componentName: record.componentName, bucket, count: 1 });
  }
  return [...counts.values()].sort(
    (a, b) =>
      compareIds(a.userId, b.userId) ||
      compareText(a.componentName, b.componentName) ||
      compareText(a.bucket, b.bucket)
  );
}

export default reshape;
