import { logger as defaultLogger, Logger } from "../config/logger";
import { AggregationError } from "../domain/errors";
import {
  BucketTotal,
  ComponentTotal,
  DescriptiveStats,
  InteractionSummary,
  ReshapedTable,
  UserSummary,
} from "../domain/types";

export interface AggregateOptions {
  logger?: Logger;
}

export function describe(values: readonly number[]): DescriptiveStats {
  if (values.length === 0) return { status: "no-data" };
  let sum = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    sum += v;
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return { status: "ok", count: values.length, sum, mean: sum / values.length, min, max };
}

function validate(table: ReshapedTable): void {
  for (const row of table.rows) {
    const at = `row (${row.userId}, ${row.bucket})`;
    let sum = 0;
    for (const component of table.components) {
      if (!Object.hasOwn(row.counts, component)) {
        throw new AggregationError(`${at} has no value for component "${component}"`);
      }
      const value = row.counts[component];
      if (!Number.isInteger(value) || value < 0) {
        throw new AggregationError(`${at} has invalid count ${value} for "${component}"`);
      }
      sum += value;
    }
    if (sum !== row.total) {
      throw new AggregationError(`${at} total ${row.total} does not match its cells (${sum})`);
    }
  }
}

/**
 * Per-user, per-component and per-bucket totals over a reshaped table.
 * Statistics over an empty table are { status: "no-data" }.
 */
export function aggregate(table: ReshapedTable, options: AggregateOptions = {}): InteractionSummary {
  const { logger = defaultLogger } = options;
  validate(table);

  const users = new Map<string, { total: number; activeBuckets: number; byComponent: Record<string, number> }>();
  const componentTotals = new Map<string, number>(table.components.map((c) => [c, 0]));
  const bucketTotals = new Map<string, number>();
  let grandTotal = 0;

  for (const row of table.rows) {
    let user = users.get(row.userId);
    if (!user) {
      user = { total: 0, activeBuckets: 0, byComponent: Object.fromEntries(table.components.map((c) => [c, 0])) };
      users.set(row.userId, user);
    }
    user.total += row.total;
    if (row.total > 0) user.activeBuckets++;
    for (const component of table.components) {
      const value = row.counts[component];
      user.byComponent[component] += value;
      componentTotals.set(component, (componentTotals.get(component) ?? 0) + value);
    }
    bucketTotals.set(row.bucket, (bucketTotals.get(row.bucket) ?? 0) + row.total);
    grandTotal += row.total;
  }

  const userSummaries: UserSummary[] = [...users.entries()].map(([userId, u]) => ({ userId, ...u }));
  const components: ComponentTotal[] = table.components.map((componentName) => ({
    componentName,
    total: componentTotals.get(componentName) ?? 0,
  }));
  const buckets: BucketTotal[] = [...bucketTotals.entries()]
    .map(([bucket, total]) => ({ bucket, total }))
    .sort((a, b) => (a.bucket < b.bucket ? -1 : a.bucket > b.bucket ? 1 : 0));

  const summary: InteractionSummary = {
    users: userSummaries,
    components,
    buckets,
    grandTotal,
    rowStats: describe(table.rows.map((r) => r.total)),
    bucketStats: describe(buckets.map((b) => b.total)),
  };
  logger.info("aggregate:done", { users: userSummaries.length, grandTotal });
  return summary;
}

export default aggregate;
