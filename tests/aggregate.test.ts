import assert from "node:assert/strict";
import { test } from "node:test";
import { AggregationError } from "../src/domain/errors";
import type { ReshapedTable } from "../src/domain/types";
import { aggregate, describe } from "../src/services/aggregate.service";
import { reshape } from "../src/services/reshape.service";
import { merged, noopLogger } from "./helpers/fixtures";

const records = [
  merged("1", "Quiz", "2024-01-05T09:00:00.000Z"),
  merged("1", "Quiz", "2024-01-20T09:00:00.000Z"),
  merged("1", "Forum", "2024-02-01T00:00:00.000Z"),
  merged("10", "Assignment", "2024-01-31T23:59:59.000Z"),
  merged("2", "Forum", "2024-01-15T00:00:00.000Z"),
];

test("aggregate totals interactions per user, component and bucket", () => {
  const summary = aggregate(reshape(records, { logger: noopLogger }), { logger: noopLogger });

  assert.deepEqual(summary.users, [
    { userId: "1", total: 3, activeBuckets: 2, byComponent: { Assignment: 0, Forum: 1, Quiz: 2 } },
    { userId: "2", total: 1, activeBuckets: 1, byComponent: { Assignment: 0, Forum: 1, Quiz: 0 } },
    { userId: "10", total: 1, activeBuckets: 1, byComponent: { Assignment: 1, Forum: 0, Quiz: 0 } },
  ]);
  assert.deepEqual(summary.components, [
    { componentName: "Assignment", total: 1 },
    { componentName: "Forum", total: 2 },
    { componentName: "Quiz", total: 2 },
  ]);
  assert.deepEqual(summary.buckets, [
    { bucket: "2024-01", total: 4 },
    { bucket: "2024-02", total: 1 },
  ]);
  assert.equal(summary.grandTotal, 5);
  assert.deepEqual(summary.rowStats, { status: "ok", count: 4, sum: 5, mean: 1.25, min: 1, max: 2 });
  assert.deepEqual(summary.bucketStats, { status: "ok", count: 2, sum: 5, mean: 2.5, min: 1, max: 4 });
});

test("component totals, user totals and record count agree", () => {
  const summary = aggregate(reshape(records, { logger: noopLogger }), { logger: noopLogger });
  const byComponent = summary.components.reduce((acc, c) => acc + c.total, 0);
  const byUser = summary.users.reduce((acc, u) => acc + u.total, 0);
  assert.equal(byComponent, records.length);
  assert.equal(byUser, records.length);
  for (const user of summary.users) {
    assert.equal(
      Object.values(user.byComponent).reduce((acc, n) => acc + n, 0),
      user.total
    );
  }
});

test("an empty table yields a no-data result instead of failing", () => {
  const summary = aggregate({ granularity: "month", components: ["Quiz"], rows: [] }, { logger: noopLogger });
  assert.deepEqual(summary.users, []);
  assert.deepEqual(summary.components, [{ componentName: "Quiz", total: 0 }]);
  assert.equal(summary.grandTotal, 0);
  assert.deepEqual(summary.rowStats, { status: "no-data" });
  assert.deepEqual(summary.bucketStats, { status: "no-data" });
  assert.deepEqual(describe([]), { status: "no-data" });
});

function tableWith(counts: Record<string, number>, total: number): ReshapedTable {
  return { granularity: "month", components: ["Forum", "Quiz"], rows: [{ userId: "1", bucket: "2024-01", counts, total }] };
}

test("malformed rows fail with AggregationError", () => {
  assert.throws(
    () => aggregate(tableWith({ Forum: 0, Quiz: -1 }, -1), { logger: noopLogger }),
    (err: unknown) =>
      err instanceof AggregationError && err.message === 'row (1, 2024-01) has invalid count -1 for "Quiz"'
  );
  assert.throws(() => aggregate(tableWith({ Forum: 0.5, Quiz: 1 }, 1.5), { logger: noopLogger }), AggregationError);
  assert.throws(
    () => aggregate(tableWith({ Quiz: 1 }, 1), { logger: noopLogger }),
    (err: unknown) =>
      err instanceof AggregationError && err.message === 'row (1, 2024-01) has no value for component "Forum"'
  );
  assert.throws(
    () => aggregate(tableWith({ Forum: 1, Quiz: 1 }, 3), { logger: noopLogger }),
    (err: unknown) =>
      err instanceof AggregationError && err.message === "row (1, 2024-01) total 3 does not match its cells (2)"
  );
});
