import { z } from "zod";
import { timeGranularities } from "../domain/time";
import { EngagementSnapshot } from "../domain/types";

const count = z.number().int().nonnegative();

const ActivityRecordSchema = z.object({
  userId: z.string(),
  componentCode: z.string(),
  action: z.string(),
  timestamp: z.string().datetime(),
  context: z.record(z.string()),
});

const UserLogEntrySchema = z.object({
  userId: z.string(),
  sessionStart: z.string().datetime(),
  sessionEnd: z.string().datetime().optional(),
});

const ComponentCodeSchema = z.object({
  code: z.string(),
  componentName: z.string(),
  category: z.string(),
  isExcluded: z.boolean(),
});

const MergedRecordSchema = ActivityRecordSchema.extend({
  componentName: z.string(),
  category: z.string(),
  sessionStart: z.string().datetime(),
  sessionEnd: z.string().datetime().optional(),
});

const CleanStatsSchema = z.object({ originalRows: count, filteredRows: count, removedRows: count });

const DescriptiveStatsSchema = z.discriminatedUnion("status", [
  z.object({
    status: z.literal("ok"),
    count,
    sum: z.number(),
    mean: z.number(),
    min: z.number(),
    max: z.number(),
  }),
  z.object({ status: z.literal("no-data") }),
]);

const perTable = <T extends z.ZodTypeAny>(schema: T) =>
  z.object({ activity: schema, userLog: schema, componentCodes: schema });

export const SnapshotSchema: z.ZodType<EngagementSnapshot> = z.object({
  metadata: z.object({
    processedAt: z.string().datetime(),
    sources: perTable(z.string()),
    granularity: z.enum(timeGranularities),
    columnMappings: z.record(z.string()),
    excludedComponents: z.array(z.string()),
    fileStatistics: perTable(CleanStatsSchema),
    mergeDiagnostics: z.object({
      activityRows: count,
      unmatchedUser: count,
      unmatchedComponent: count,
      excludedComponent: count,
      merged: count,
    }),
  }),
  data: z.object({
    processed: z.array(ActivityRecordSchema),
    userLog: z.array(UserLogEntrySchema),
    componentCodes: z.array(ComponentCodeSchema),
    merged: z.array(MergedRecordSchema),
    reshaped: z.object({
      granularity: z.enum(timeGranularities),
      components: z.array(z.string()),
      rows: z.array(
        z.object({ userId: z.string(), bucket: z.string(), counts: z.record(count), total: count })
      ),
    }),
    summary: z.object({
      users: z.array(
        z.object({ userId: z.string(), total: count, activeBuckets: count, byComponent: z.record(count) })
      ),
      components: z.array(z.object({ componentName: z.string(), total: count })),
      buckets: z.array(z.object({ bucket: z.string(), total: count })),
      grandTotal: count,
      rowStats: DescriptiveStatsSchema,
      bucketStats: DescriptiveStatsSchema,
    }),
  }),
});
