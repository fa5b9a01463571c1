import { TableName } from "./types";

export const CanonicalColumn = {
  userId: "user_id",
  componentCode: "component_code",
  action: "action",
  timestamp: "timestamp",
  sessionEnd: "session_end",
  componentName: "component_name",
  category: "category",
  isExcluded: "is_excluded",
} as const;

export type CanonicalColumnName = (typeof CanonicalColumn)[keyof typeof CanonicalColumn];

export type ColumnMapping = Readonly<Record<string, string>>;

export const requiredColumns: Record<TableName, readonly CanonicalColumnName[]> = {
  activity: [CanonicalColumn.userId, CanonicalColumn.componentCode, CanonicalColumn.action, CanonicalColumn.timestamp],
  userLog: [CanonicalColumn.userId, CanonicalColumn.timestamp],
  componentCodes: [CanonicalColumn.componentCode],
};

export const defaultSourceFiles: Record<TableName, string> = {
  activity: "ACTIVITY_LOG.csv",
  userLog: "USER_LOG.csv",
  componentCodes: "COMPONENT_CODES.csv",
};

export const tableNames: readonly TableName[] = ["activity", "userLog", "componentCodes"];

export function resolveColumn(mapping: ColumnMapping, header: string): string {
  return Object.hasOwn(mapping, header) ? mapping[header] : header;
}

// Fixed columns of the Reshaped and Summary sheets; component names may not reuse them
export const PivotColumn = {
  userId: "user_id",
  bucket: "bucket",
  total: "total",
  activeBuckets: "active_buckets",
} as const;
