export type TableName = "activity" | "userLog" | "componentCodes";

export type TimeGranularity = "day" | "week" | "month" | "year";

export type Row = Readonly<Record<string, string>>;

// Loaded (untyped) table: one snapshot per CSV source
export interface Table {
  name: TableName;
  source: string; // file path the rows came from
  columns: readonly string[];
  rows: readonly Row[];
}

export type SourcePaths = Readonly<Record<TableName, string>>;

export type LoadedTables = Readonly<Record<TableName, Table>>;

// Typed records
export interface ActivityRecord {
  userId: string;
  componentCode: string;
  action: string;
  timestamp: string; // ISO 8601, UTC
  context: Readonly<Record<string, string>>;
}

export interface UserLogEntry {
  userId: string;
  sessionStart: string; // ISO 8601, UTC
  sessionEnd?: string; // ISO 8601, UTC
}

export interface ComponentCode {
  code: string;
  componentName: string;
  category: string;
  isExcluded: boolean;
}

export interface CleanStats {
  originalRows: number;
  filteredRows: number;
  removedRows: number;
}

export interface CleanedDataset {
  activity: readonly ActivityRecord[];
  userLog: readonly UserLogEntry[];
  componentCodes: readonly ComponentCode[];
  excludedCodes: readonly string[];
  stats: Readonly<Record<TableName, CleanStats>>;
}

export interface SessionFields {
  sessionStart: string;
  sessionEnd?: string;
}

export interface ComponentFields {
  componentName: string;
  category: string;
}

export interface MergedRecord extends ActivityRecord, SessionFields, ComponentFields {}

export interface MergeDiagnostics {
  activityRows: number;
  unmatchedUser: number;
  unmatchedComponent: number;
  excludedComponent: number;
  merged: number;
}

export interface MergeResult {
  records: readonly MergedRecord[];
  diagnostics: MergeDiagnostics;
}

export interface ReshapedRow {
  userId: string;
  bucket: string;
  counts: Readonly<Record<string, number>>; // component name -> interactions
  total: number;
}

export interface ReshapedTable {
  granularity: TimeGranularity;
  components: readonly string[];
  rows: readonly ReshapedRow[];
}

export interface InteractionCount {
  userId: string;
  componentName: string;
  bucket: string;
  count: number;
}

export type DescriptiveStats =
  | { status: "ok"; count: number; sum: number; mean: number; min: number; max: number }
  | { status: "no-data" };

export interface UserSummary {
  userId: string;
  total: number;
  activeBuckets: number;
  byComponent: Readonly<Record<string, number>>;
}

export interface ComponentTotal {
  componentName: string;
  total: number;
}

export interface BucketTotal {
  bucket: string;
  total: number;
}

export interface InteractionSummary {
  users: readonly UserSummary[];
  components: readonly ComponentTotal[];
  buckets: readonly BucketTotal[];
  grandTotal: number;
  rowStats: DescriptiveStats; // interactions per (user, bucket) row
  bucketStats: DescriptiveStats; // interactions per bucket across users
}

export interface PipelineSettings {
  granularity: TimeGranularity;
  columnMappings: Readonly<Record<string, string>>;
  excludedComponents: readonly string[];
}

export interface PipelineRun {
  sources: SourcePaths;
  settings: PipelineSettings;
  cleaned: CleanedDataset;
  merged: MergeResult;
  reshaped: ReshapedTable;
  interactions: readonly InteractionCount[];
  summary: InteractionSummary;
}

// JSON backup of a run, as written by writeSnapshot and read back by readSnapshot
export interface EngagementSnapshot {
  metadata: {
    processedAt: string;
    sources: SourcePaths;
    granularity: TimeGranularity;
    columnMappings: Readonly<Record<string, string>>;
    excludedComponents: readonly string[];
    fileStatistics: Readonly<Record<TableName, CleanStats>>;
    mergeDiagnostics: MergeDiagnostics;
  };
  data: {
    processed: readonly ActivityRecord[];
    userLog: readonly UserLogEntry[];
    componentCodes: readonly ComponentCode[];
    merged: readonly MergedRecord[];
    reshaped: ReshapedTable;
    summary: InteractionSummary;
  };
}
