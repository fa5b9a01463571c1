import { logger as defaultLogger, Logger } from "../config/logger";
import { JoinError } from "../domain/errors";
import { keyKind } from "../domain/keys";
import {
  CleanedDataset,
  ComponentCode,
  ComponentFields,
  MergedRecord,
  MergeDiagnostics,
  MergeResult,
  SessionFields,
  UserLogEntry,
} from "../domain/types";

export interface MergeOptions {
  logger?: Logger;
}

export interface JoinOutcome<T> {
  rows: T[];
  dropped: number;
}

export interface ComponentJoinOutcome<T> extends JoinOutcome<T> {
  excluded: number; // subset of dropped: code known but flagged excluded
}

type UserKeyed = { userId: string; timestamp: string };
type ComponentKeyed = { componentCode: string };

function assertJoinableKeys(key: string, left: readonly string[], right: readonly string[]): void {
  const l = keyKind(left);
  const r = keyKind(right);
  if (l === "empty" || r === "empty" || l === "mixed" || r === "mixed") return;
  if (l !== r) {
    throw new JoinError(key, `left side keys are ${l} but right side keys are ${r}`);
  }
}

function indexSessions(userLog: readonly UserLogEntry[]): Map<string, UserLogEntry[]> {
  const byUser = new Map<string, UserLogEntry[]>();
  for (const entry of userLog) {
    const list = byUser.get(entry.userId);
    if (list) list.push(entry);
    else byUser.set(entry.userId, [entry]);
  }
  for (const list of byUser.values()) {
    list.sort((a, b) => (a.sessionStart < b.sessionStart ? -1 : a.sessionStart > b.sessionStart ? 1 : 0));
  }
  return byUser;
}

function indexCodes(codes: readonly ComponentCode[]): Map<string, ComponentCode> {
  const byCode = new Map<string, ComponentCode>();
  for (const code of codes) {
    // First definition wins; later duplicates are ignored
    if (!byCode.has(code.code)) byCode.set(code.code, code);
  }
  return byCode;
}

/**
 * Session nearest in time: the one whose span contains the timestamp, else
 * the latest one starting before it, else the user's first session.
 */
export function pickSession(sessions: readonly UserLogEntry[], timestamp: string): UserLogEntry {
  let containing: UserLogEntry | undefined;
  let preceding: UserLogEntry | undefined;
  for (const s of sessions) {
    if (s.sessionStart > timestamp) break;
    preceding = s;
    if (s.sessionEnd !== undefined && timestamp <= s.sessionEnd) containing = s;
  }
  return containing ?? preceding ?? sessions[0];
}

function sessionFields(session: UserLogEntry): SessionFields {
  return session.sessionEnd !== undefined
    ? { sessionStart: session.sessionStart, sessionEnd: session.sessionEnd }
    : { sessionStart: session.sessionStart };
}

function componentFields(code: ComponentCode): ComponentFields {
  return { componentName: code.componentName, category: code.category };
}

function matchUsers<T extends UserKeyed>(
  rows: readonly T[],
  sessions: ReadonlyMap<string, readonly UserLogEntry[]>
): JoinOutcome<T & SessionFields> {
  const out: (T & SessionFields)[] = [];
  for (const row of rows) {
    const list = sessions.get(row.userId);
    if (list) out.push({ ...row, ...sessionFields(pickSession(list, row.timestamp)) });
  }
  return { rows: out, dropped: rows.length - out.length };
}

function matchCodes<T extends ComponentKeyed>(
  rows: readonly T[],
  byCode: ReadonlyMap<string, ComponentCode>
): ComponentJoinOutcome<T & ComponentFields> {
  const out: (T & ComponentFields)[] = [];
  let excluded = 0;
  for (const row of rows) {
    const code = byCode.get(row.componentCode);
    if (!code) continue;
    if (code.isExcluded) {
      excluded++;
      continue;
    }
    out.push({ ...row, ...componentFields(code) });
  }
  return { rows: out, dropped: rows.length - out.length, excluded };
}

/** Inner join on user id; each surviving row carries one session. */
export function joinUserLog<T extends UserKeyed>(
  rows: readonly T[],
  userLog: readonly UserLogEntry[]
): JoinOutcome<T & SessionFields> {
  assertJoinableKeys(
    "user_id",
    rows.map((r) => r.userId),
    userLog.map((u) => u.userId)
  );
  return matchUsers(rows, indexSessions(userLog));
}

/** Inner join on component code; excluded codes never resolve. */
export function joinComponentCodes<T extends ComponentKeyed>(
  rows: readonly T[],
  codes: readonly ComponentCode[]
): ComponentJoinOutcome<T & ComponentFields> {
  assertJoinableKeys(
    "component_code",
    rows.map((r) => r.componentCode),
    codes.map((c) => c.code)
  );
  return matchCodes(rows, indexCodes(codes));
}

/**
 * Joins cleaned activity to the user log and the component reference.
 * Key kinds are checked once over the full activity set. Misses are tallied
 * per join over that same set, so a row missing both a user and a component
 * counts in both tallies.
 */
export function merge(dataset: CleanedDataset, options: MergeOptions = {}): MergeResult {
  const { logger = defaultLogger } = options;
  const { activity, userLog, componentCodes } = dataset;

  assertJoinableKeys(
    "user_id",
    activity.map((a) => a.userId),
    userLog.map((u) => u.userId)
  );
  assertJoinableKeys(
    "component_code",
    activity.map((a) => a.componentCode),
    componentCodes.map((c) => c.code)
  );

  const sessions = indexSessions(userLog);
  const byCode = indexCodes(componentCodes);

  const userJoin = matchUsers(activity, sessions);
  const componentJoin = matchCodes(activity, byCode);
  const records: MergedRecord[] = matchCodes(userJoin.rows, byCode).rows;

  const unmatchedUser = userJoin.dropped;
  const excludedComponent = componentJoin.excluded;
  const unmatchedComponent = componentJoin.dropped - componentJoin.excluded;

  const diagnostics: MergeDiagnostics = {
    activityRows: activity.length,
    unmatchedUser,
    unmatchedComponent,
    excludedComponent,
    merged: records.length,
  };
  if (unmatchedUser > 0 || unmatchedComponent > 0 || excludedComponent > 0) {
    logger.warn("merge:dropped", { unmatchedUser, unmatchedComponent, excludedComponent });
  }
  logger.info("merge:done", { ...diagnostics });

  return { records, diagnostics };
}

export default merge;
