import { z } from "zod";
import { SchemaError } from "../domain/errors";
import { normalizeKey } from "../domain/keys";
import { CanonicalColumn } from "../domain/mapping";
import { parseTimestamp } from "../domain/time";
import { ActivityRecord, ComponentCode, Row, Table, UserLogEntry } from "../domain/types";

const TRUE_WORDS = new Set(["true", "yes", "y", "1"]);
const FALSE_WORDS = new Set(["false", "no", "n", "0", ""]);

const keyField = z
  .string()
  .trim()
  .min(1, "value is empty")
  .transform(normalizeKey);

const timestampField = z.string().transform((raw, ctx) => {
  const parsed = parseTimestamp(raw);
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unparseable timestamp "${raw}"` });
    return z.NEVER;
  }
  return parsed.toISOString();
});

const optionalTimestampField = z
  .string()
  .optional()
  .transform((raw, ctx) => {
    if (!raw) return undefined;
    const parsed = parseTimestamp(raw);
    if (!parsed) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unparseable timestamp "${raw}"` });
      return z.NEVER;
    }
    return parsed.toISOString();
  });

const flagField = z
  .string()
  .optional()
  .transform((raw, ctx) => {
    const word = (raw ?? "").trim().toLowerCase();
    if (TRUE_WORDS.has(word)) return true;
    if (FALSE_WORDS.has(word)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean flag, got "${raw}"` });
    return z.NEVER;
  });

export const ActivityRowSchema = z.object({
  [CanonicalColumn.userId]: keyField,
  [CanonicalColumn.componentCode]: keyField,
  [CanonicalColumn.action]: z.string().transform((a) => a.trim() || "Unknown"),
  [CanonicalColumn.timestamp]: timestampField,
});

export const UserLogRowSchema = z.object({
  [CanonicalColumn.userId]: keyField,
  [CanonicalColumn.timestamp]: timestampField,
  [CanonicalColumn.sessionEnd]: optionalTimestampField,
});

export const ComponentCodeRowSchema = z.object({
  [CanonicalColumn.componentCode]: keyField,
  [CanonicalColumn.componentName]: z.string().optional(),
  [CanonicalColumn.category]: z.string().optional(),
  [CanonicalColumn.isExcluded]: flagField,
});

function parseRow<S extends z.ZodTypeAny>(schema: S, table: Table, row: Row, index: number): z.output<S> {
  const parsed = schema.safeParse(row);
  if (parsed.success) return parsed.data;
  const issue = parsed.error.issues[0];
  const column = issue.path.length ? String(issue.path[0]) : "(row)";
  throw new SchemaError(column, `${issue.message} in ${table.name} row ${index + 1}`);
}

const activityColumns = new Set<string>([
  CanonicalColumn.userId,
  CanonicalColumn.componentCode,
  CanonicalColumn.action,
  CanonicalColumn.timestamp,
]);

export function toActivityRecords(table: Table): ActivityRecord[] {
  const contextColumns = table.columns.filter((c) => !activityColumns.has(c));
  return table.rows.map((row, i) => {
    const parsed = parseRow(ActivityRowSchema, table, row, i);
    return {
      userId: parsed.user_id,
      componentCode: parsed.component_code,
      action: parsed.action,
      timestamp: parsed.timestamp,
      context: Object.fromEntries(contextColumns.map((c) => [c, row[c] ?? ""])),
    };
  });
}

export function toUserLogEntries(table: Table): UserLogEntry[] {
  return table.rows.map((row, i) => {
    const parsed = parseRow(UserLogRowSchema, table, row, i);
    return {
      userId: parsed.user_id,
      sessionStart: parsed.timestamp,
      ...(parsed.session_end ? { sessionEnd: parsed.session_end } : {}),
    };
  });
}

export function toComponentCodes(table: Table, excludedCodes: ReadonlySet<string> = new Set()): ComponentCode[] {
  return table.rows.map((row, i) => {
    const parsed = parseRow(ComponentCodeRowSchema, table, row, i);
    const code = parsed.component_code;
    return {
      code,
      componentName: parsed.component_name?.trim() || code,
      category: parsed.category?.trim() || "Uncategorized",
      isExcluded: parsed.is_excluded || excludedCodes.has(code),
    };
  });
}
