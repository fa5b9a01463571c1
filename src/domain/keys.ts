export type KeyKind = "numeric" | "text" | "mixed" | "empty";

const INTEGER_LIKE = /^(-?)0*(\d+?)(?:\.0+)?$/;
const NUMERIC = /^-?\d+(?:\.\d+)?$/;

// "001" and "1.0" (spreadsheet round-trips) both join as "1"
export function normalizeKey(raw: string): string {
  const trimmed = raw.trim();
  const m = INTEGER_LIKE.exec(trimmed);
  return m ? `${m[1]}${m[2]}` : trimmed;
}

export function keyKind(keys: Iterable<string>): KeyKind {
  let numeric = 0;
  let text = 0;
  for (const key of keys) {
    if (NUMERIC.test(key)) numeric++;
    else text++;
    if (numeric > 0 && text > 0) return "mixed";
  }
  if (numeric > 0) return "numeric";
  if (text > 0) return "text";
  return "empty";
}

/** Orders ids numerically where they are numbers ("2" before "10"). */
export function compareIds(a: string, b: string): number {
  return a.localeCompare(b, "en", { numeric: true });
}
