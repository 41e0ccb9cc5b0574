export type SqlValue = string | number | null;

export interface Assignments {
  clauses: string[];
  params: SqlValue[];
}

/**
 * Turn (column, value) pairs into `column = ?` clauses for an UPDATE,
 * skipping values the caller left undefined. Booleans become 0/1.
 */
export function collectAssignments(
  pairs: Array<[column: string, value: SqlValue | boolean | undefined]>,
): Assignments {
  const clauses: string[] = [];
  const params: SqlValue[] = [];
  for (const [column, value] of pairs) {
    if (value === undefined) continue;
    clauses.push(`${column} = ?`);
    params.push(typeof value === "boolean" ? (value ? 1 : 0) : value);
  }
  return { clauses, params };
}

/** Substring pattern for `LIKE ? ESCAPE '\'`; wildcards in the text match literally. */
export function likePattern(text: string): string {
  return `%${text.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}
