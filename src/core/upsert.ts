export interface SqlStatement {
  /** Original text, including comments and the terminating semicolon. */
  text: string;
  /** Text outside literals, identifiers and comments. */
  code: string;
  terminated: boolean;
}

type ScanState = 'code' | 'literal' | 'identifier' | 'comment';

/** Splits a script on top-level semicolons. Statements may span lines. */
export function splitStatements(sql: string): SqlStatement[] {
  const statements: SqlStatement[] = [];
  let state: ScanState = 'code';
  let text = '';
  let code = '';

  for (let i = 0; i < sql.length; i++) {
    const ch = sql[i];
    const next = sql[i + 1];
    text += ch;

    switch (state) {
      case 'code':
        if (ch === "'") {
          state = 'literal';
          code += ch;
        } else if (ch === '"') {
          state = 'identifier';
          code += ch;
        } else if (ch === '-' && next === '-') {
          state = 'comment';
        } else if (ch === ';') {
          statements.push({ text, code, terminated: true });
          text = '';
          code = '';
        } else {
          code += ch;
        }
        break;
      case 'literal':
      case 'identifier': {
        const quote = state === 'literal' ? "'" : '"';
        if (ch === quote) {
          if (next === quote) {
            text += next;
            i++;
          } else {
            state = 'code';
            code += ch;
          }
        }
        break;
      }
      case 'comment':
        if (ch === '\n') {
          state = 'code';
          code += ch;
        }
        break;
    }
  }

  if (text) statements.push({ text, code, terminated: false });
  return statements;
}

export function isInsert(statement: SqlStatement): boolean {
  return /^\s*INSERT\s+INTO\b/i.test(statement.code);
}

const SETVAL = /SELECT\s+pg_catalog\.setval\('((?:[^']|'')+)',\s*(\d+),\s*(true|false)\)/i;

export function isSequenceReset(statement: SqlStatement): boolean {
  return /^\s*SELECT\s+pg_catalog\.setval\(/i.test(statement.code);
}

/**
 * Moves a dumped sequence position forward only: the target keeps its own
 * position when it is already past the source's.
 */
export function forwardOnlySetval(text: string): string {
  return text.replace(SETVAL, (_match, literal: string, value: string, isCalled: string) => {
    const sequence = literal.replaceAll("''", "'");
    // an uncalled sequence hands out last_value next, so skip past it
    const current = isCalled.toLowerCase() === 'true' ? 'last_value' : 'last_value + 1';
    return `SELECT pg_catalog.setval('${literal}', GREATEST(${value}, (SELECT ${current} FROM ${sequence})), ${isCalled})`;
  });
}

/**
 * Rewrites a data script for loading next to existing rows: every INSERT
 * gets `ON CONFLICT DO NOTHING` (statements that already carry an ON CONFLICT
 * clause stay as they are) and sequence resets never move a sequence back.
 */
export function toConflictTolerant(sql: string): { sql: string; inserts: number } {
  let inserts = 0;
  const rewritten = splitStatements(sql).map(statement => {
    if (isSequenceReset(statement)) return forwardOnlySetval(statement.text);
    if (!isInsert(statement)) return statement.text;
    inserts++;
    if (!statement.terminated || /\bON\s+CONFLICT\b/i.test(statement.code)) return statement.text;
    return statement.text.slice(0, -1).trimEnd() + ' ON CONFLICT DO NOTHING;';
  });
  return { sql: rewritten.join(''), inserts };
}

export function countInserts(sql: string): number {
  return splitStatements(sql).filter(isInsert).length;
}
