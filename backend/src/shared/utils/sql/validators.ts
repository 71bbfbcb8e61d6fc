/**
 * SQL Query Validators
 *
 * Guards for agent-authored SQL. Agents only ever read, so a query must be a
 * single SELECT (or a WITH ... SELECT) statement.
 *
 * @module shared/utils/sql/validators
 */

export type ReadOnlyQueryCheck =
  | { valid: true; statement: string }
  | { valid: false; reason: string };

const READ_ONLY_LEADING_KEYWORDS = ['SELECT', 'WITH'] as const;

/**
 * Statements that write or change schema. Checked as whole words so column
 * names such as `updated_at` pass. `INTO` covers `SELECT ... INTO`, which
 * creates a table on SQL Server.
 */
const WRITE_KEYWORDS = [
  'INSERT',
  'UPDATE',
  'DELETE',
  'MERGE',
  'DROP',
  'ALTER',
  'CREATE',
  'TRUNCATE',
  'EXEC',
  'EXECUTE',
  'GRANT',
  'REVOKE',
  'INTO',
] as const;

/** String literals and comments, matched left to right. */
const LITERAL_OR_COMMENT = /'(?:[^']|'')*'|--[^\n]*|\/\*[\s\S]*?\*\//g;

function isLiteral(token: string): boolean {
  return token.startsWith("'");
}

/**
 * Remove `--` line comments and block comments. Comment markers inside string
 * literals are left alone.
 */
export function stripSqlComments(query: string): string {
  return query.replace(LITERAL_OR_COMMENT, token => (isLiteral(token) ? token : ' '));
}

/**
 * Comments removed and string literals emptied, so only SQL keywords remain.
 */
function maskSql(query: string): string {
  return query.replace(LITERAL_OR_COMMENT, token => (isLiteral(token) ? "''" : ' '));
}

/**
 * Check that a query is a single read-only statement. The returned `statement`
 * is the query as written, trimmed and without a trailing semicolon; comments
 * and literals are only masked for the check.
 *
 * @example
 * validateReadOnlyQuery('SELECT * FROM courses')   // { valid: true, ... }
 * validateReadOnlyQuery('DELETE FROM courses')     // { valid: false, ... }
 */
export function validateReadOnlyQuery(query: string): ReadOnlyQueryCheck {
  const scanned = maskSql(query).trim().replace(/;\s*$/, '').trim().toUpperCase();
  if (!scanned) {
    return { valid: false, reason: 'query is empty' };
  }

  if (scanned.includes(';')) {
    return { valid: false, reason: 'only a single statement is allowed' };
  }

  const [firstWord = ''] = scanned.split(/\s+/);
  if (!READ_ONLY_LEADING_KEYWORDS.some(k => firstWord === k || firstWord.startsWith(`${k}(`))) {
    return { valid: false, reason: 'only SELECT or WITH statements are allowed' };
  }

  const writeKeyword = WRITE_KEYWORDS.find(k => new RegExp(`\\b${k}\\b`).test(scanned));
  if (writeKeyword) {
    return { valid: false, reason: `${writeKeyword} is not allowed in a read-only query` };
  }

  return { valid: true, statement: query.trim().replace(/;$/, '').trimEnd() };
}
