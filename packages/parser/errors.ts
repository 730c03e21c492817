/**
 * A single lexer, parser or option problem, positioned where known.
 */
export interface ParseIssue {
  kind: 'lexer' | 'parser' | 'option';
  message: string;
  line?: number;
  column?: number;
}

export class StatementParseError extends Error {
  readonly issues: readonly ParseIssue[];

  constructor(issues: readonly ParseIssue[]) {
    super(issues.map(formatIssue).join('; '));
    this.name = 'StatementParseError';
    this.issues = issues;
  }
}

export function formatIssue(issue: ParseIssue): string {
  const where = issue.line !== undefined && issue.column !== undefined
    ? ` at ${issue.line}:${issue.column}`
    : '';
  return `${issue.message}${where}`;
}
