import type { z } from 'zod';

export class StatSheetSchemaError extends Error {
  readonly issues: readonly z.ZodIssue[];

  constructor(issues: readonly z.ZodIssue[]) {
    super(formatIssues(issues));
    this.name = 'StatSheetSchemaError';
    this.issues = issues;
  }
}

function formatIssues(issues: readonly z.ZodIssue[]): string {
  const lines = issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
  return ['Stat sheet validation failed:', ...lines].join('\n');
}
