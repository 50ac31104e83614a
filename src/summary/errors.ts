import type { ValidationIssue } from '../types';

/** 输入既不是 JSON 数组也不是合法 JSON-lines 时抛出 */
export class MalformedInputError extends Error {
  readonly code = 'MALFORMED_INPUT';
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    const first = issues[0];
    super(first ? `${first.path} : ${first.message}` : 'malformed input');
    this.name = 'MalformedInputError';
    this.issues = issues;
  }
}
