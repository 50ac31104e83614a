import type { ValidationIssue } from '../types';

export * from './event.schema';


/** 构造统一的问题对象（解码器/CLI 复用） */
export function issue(
  code: string,
  path: string,
  message: string,
  hint?: string
): ValidationIssue {
  return { code, path, message, hint };
}
