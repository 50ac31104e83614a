import type { BetAction } from '../types';

// 第二个分支只用于吞掉 "bet of 0 (xxx)"，其捕获组不参与金额
const AMOUNT_RE = /bet of (\d+)|bet of 0 \((\w+)\)/;

/** 从下注消息里取金额；未命中或只命中第二分支时为 "0" */
export function extract_amount(message: string): string {
  const m = AMOUNT_RE.exec(message);
  return m?.[1] ?? '0';
}

/**
 * 下注动作分类，按固定优先级命中即返回：
 * (call) → (raise) → (check) → 非零金额即 bet → (fold) → "?"
 *
 * 下游依赖这个顺序，勿调整。
 */
export function classify_action(message: string, amount: string): BetAction {
  if (message.includes('(call)')) return 'call';
  if (message.includes('(raise)')) return 'raise';
  if (message.includes('(check)')) return 'check';
  if (amount !== '0') return 'bet';
  if (message.includes('(fold)')) return 'fold';
  return '?';
}
