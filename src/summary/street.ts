import type { Street } from '../types';

const STREETS: Record<number, Street> = { 0: 'PRE', 3: 'FLOP', 4: 'TURN', 5: 'RIVER' };

/**
 * 由公共牌张数推导街道。
 * 0/3/4/5 → PRE/FLOP/TURN/RIVER；其它张数原样返回数字字符串；缺省按 0 张处理。
 */
export function street_from_state(state: { community_cards?: readonly unknown[] }): Street {
  const n = (state.community_cards ?? []).length;
  return STREETS[n] ?? String(n);
}
