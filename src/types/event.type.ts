import type { GameEventType, GameStateViewType } from '../schema';

export type GameEvent = GameEventType;
export type GameStateView = GameStateViewType;

/** 街道：公共牌数 0/3/4/5 对应的名字；其它张数直接用数字字符串 */
export type Street = 'PRE' | 'FLOP' | 'TURN' | 'RIVER' | (string & {});

// 下注动作分类（"?" 表示无法识别）
export type BetAction = 'call' | 'raise' | 'check' | 'bet' | 'fold' | '?';

// 输出行的 action 列：下注分类或获胜
export type RowAction = BetAction | 'won';

/** 一行 TSV 输出（列顺序即字段顺序） */
export interface SummaryRow {
  round: string;
  street: Street;
  action: RowAction;
  /** 下注额；获胜行为空串 */
  amount: string;
  pot: string;
  buyin: string;
  message: string;
}
