import { z } from 'zod';

/**
 * 平台事件记录的结构描述。
 *
 * 不做上游 schema 校验：字段缺失或类型不符时一律回退到默认值，
 * 只有"记录本身不是对象"才算解析失败。
 */

/** 轮次标识：任意 JSON 标量 */
const Round = z.union([z.string(), z.number(), z.boolean()]);

/** 金额：平台有时给数字，有时给字符串；其它标量原样保留 */
const Amount = z.union([z.number(), z.string(), z.boolean()]);

/**
 * 事件里嵌套的 game_state（只取汇总需要的字段，其余丢弃）
 */
export const GameStateView = z.object({
  /** 轮次（缺省 ""） */
  round: Round.catch(''),
  /** 公共牌（缺省 []，只关心张数） */
  community_cards: z.array(z.unknown()).catch(() => []),
  /** 底池（缺省 ""） */
  pot: Amount.catch(''),
  /** 当前跟注额（缺省 ""） */
  current_buy_in: Amount.catch(''),
});

export type GameStateViewType = z.infer<typeof GameStateView>;

/** 全部字段取默认值的 game_state */
export function empty_game_state(): GameStateViewType {
  return { round: '', community_cards: [], pot: '', current_buy_in: '' };
}

/**
 * 单条事件：
 * - type：事件类型标签（"bet" / "winner_announcement" / ...）
 * - message：平台生成的自由文本
 * - game_state：事件发生时的牌桌快照
 */
export const GameEvent = z.object({
  type: z.string().catch(''),
  message: z.string().catch(''),
  game_state: GameStateView.catch(empty_game_state),
});

export type GameEventType = z.infer<typeof GameEvent>;

/** 安全解析单条事件：成功返回 { success:true, data }；失败返回 { success:false, error } */
export function parse_event(input: unknown) {
  return GameEvent.safeParse(input);
}
