/**
 * 事件汇总：筛出属于指定队伍的下注/获胜事件，投影成 TSV 行。
 */
import type { GameEvent, SummarizeInput, SummarizeOutput, SummaryRow } from '../types';
import { classify_action, extract_amount } from './classify';
import { decode_events } from './decode';
import { MalformedInputError } from './errors';
import { street_from_state } from './street';

export { decode_events } from './decode';
export { street_from_state } from './street';
export { classify_action, extract_amount } from './classify';
export { MalformedInputError } from './errors';

/** 未指定队名时使用 */
export const DEFAULT_TEAM = 'The Real Donkey Killers';

/** 表头列，顺序与 SummaryRow 字段一致 */
export const COLUMNS = ['round', 'street', 'action', 'amount', 'pot', 'buyin', 'message'] as const;

function to_row(ev: GameEvent, team: string): SummaryRow | null {
  const { type, message, game_state: gs } = ev;
  if (!message.includes(team)) return null;

  if (type === 'bet') {
    const amount = extract_amount(message);
    return {
      round: String(gs.round),
      street: street_from_state(gs),
      action: classify_action(message, amount),
      amount,
      pot: String(gs.pot),
      buyin: String(gs.current_buy_in),
      message,
    };
  }

  if (type === 'winner_announcement') {
    return {
      round: String(gs.round),
      street: street_from_state(gs),
      action: 'won',
      amount: '',
      pot: String(gs.pot),
      buyin: String(gs.current_buy_in),
      message,
    };
  }

  return null;
}

/**
 * 单次线性扫描：输出行是输入事件的保序子序列（不重排、不去重）。
 */
export function summarize(input: SummarizeInput): SummarizeOutput {
  const team = input.team ?? DEFAULT_TEAM;
  const rows: SummaryRow[] = [];
  for (const ev of input.events) {
    const row = to_row(ev, team);
    if (row) rows.push(row);
  }
  return { rows, scanned: input.events.length, skipped: input.events.length - rows.length };
}

/** 表头 + 每行一条，字段以 \t 连接、原样输出；每行以 \n 结尾 */
export function format_tsv(rows: SummaryRow[]): string {
  const lines = [COLUMNS.join('\t')];
  for (const row of rows) {
    lines.push(COLUMNS.map((col) => row[col]).join('\t'));
  }
  return lines.join('\n') + '\n';
}

/**
 * 解码 + 汇总 + 格式化一步到位。
 * @throws {MalformedInputError} 输入无法解码时
 */
export function summarize_text(text: string, team: string = DEFAULT_TEAM): string {
  const decoded = decode_events(text);
  if (!decoded.ok || !decoded.events) throw new MalformedInputError(decoded.errors);
  return format_tsv(summarize({ events: decoded.events, team }).rows);
}
