import type { GameEvent, SummaryRow } from './event.type';
import type { ValidationIssue } from './issue.type';

/** ---------------------------
 *  解码阶段（输入文本 → 事件列表）
 * ---------------------------*/

/** 检测到的输入编码 */
export type InputFormat = 'array' | 'lines';

/** 解码输出（成功/失败两种分支） */
export interface DecodeOutput {
  /** 是否解码成功（成功时 errors 为空）。 */
  ok: boolean;
  /** 命中的编码；失败或空输入时为 null。 */
  format: InputFormat | null;
  /** 成功时为按输入顺序排列的事件；失败为 null。 */
  events: GameEvent[] | null;
  /** 致命错误列表（失败原因）。 */
  errors: ValidationIssue[];
}

/** ---------------------------
 *  汇总阶段（事件列表 → 行）
 * ---------------------------*/

export interface SummarizeInput {
  events: GameEvent[];
  /** 队名（按字面子串匹配 message）；缺省为 DEFAULT_TEAM。 */
  team?: string;
}

export interface SummarizeOutput {
  rows: SummaryRow[];
  /** 扫描过的事件数 */
  scanned: number;
  /** 被跳过（无输出）的事件数 */
  skipped: number;
}
