/** 输入解码问题的统一表示（decode_events 与 CLI 共用） */
export interface ValidationIssue {
  /** 机器可读错误码（如 NOT_AN_EVENT_LIST / INVALID_JSON_LINE / EVENT_NOT_OBJECT）。 */
  code: string;
  /** 近似 JSON Pointer 的路径（如 "/lines/3"、"/0"）。 */
  path: string;
  /** 人类可读消息（面向日志/终端）。 */
  message: string;
  /** 可选：修复建议。 */
  hint?: string;
}
