import { issue, parse_event } from '../schema';
import type { DecodeOutput, GameEvent, InputFormat, ValidationIssue } from '../types';

/**
 * 把原始 JSON 值逐条过 schema，转成事件列表。
 * 记录本身不是对象时记错误；字段级问题由 schema 的默认值吸收。
 */
function to_events(
  records: Array<{ value: unknown; path: string }>,
  errors: ValidationIssue[]
): GameEvent[] {
  const events: GameEvent[] = [];
  for (const { value, path } of records) {
    const result = parse_event(value);
    if (!result.success) {
      errors.push(
        issue('EVENT_NOT_OBJECT', path, `event record must be a JSON object, got ${describe(value)}`)
      );
      continue;
    }
    events.push(result.data);
  }
  return events;
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function error_message(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function done(format: InputFormat | null, events: GameEvent[], errors: ValidationIssue[]): DecodeOutput {
  if (errors.length) return { ok: false, format, events: null, errors };
  return { ok: true, format, events, errors };
}

/**
 * 解码 stdin 文本：
 * 1. 整体按一个 JSON 值解析（数组 → 事件列表；单个对象 → 一条事件）
 * 2. 失败则按 JSON-lines 逐行解析（跳过空行）；任何一行失败即整体失败，不做逐行恢复
 */
export function decode_events(text: string): DecodeOutput {
  const data = text.trim();
  const errors: ValidationIssue[] = [];

  if (!data) return { ok: true, format: null, events: [], errors };

  let whole: unknown;
  let whole_ok = true;
  try {
    whole = JSON.parse(data);
  } catch {
    // 不是单个 JSON 值 → 走 JSON-lines
    whole_ok = false;
  }

  if (whole_ok) {
    if (Array.isArray(whole)) {
      const records = whole.map((value, index) => ({ value, path: `/${index}` }));
      return done('array', to_events(records, errors), errors);
    }
    if (whole !== null && typeof whole === 'object') {
      return done('lines', to_events([{ value: whole, path: '/lines/1' }], errors), errors);
    }
    errors.push(
      issue(
        'NOT_AN_EVENT_LIST',
        '/',
        `expected a JSON array of events, got ${describe(whole)}`,
        'pipe a JSON array or one JSON object per line'
      )
    );
    return done(null, [], errors);
  }

  const records: Array<{ value: unknown; path: string }> = [];
  const lines = data.split(/\r\n|\r|\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (!line.trim()) continue;
    try {
      records.push({ value: JSON.parse(line), path: `/lines/${i + 1}` });
    } catch (e) {
      errors.push(issue('INVALID_JSON_LINE', `/lines/${i + 1}`, error_message(e)));
      return done('lines', [], errors);
    }
  }
  return done('lines', to_events(records, errors), errors);
}
