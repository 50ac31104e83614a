export {
  summarize,
  summarize_text,
  format_tsv,
  decode_events,
  street_from_state,
  extract_amount,
  classify_action,
  MalformedInputError,
  DEFAULT_TEAM,
  COLUMNS,
} from './summary';
export { run_cli } from './cli/program';
export type { CliIO } from './cli/program';
export type * from './types';
export { GameEvent as GameEventSchema, GameStateView as GameStateViewSchema, parse_event } from './schema';
