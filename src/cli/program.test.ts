import { Readable } from 'node:stream';
import { describe, it, expect } from 'vitest';
import { run_cli } from './program';

const HEADER = 'round\tstreet\taction\tamount\tpot\tbuyin\tmessage\n';

/** 内存版 stdin/stdout/stderr */
function fake_io(input: string) {
  const out: string[] = [];
  const err: string[] = [];
  return {
    io: {
      stdin: Readable.from([input]),
      stdout: (text: string) => out.push(text),
      stderr: (text: string) => err.push(text),
    },
    stdout: () => out.join(''),
    stderr: () => err.join(''),
  };
}

const RAISE =
  '[{"type":"bet","message":"The Real Donkey Killers: bet of 40 (raise)",' +
  '"game_state":{"round":3,"community_cards":[],"pot":100,"current_buy_in":40}}]';

describe('summarize-logs cli', () => {
  it('prints the table for the default team', async () => {
    const t = fake_io(RAISE);
    const code = await run_cli([], t.io);
    expect(code).toBe(0);
    expect(t.stdout()).toBe(`${HEADER}3\tPRE\traise\t40\t100\t40\tThe Real Donkey Killers: bet of 40 (raise)\n`);
    expect(t.stderr()).toBe('');
  });

  it('filters by the team given as the first argument', async () => {
    const t = fake_io('{"type":"bet","message":"Test Team: bet of 0 (fold)"}\n{"type":"bet","message":"x"}\n');
    const code = await run_cli(['Test Team'], t.io);
    expect(code).toBe(0);
    expect(t.stdout()).toBe(`${HEADER}\tPRE\tfold\t0\t\t\tTest Team: bet of 0 (fold)\n`);
  });

  it('prints only the header for empty input', async () => {
    const t = fake_io('');
    expect(await run_cli([], t.io)).toBe(0);
    expect(t.stdout()).toBe(HEADER);
  });

  it('reports counts on stderr with --verbose', async () => {
    const t = fake_io(RAISE);
    expect(await run_cli(['--verbose'], t.io)).toBe(0);
    expect(t.stderr()).toBe('Read 1 event(s) (array), 1 row(s) for "The Real Donkey Killers"\n');
  });

  it('fails with exit code 1 and no table on malformed input', async () => {
    const t = fake_io('nope\n{');
    const code = await run_cli([], t.io);
    expect(code).toBe(1);
    expect(t.stdout()).toBe('');
    const lines = t.stderr().split('\n');
    expect(lines[0]).toBe('❌ Could not decode input with 1 error(s):');
    expect(lines[1].startsWith('  - [INVALID_JSON_LINE] /lines/1 : ')).toBe(true);
  });

  it('prints the version', async () => {
    const t = fake_io('');
    expect(await run_cli(['--version'], t.io)).toBe(0);
    expect(t.stdout()).toBe('0.1.0\n');
  });

  it('accepts a dash-prefixed team name', async () => {
    const t = fake_io('[{"type":"bet","message":"-=Sharks=-: bet of 10","game_state":{"round":1}}]');
    expect(await run_cli(['-=Sharks=-'], t.io)).toBe(0);
    expect(t.stdout()).toBe(`${HEADER}1\tPRE\tbet\t10\t\t\t-=Sharks=-: bet of 10\n`);
    expect(t.stderr()).toBe('');
  });

  it('takes a team name that clashes with an option after "--"', async () => {
    const t = fake_io('[{"type":"bet","message":"-v: bet of 10"}]');
    expect(await run_cli(['--', '-v'], t.io)).toBe(0);
    expect(t.stdout()).toBe(`${HEADER}\tPRE\tbet\t10\t\t\t-v: bet of 10\n`);
    expect(t.stderr()).toBe('');
  });

  it('treats an unknown long option as the team name', async () => {
    const t = fake_io('[{"type":"bet","message":"Test Team: bet of 10"}]');
    expect(await run_cli(['--bogus'], t.io)).toBe(0);
    expect(t.stdout()).toBe(HEADER);
  });
});
