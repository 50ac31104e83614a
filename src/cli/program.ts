import { Command, CommanderError } from "commander";
import { DEFAULT_TEAM, decode_events, format_tsv, summarize } from "../summary";
import { read_stream } from "../utils/stream.util";

/** CLI 的外部依赖（便于在测试里换成内存实现） */
export interface CliIO {
  stdin: AsyncIterable<string | Uint8Array>;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

type CliOptions = {
  verbose?: boolean;
};

export function build_program(io: CliIO, on_exit: (code: number) => void): Command {
  const program = new Command();

  program
    .name("summarize-logs")
    .description("Summarize a team's bets and wins from poker platform event logs (stdin → TSV)")
    .version("0.1.0")
    .argument("[team]", "team name matched as a substring of event messages", DEFAULT_TEAM)
    .option("-v, --verbose", "print input format and counts to stderr", false)
    // 队名不做校验：未知的 "-xxx" 也当作队名
    .allowUnknownOption()
    .addHelpText("after", '\nA team name that equals one of the options above goes after "--", e.g. summarize-logs -- -v\n')
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr })
    .exitOverride()
    .action(async (team: string, opts: CliOptions) => {
      try {
        const text = await read_stream(io.stdin);

        const decoded = decode_events(text);
        if (!decoded.ok || !decoded.events) {
          io.stderr(`❌ Could not decode input with ${decoded.errors.length} error(s):\n`);
          for (const e of decoded.errors) {
            io.stderr(`  - [${e.code}] ${e.path} : ${e.message}\n`);
          }
          on_exit(1);
          return;
        }

        const summary = summarize({ events: decoded.events, team });
        if (opts.verbose) {
          io.stderr(
            `Read ${summary.scanned} event(s) (${decoded.format ?? "empty"}), ` +
              `${summary.rows.length} row(s) for "${team}"\n`
          );
        }
        io.stdout(format_tsv(summary.rows));
        on_exit(0);
      } catch (err) {
        io.stderr(`💥 Unexpected error: ${err instanceof Error ? err.message : String(err)}\n`);
        on_exit(1);
      }
    });

  return program;
}

/**
 * 运行 CLI，返回退出码。
 * @param args 用户参数（不含 node 与脚本路径）
 */
export async function run_cli(args: string[], io: CliIO): Promise<number> {
  let code = 0;
  const program = build_program(io, (c) => {
    code = c;
  });
  try {
    await program.parseAsync(args, { from: "user" });
  } catch (err) {
    // --help / --version / 参数错误：commander 已输出，只取退出码
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }
  return code;
}
