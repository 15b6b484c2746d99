import { parseArgs } from "util";
import { LEAGUES, parseLeague, type League } from "../shared/schema";
import { logError, StartupError, UsageError } from "./types/errors";
import { withSource } from "./logger";

const log = withSource("cli");

export const VERSION = "0.1.0";

export const USAGE = [
  "Usage: scoreline -l <league> [-t <team>]",
  "",
  "Options:",
  `  -l, --league <league>  one of: ${LEAGUES.join(", ")} (required)`,
  "  -t, --team <team>      only show games involving this team (name or abbreviation)",
  "  -h, --help             show this help",
  "  -v, --version          show the version",
  "",
  "Keys: up/down scroll, left/right league, r refresh, c clear team, q quit",
].join("\n");

export type CliCommand =
  | { kind: "run"; league: League; team?: string }
  | { kind: "help" }
  | { kind: "version" };

/**
 * @throws UsageError for unknown options, a missing league or an unsupported league
 */
export function parseCliArgs(argv: string[]): CliCommand {
  let values: { league?: string; team?: string; help?: boolean; version?: boolean };
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        league: { type: "string", short: "l" },
        team: { type: "string", short: "t" },
        help: { type: "boolean", short: "h" },
        version: { type: "boolean", short: "v" },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }

  if (values.help) return { kind: "help" };
  if (values.version) return { kind: "version" };

  if (values.league === undefined) {
    throw new UsageError("missing required option -l/--league");
  }
  const league = parseLeague(values.league);
  if (!league) {
    throw new UsageError(`unsupported league "${values.league}"`, { league: values.league });
  }

  const team = values.team?.trim();
  return team ? { kind: "run", league, team } : { kind: "run", league };
}

export const EXIT_CODES = {
  OK: 0,
  STARTUP_FAILURE: 1,
  USAGE: 2,
} as const;

export interface CliIo {
  stdout: Pick<NodeJS.WriteStream, "write">;
  stderr: Pick<NodeJS.WriteStream, "write">;
  start: (options: { league: League; team?: string }) => { exited: Promise<number> };
}

/**
 * Parse arguments, run the board, and map the result to an exit code.
 * Usage errors never touch the terminal.
 */
export async function runCli(argv: string[], io: CliIo): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      io.stderr.write(`scoreline: ${err.message}\n\n${USAGE}\n`);
      return EXIT_CODES.USAGE;
    }
    throw err;
  }

  switch (command.kind) {
    case "help":
      io.stdout.write(`${USAGE}\n`);
      return EXIT_CODES.OK;
    case "version":
      io.stdout.write(`${VERSION}\n`);
      return EXIT_CODES.OK;
    case "run":
      break;
  }

  try {
    const running = io.start({ league: command.league, team: command.team });
    return await running.exited;
  } catch (err) {
    if (err instanceof StartupError) {
      logError(log, err, { operation: "startup" });
      io.stderr.write(`scoreline: ${err.message}\n`);
      return EXIT_CODES.STARTUP_FAILURE;
    }
    throw err;
  }
}
