/** Shared Commander helpers for the agent-console CLI.
 * DRY the exitOverride + parse normalization.
 */
import { type Command, CommanderError, type Option } from 'commander';

const isStringArray = (v: unknown): v is readonly string[] =>
  Array.isArray(v) && v.every((t) => typeof t === 'string');

/** Normalize test argv like ["node","agent-console", ...] -> [...] */
export const normalizeArgv = (
  argv?: readonly string[],
): readonly string[] | undefined => {
  if (!isStringArray(argv)) return undefined;
  if (argv.length >= 2 && argv[0] === 'node' && argv[1] === 'agent-console') {
    return argv.slice(2);
  }
  return argv;
};

/** Patch parseAsync() to normalize argv before Commander parses. */
export const patchParseMethods = (cli: Command): void => {
  const origParseAsync = cli.parseAsync.bind(cli);
  cli.parseAsync = async (argv, opts) => {
    const normalized = normalizeArgv(argv);
    // Normalized test argv is user-level; process argv keeps node semantics.
    await origParseAsync(
      normalized,
      normalized === argv ? opts : { from: 'user' },
    );
    return cli;
  };
};

const BENIGN_EXITS = new Set<string>([
  'commander.helpDisplayed',
  'commander.help',
  'commander.version',
]);

/**
 * Make Commander throw instead of calling process.exit. The bin decides the
 * exit code; see {@link isBenignExit}.
 */
export const installExitOverride = (cmd: Command): void => {
  cmd.exitOverride();
};

/** Help/version exits are not failures. */
export const isBenignExit = (e: unknown): boolean =>
  e instanceof CommanderError && BENIGN_EXITS.has(e.code);

/** Apply both safety adapters to a command. */
export function applyCliSafety(cmd: Command): void {
  installExitOverride(cmd);
  patchParseMethods(cmd);
}

/** Tag an Option description with (default) when active. */
export function tagDefault(opt: Option, on: boolean): void {
  if (on && !opt.description.includes('(default)')) {
    opt.description = `${opt.description} (default)`;
  }
}
