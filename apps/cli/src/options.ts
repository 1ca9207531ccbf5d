export interface CliOptions {
  directory: string;
  verbose: boolean;
  /** Write `<file>.meta.json` side-files. */
  metadata: boolean;
  reportPath?: string;
  catalogPath?: string;
  top: number;
  track: number;
  concurrency: number;
}

export const DEFAULT_TOP = 10;
export const DEFAULT_TRACK = 0;
export const DEFAULT_CONCURRENCY = 4;

export const USAGE =
  'Usage: formscan <directory> [--verbose] [--no-metadata] [--report <path>] [--catalog <path>] [--top <n>] [--track <n>] [--concurrency <n>]';

export const resolveIntegerSetting = (
  name: string,
  rawValue: string | undefined,
  fallback: number,
  minimum: number,
): number => {
  if (rawValue === undefined || rawValue.trim() === '') {
    return fallback;
  }

  const value = Number(rawValue);
  if (!Number.isInteger(value) || value < minimum) {
    throw new Error(`Invalid ${name} value "${rawValue}". Expected an integer of at least ${minimum}.`);
  }

  return value;
};

type ValueFlag = '--report' | '--catalog' | '--top' | '--track' | '--concurrency';

const VALUE_FLAGS: readonly ValueFlag[] = ['--report', '--catalog', '--top', '--track', '--concurrency'];

const isValueFlag = (value: string): value is ValueFlag => VALUE_FLAGS.some((flag) => flag === value);

const splitInlineValue = (arg: string): { flag: string; inline?: string } => {
  const separator = arg.indexOf('=');
  if (!arg.startsWith('--') || separator < 0) {
    return { flag: arg };
  }
  return { flag: arg.slice(0, separator), inline: arg.slice(separator + 1) };
};

/**
 * Flags override `FORMSCAN_TOP`, `FORMSCAN_TRACK` and `FORMSCAN_CONCURRENCY`. Accepts
 * `--flag value` and `--flag=value`.
 */
export const resolveCliOptions = (argv: readonly string[], env: NodeJS.ProcessEnv = process.env): CliOptions => {
  const values: Partial<Record<ValueFlag, string>> = {};
  const positional: string[] = [];
  let verbose = false;
  let metadata = true;

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index] ?? '';
    const { flag, inline } = splitInlineValue(arg);

    if (flag === '--verbose' || flag === '-v') {
      verbose = true;
    } else if (flag === '--no-metadata') {
      metadata = false;
    } else if (isValueFlag(flag)) {
      const value = inline ?? argv[index + 1];
      if (value === undefined || (inline === undefined && value.startsWith('-'))) {
        throw new Error(`Missing value for ${flag}.`);
      }
      if (inline === undefined) {
        index += 1;
      }
      values[flag] = value;
    } else if (arg.startsWith('-')) {
      throw new Error(`Unknown option "${arg}".\n${USAGE}`);
    } else {
      positional.push(arg);
    }
  }

  const [directory, ...extra] = positional;
  if (directory === undefined) {
    throw new Error(`Missing MIDI directory.\n${USAGE}`);
  }
  if (extra.length) {
    throw new Error(`Unexpected argument "${extra[0]}".\n${USAGE}`);
  }

  return {
    directory,
    verbose,
    metadata,
    ...(values['--report'] === undefined ? {} : { reportPath: values['--report'] }),
    ...(values['--catalog'] === undefined ? {} : { catalogPath: values['--catalog'] }),
    top: resolveIntegerSetting('top', values['--top'] ?? env.FORMSCAN_TOP, DEFAULT_TOP, 1),
    track: resolveIntegerSetting('track', values['--track'] ?? env.FORMSCAN_TRACK, DEFAULT_TRACK, 0),
    concurrency: resolveIntegerSetting(
      'concurrency',
      values['--concurrency'] ?? env.FORMSCAN_CONCURRENCY,
      DEFAULT_CONCURRENCY,
      1,
    ),
  };
};
