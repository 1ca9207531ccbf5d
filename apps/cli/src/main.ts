import { normalize, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { runCorpus } from './index.js';
import { resolveCliOptions } from './options.js';

const toComparableEntrypointPath = (entryPath: string): string => {
  if (/^[a-zA-Z]:[\\/]/.test(entryPath)) {
    return entryPath;
  }
  return resolve(entryPath);
};

const normalizeEntrypointPath = (entryPath: string): string => {
  const slashNormalized = normalize(entryPath).replaceAll('\\', '/');
  const withoutDrivePrefixSlash = slashNormalized.replace(/^\/([a-zA-Z]:)/, '$1');
  return withoutDrivePrefixSlash.replace(/^([a-zA-Z]:)/, (_, driveLetter: string) => driveLetter.toLowerCase());
};

export const isCliEntrypointInvocation = (moduleUrl: string, argvPath: string | undefined): boolean => {
  if (!argvPath) {
    return false;
  }

  return (
    normalizeEntrypointPath(toComparableEntrypointPath(fileURLToPath(moduleUrl))) ===
    normalizeEntrypointPath(toComparableEntrypointPath(argvPath))
  );
};

export const main = async (argv: readonly string[], env: NodeJS.ProcessEnv = process.env): Promise<number> => {
  try {
    const run = await runCorpus(resolveCliOptions(argv, env));
    return run.exitCode;
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error.';
    process.stderr.write(`Error: ${message}\n`);
    return 1;
  }
};

if (isCliEntrypointInvocation(import.meta.url, process.argv[1])) {
  process.exitCode = await main(process.argv.slice(2));
}
