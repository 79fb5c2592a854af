import { describeError } from '@enrich/core';
import { ConfigError, JOB_NAMES, isJobName, loadConfig } from './env';
import type { LoadConfigOptions } from './env';
import { logger, runJob } from './runner';
import type { JobDependencies } from './runner';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export function usage(): string {
  return `Usage: enrich <${JOB_NAMES.join('|')}>`;
}

/**
 * Runs one batch and resolves with the process exit code. Reaching the
 * credit ceiling is normal operation and exits 0.
 */
export async function main(
  argv: string[] = process.argv.slice(2),
  options: LoadConfigOptions & { overrides?: Partial<JobDependencies> } = {}
): Promise<number> {
  const [job] = argv;
  if (!isJobName(job)) {
    process.stderr.write(`${usage()}\n`);
    return EXIT_USAGE;
  }

  try {
    const config = await loadConfig(job, options);
    await runJob(config, options.overrides);
    return EXIT_OK;
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error('Invalid configuration', { variable: error.variable, error: error.message });
    } else {
      logger.error('Batch failed', { error: describeError(error) });
    }
    return EXIT_FAILURE;
  }
}
