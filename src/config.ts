import fs from 'node:fs';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors';
import logger from './logger';
import type { Config } from './types';

const DEFAULT_CONFIG_FILE = '/etc/aurstep.conf';

const LOG_LEVELS = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

const flag = (fallback: boolean) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value) =>
      value === undefined || value === ''
        ? fallback
        : ['1', 'true', 'yes', 'on'].includes(value.toLowerCase()),
    );

const str = (fallback: string) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value) => value || fallback);

const schema = z.object({
  SU_PROGRAM: str('sudo'),
  AUTORUN: flag(false),
  BUILD_DIRECTORY: str('/tmp/aurstep'),
  LOG_FILENAME: str('/tmp/aurstep.log'),
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .optional()
    .transform((value): LogLevel => {
      if (!value) {
        return 'info';
      }
      if (isLogLevel(value)) {
        return value;
      }
      logger.warn(`Unknown LOG_LEVEL "${value}", using info.`);
      return 'info';
    }),
  REVIEW_PKGBUILD: flag(false),
  AUR_URL: str('https://aur.archlinux.org'),
});

const readConfigFile = (file: string): Record<string, string> => {
  try {
    return dotenv.parse(fs.readFileSync(file, { encoding: 'utf8' }));
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return {};
    }
    throw new ConfigError(`Can not read config file ${file}. Reason: ${err}`);
  }
};

/**
 * Builds the run configuration. Values from the environment take precedence
 * over the ones in the config file (same rule as `dotenv.config`).
 */
const loadConfig = (
  file: string = DEFAULT_CONFIG_FILE,
  env: NodeJS.ProcessEnv = process.env,
): Config => {
  const parsed = schema.safeParse({ ...readConfigFile(file), ...env });
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration. ${issues}`);
  }
  const values = parsed.data;
  return Object.freeze({
    suProgram: values.SU_PROGRAM,
    autorun: values.AUTORUN,
    buildDirectory: values.BUILD_DIRECTORY,
    logFilename: values.LOG_FILENAME,
    logLevel: values.LOG_LEVEL,
    reviewBuildScript: values.REVIEW_PKGBUILD,
    aurUrl: values.AUR_URL,
  });
};

const formatConfig = (config: Config): string =>
  [
    '[General]',
    `  SU program: ${config.suProgram}`,
    `  Autorun: ${config.autorun}`,
    `  Build directory: ${config.buildDirectory}`,
    `  Log file: ${config.logFilename}`,
    `  Log level: ${config.logLevel}`,
    `  AUR: ${config.aurUrl}`,
    '[Install]',
    `  Review PKGBUILD: ${config.reviewBuildScript}`,
  ].join('\n');

export { DEFAULT_CONFIG_FILE, loadConfig, formatConfig };
