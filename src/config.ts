import { z } from 'zod';
import { InvalidArgumentError } from './noter/errors.js';

/** Log levels understood by loglevel, most verbose first */
export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const;

// An empty variable counts as unset
const optionalString = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string().optional(),
);

const EnvSchema = z.object({
  NOTER_ROOT: optionalString,
  NOTER_LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' && value !== '' ? value.toLowerCase() : undefined),
    z.enum(LOG_LEVELS).default('warn'),
  ),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

// Notes layout
export const NOTES_CONFIG = {
  MARKER_FILE: '.noter.json',
  NOTE_EXTENSION: '.md',
  UNTITLED_BASENAME: 'untitled',
  SEPARATOR: '-',
  MAX_SLUG_LENGTH: 80,
  MAX_UNTITLED_ATTEMPTS: 100,
  JSON_INDENT: 2,
  ENCODING: 'utf-8' as const,
} as const;

/**
 * Read the environment variables noter cares about.
 *
 * @param env - Usually `process.env`
 * @throws InvalidArgumentError if a variable holds an unusable value
 */
export function loadEnv(env: NodeJS.ProcessEnv): EnvConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const name = issue?.path.join('.') ?? 'environment';
    throw new InvalidArgumentError(`Invalid ${name}: ${issue?.message ?? 'unknown problem'}`);
  }
  return parsed.data;
}
