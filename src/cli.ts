import { Command, CommanderError } from 'commander';
import fse from 'fs-extra';
import log from 'loglevel';
import ora from 'ora';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { EnvConfig, loadEnv } from './config.js';
import Noter from './noter/index.js';
import { NoterError, NoterErrorKind } from './noter/errors.js';
import { initNotesRoot } from './noter/notes_root.js';
import type { RootSettings } from './noter/type.js';

/** Process exit codes, by error kind */
export const EXIT_CODES: Record<NoterErrorKind, number> = {
  IOError: 1,
  InvalidArgument: 2,
  CourseNotFound: 3,
  AmbiguousCourse: 3,
  AlreadyExists: 4,
};

/**
 * Everything the CLI touches outside its arguments.
 */
export interface CliContext {
  cwd: string;
  env: NodeJS.ProcessEnv;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  now?: () => Date;
}

interface SettingsFlags {
  date?: boolean;
  frontmatter?: boolean;
}

const PackageJsonSchema = z.object({ version: z.string() });

const readVersion = (): string => {
  const packageJsonPath = fileURLToPath(new URL('../package.json', import.meta.url));
  return PackageJsonSchema.parse(fse.readJsonSync(packageJsonPath)).version;
};

const toSettings = (flags: SettingsFlags): Partial<RootSettings> => ({
  datePrefix: flags.date,
  frontmatter: flags.frontmatter,
});

const joinWords = (words: string[]): string => words.join(' ').trim();

/**
 * Map a thrown value to the exit code the process should end with.
 */
export const exitCodeFor = (error: unknown): number => {
  if (error instanceof CommanderError) {
    return error.exitCode;
  }
  if (error instanceof NoterError) {
    return EXIT_CODES[error.kind];
  }
  return 1;
};

/**
 * Run one step behind a spinner, finishing it with the outcome.
 *
 * @param text - Spinner text while the step runs
 * @param ctx - Streams to report to
 * @param task - The step; resolves to the success message and the path it created
 */
const withSpinner = async (
  text: string,
  ctx: CliContext,
  task: () => Promise<{ message: string, createdPath: string }>,
): Promise<void> => {
  const spinner = ora({ text, stream: ctx.stderr }).start();
  try {
    const { message, createdPath } = await task();
    spinner.succeed(message);
    ctx.stdout.write(`${createdPath}\n`);
  } catch (error) {
    spinner.fail(error instanceof Error ? error.message : String(error));
    throw error;
  }
};

/**
 * Build the command tree. Actions read configuration from `ctx` and `env` only.
 */
export const buildProgram = (ctx: CliContext, env: EnvConfig): Command => {
  const program = new Command();

  program
    .name('noter')
    .description('Keep course notes in one folder per course')
    .version(readVersion())
    .option('-v, --verbose', 'log every resolution step')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => ctx.stdout.write(str),
      writeErr: (str) => ctx.stderr.write(str),
    });

  const newNoter = (flags: SettingsFlags = {}): Promise<Noter> => Noter.newNoter({
    cwd: ctx.cwd,
    envRoot: env.NOTER_ROOT,
    now: ctx.now,
    settings: toSettings(flags),
  });

  program
    .command('init')
    .description('mark the current directory as the root of all notes folders')
    .option('--date', 'prefix note file names with the date')
    .option('--frontmatter', 'write frontmatter into new notes')
    .action(async (flags: SettingsFlags) => {
      await withSpinner('Marking notes root...', ctx, async () => {
        const root = await initNotesRoot(ctx.cwd, toSettings(flags));
        return { message: `Marked ${root.path} as notes root`, createdPath: root.markerPath ?? root.path };
      });
    });

  program
    .command('course')
    .description('create the folder for a course')
    .argument('<code>', 'course code, e.g. EAS103')
    .argument('<title...>', 'course title, e.g. "Premodern East Asia"')
    .action(async (code: string, titleWords: string[]) => {
      await withSpinner(`Creating folder for ${code}...`, ctx, async () => {
        const noter = await newNoter();
        const course = await noter.createCourse(code, joinWords(titleWords));
        return { message: `Created folder ${course.dirName}`, createdPath: course.path };
      });
    });

  program
    .command('new')
    .description('create a note in a course folder')
    .argument('<code>', 'code of an existing course')
    .argument('[title...]', 'note title; omit for an untitled note')
    .option('--date', 'prefix the file name with the date')
    .option('--frontmatter', 'write frontmatter into the note')
    .action(async (code: string, titleWords: string[], flags: SettingsFlags) => {
      await withSpinner(`Creating note for ${code}...`, ctx, async () => {
        const noter = await newNoter(flags);
        const title = joinWords(titleWords);
        const note = await noter.createNote(code, title || undefined);
        return { message: `Created ${note.course.code}::${note.fileName}`, createdPath: note.path };
      });
    });

  program.hook('preAction', () => {
    if (program.opts<{ verbose?: boolean }>().verbose) {
      log.setLevel('debug', false);
    }
  });

  return program;
};

/**
 * Parse `argv` and run the selected command.
 *
 * @param argv - Full argument vector, including the node and script entries
 * @param ctx - Working directory, environment and output streams
 * @returns The exit code for the process
 */
export const run = async (argv: string[], ctx: CliContext): Promise<number> => {
  let env: EnvConfig;
  try {
    env = loadEnv(ctx.env);
  } catch (error) {
    ctx.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    return exitCodeFor(error);
  }
  log.setLevel(env.NOTER_LOG_LEVEL, false);

  try {
    await buildProgram(ctx, env).parseAsync(argv);
    return 0;
  } catch (error) {
    if (!(error instanceof CommanderError) && !(error instanceof NoterError)) {
      log.debug(error);
    }
    return exitCodeFor(error);
  }
};
