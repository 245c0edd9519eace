import fse from 'fs-extra';
import log from 'loglevel';
import * as path from 'path';
import { NOTES_CONFIG } from '../config.js';
import { InvalidArgumentError, NoterIOError, toNoterError } from './errors.js';
import { DEFAULT_ROOT_SETTINGS, RootSettingsSchema, mergeRootSettings } from './schemas.js';
import type { NotesRoot, RootSettings } from './type.js';

/**
 * Check if a path is an existing directory.
 *
 * @param dirPath - Path to check
 * @returns True if path is a directory, false otherwise
 */
const isDirectory = async (dirPath: string): Promise<boolean> => {
  try {
    const stat = await fse.stat(dirPath);
    return stat.isDirectory();
  } catch (error) {
    return false;
  }
};

/**
 * Read and validate the settings stored in a marker file.
 *
 * @param markerPath - Path to `.noter.json`
 * @returns Settings with defaults filled in
 * @throws InvalidArgumentError if the file is not valid settings JSON
 * @throws NoterIOError if the file cannot be read
 */
export const readRootSettings = async (markerPath: string): Promise<RootSettings> => {
  let content: string;
  try {
    content = await fse.readFile(markerPath, NOTES_CONFIG.ENCODING);
  } catch (error) {
    throw toNoterError(error, markerPath, 'read');
  }

  let raw: unknown;
  try {
    raw = content.trim() === '' ? {} : JSON.parse(content);
  } catch (error) {
    throw new InvalidArgumentError(`${markerPath} is not valid JSON`, { cause: error });
  }

  const parsed = RootSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new InvalidArgumentError(`Invalid settings in ${markerPath}: ${detail}`);
  }
  return parsed.data;
};

/**
 * Walk up from a directory looking for the marker file.
 *
 * @param startDir - Directory to start from (checked itself first)
 * @returns Directory holding the marker, or undefined if none up to the filesystem root
 */
export const findMarkedRoot = async (startDir: string): Promise<string | undefined> => {
  let dir = path.resolve(startDir);
  for (;;) {
    if (await fse.pathExists(path.join(dir, NOTES_CONFIG.MARKER_FILE))) {
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return undefined;
    }
    dir = parent;
  }
};

/**
 * Load a root's settings if it carries a marker file.
 */
const loadRoot = async (rootPath: string): Promise<NotesRoot> => {
  const markerPath = path.join(rootPath, NOTES_CONFIG.MARKER_FILE);
  if (!await fse.pathExists(markerPath)) {
    return { path: rootPath, settings: { ...DEFAULT_ROOT_SETTINGS } };
  }
  return { path: rootPath, markerPath, settings: await readRootSettings(markerPath) };
};

/**
 * Decide which directory is the notes root for this invocation.
 * An explicit root wins, then the nearest marked ancestor, then `cwd`.
 *
 * @param cwd - Directory the invocation runs from
 * @param envRoot - Explicit root, resolved against `cwd`
 * @throws NoterIOError if the explicit root is not a directory
 */
export const resolveNotesRoot = async (cwd: string, envRoot?: string): Promise<NotesRoot> => {
  if (envRoot) {
    const rootPath = path.resolve(cwd, envRoot);
    if (!await isDirectory(rootPath)) {
      throw new NoterIOError(`Notes root ${rootPath} is not a directory`);
    }
    log.debug(`Using notes root from environment: ${rootPath}`);
    return loadRoot(rootPath);
  }

  const marked = await findMarkedRoot(cwd);
  if (marked) {
    log.debug(`Found notes root marker in ${marked}`);
    return loadRoot(marked);
  }

  const rootPath = path.resolve(cwd);
  log.debug(`No notes root marker found, using ${rootPath}`);
  return { path: rootPath, settings: { ...DEFAULT_ROOT_SETTINGS } };
};

/**
 * Mark a directory as a notes root by writing the marker file.
 *
 * @param dirPath - Directory to mark
 * @param settings - Settings to store; omitted fields take their defaults
 * @returns The new root
 * @throws AlreadyExistsError if the directory is already marked
 */
export const initNotesRoot = async (
  dirPath: string,
  settings: Partial<RootSettings> = {},
): Promise<NotesRoot> => {
  const rootPath = path.resolve(dirPath);
  const markerPath = path.join(rootPath, NOTES_CONFIG.MARKER_FILE);
  const fullSettings = mergeRootSettings(DEFAULT_ROOT_SETTINGS, settings);
  const body = `${JSON.stringify(fullSettings, null, NOTES_CONFIG.JSON_INDENT)}\n`;
  try {
    await fse.writeFile(markerPath, body, { encoding: NOTES_CONFIG.ENCODING, flag: 'wx' });
  } catch (error) {
    throw toNoterError(error, markerPath, 'write');
  }
  log.debug(`Wrote notes root marker ${markerPath}`);
  return { path: rootPath, markerPath, settings: fullSettings };
};
