import log from 'loglevel';
import { NOTES_CONFIG } from '../config.js';
import {
  AlreadyExistsError, AmbiguousCourseError, InvalidArgumentError, isErrnoException,
} from './errors.js';
import type { NoteFrontmatter } from './type.js';

const { SEPARATOR, NOTE_EXTENSION, UNTITLED_BASENAME } = NOTES_CONFIG;

/**
 * Turn arbitrary text into a lower-case, filesystem-safe slug.
 * Runs of anything that is not a letter or digit collapse into a single `-`.
 *
 * @param text - Human text, e.g. a course or note title
 * @param maxLength - Longest slug to return, in code points
 * @returns The slug, possibly empty
 */
export function slugify(text: string, maxLength: number = NOTES_CONFIG.MAX_SLUG_LENGTH): string {
  const slug = text
    .normalize('NFKD')
    .toLowerCase()
    .replace(/\p{M}/gu, '')
    .replace(/[^\p{L}\p{N}]+/gu, SEPARATOR)
    .replace(/^-+|-+$/g, '');
  const codePoints = Array.from(slug);
  if (codePoints.length <= maxLength) {
    return slug;
  }
  return codePoints.slice(0, maxLength).join('').replace(/-+$/, '');
}

/**
 * Check a course code and return it trimmed.
 * Codes are used verbatim as the leading segment of a folder name, so only
 * letters, digits and underscores are accepted.
 *
 * @throws InvalidArgumentError if the code is empty or holds other characters
 */
export function validateCourseCode(code: string): string {
  const trimmed = code.trim();
  if (trimmed.length === 0) {
    throw new InvalidArgumentError('Course code must not be empty');
  }
  if (!/^[A-Za-z0-9_]+$/.test(trimmed)) {
    throw new InvalidArgumentError(
      `Course code "${trimmed}" may only contain letters, digits and underscores`,
    );
  }
  return trimmed;
}

/**
 * Folder name for a course: `<code>-<slug(title)>`, or the bare code when
 * the title has nothing sluggable in it.
 */
export function courseDirName(code: string, title: string): string {
  const slug = slugify(title);
  return slug ? `${code}${SEPARATOR}${slug}` : code;
}

/**
 * Whether a folder name belongs to a course code.
 * Accepts `CODE`, `CODE-anything` and the older `CODE Title` layout,
 * ignoring case.
 */
export function matchesCourseCode(dirName: string, code: string): boolean {
  const name = dirName.toLowerCase();
  const prefix = code.toLowerCase();
  if (name === prefix) {
    return true;
  }
  if (name.startsWith(`${prefix}${SEPARATOR}`)) {
    return true;
  }
  return name.startsWith(`${prefix} `) && name.length > prefix.length + 1;
}

/**
 * Pick the folder for a course code out of a directory listing.
 *
 * @param dirNames - Names of the directories under the notes root
 * @param code - Course code to look for
 * @returns The matching folder name, or undefined if none matches
 * @throws AmbiguousCourseError if more than one folder matches
 */
export function selectCourseDir(dirNames: string[], code: string): string | undefined {
  const matches = dirNames.filter((name) => matchesCourseCode(name, code)).sort();
  if (matches.length > 1) {
    throw new AmbiguousCourseError(code, matches);
  }
  return matches[0];
}

/**
 * Local calendar date as `YYYY-MM-DD`.
 */
export function formatDate(date: Date): string {
  const year = date.getFullYear().toString().padStart(4, '0');
  const month = (date.getMonth() + 1).toString().padStart(2, '0');
  const day = date.getDate().toString().padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * File name for a titled note, or undefined when the title slugs to nothing.
 *
 * @param title - Note title as typed by the user
 * @param prefix - Prepended verbatim, e.g. `2024-09-03-`
 */
export function titledNoteName(title: string, prefix = ''): string | undefined {
  const slug = slugify(title);
  if (!slug) {
    return undefined;
  }
  return `${prefix}${slug}${NOTE_EXTENSION}`;
}

/**
 * Lowest-numbered `untitled-<n>.md` (n from 1) missing from a listing.
 *
 * @param existingNames - File names already in the course folder
 * @param prefix - Prepended verbatim, e.g. `2024-09-03-`
 */
export function nextUntitledName(existingNames: Iterable<string>, prefix = ''): string {
  const taken = new Set(existingNames);
  let index = 1;
  while (taken.has(untitledName(index, prefix))) {
    index += 1;
  }
  return untitledName(index, prefix);
}

/**
 * Claim an untitled note name, moving on to the next number whenever
 * `create` reports the chosen name as taken (`EEXIST`).
 *
 * @param dirPath - Course folder, used in the error message
 * @param existingNames - Listing of the folder taken before the first attempt
 * @param prefix - Prepended verbatim, e.g. `2024-09-03-`
 * @param create - Exclusively creates the given file name
 * @param maxAttempts - Names to try before giving up
 * @returns The file name that was created
 * @throws AlreadyExistsError once every attempt found its name taken
 */
export async function claimUntitledName(
  dirPath: string,
  existingNames: Iterable<string>,
  prefix: string,
  create: (fileName: string) => Promise<void>,
  maxAttempts: number = NOTES_CONFIG.MAX_UNTITLED_ATTEMPTS,
): Promise<string> {
  const taken = new Set(existingNames);
  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const fileName = nextUntitledName(taken, prefix);
    try {
      await create(fileName);
      return fileName;
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'EEXIST') {
        throw error;
      }
      log.debug(`${fileName} was taken while creating it, trying the next number`);
      taken.add(fileName);
    }
  }
  throw new AlreadyExistsError(dirPath, `Gave up finding a free untitled note name in ${dirPath}`);
}

const untitledName = (index: number, prefix: string): string => (
  `${prefix}${UNTITLED_BASENAME}${SEPARATOR}${index}${NOTE_EXTENSION}`
);

/**
 * Generate YAML frontmatter for a new note.
 *
 * @returns Frontmatter with `---` delimiters and a trailing blank line
 */
export function renderFrontmatter(fields: NoteFrontmatter): string {
  const frontmatter: string[] = ['---'];

  if (fields.title !== undefined) {
    const title = fields.title.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
    frontmatter.push(`title: "${title}"`);
  }
  frontmatter.push(`course: ${fields.course}`);
  frontmatter.push(`created: ${fields.created.toISOString()}`);

  frontmatter.push('---');
  return `${frontmatter.join('\n')}\n\n`;
}
