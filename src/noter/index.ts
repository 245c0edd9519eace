import fse from 'fs-extra';
import log from 'loglevel';
import * as path from 'path';
import { NOTES_CONFIG } from '../config.js';
import { AlreadyExistsError, CourseNotFoundError, toNoterError } from './errors.js';
import { resolveNotesRoot } from './notes_root.js';
import { mergeRootSettings } from './schemas.js';
import type {
  Course, Note, NotesRoot, NoterOptions, RootSettings,
} from './type.js';
import {
  claimUntitledName, courseDirName, formatDate, matchesCourseCode, renderFrontmatter,
  selectCourseDir, titledNoteName, validateCourseCode,
} from './utils.js';

/**
 * Creates course folders and note files under a notes root.
 * Every create is a single exclusive filesystem call; an existing name is
 * never overwritten.
 */
class Noter {
  /** The notes root this instance works in */
  private readonly root: NotesRoot;

  /** Clock for date prefixes and frontmatter */
  private readonly now: () => Date;

  /**
   * Private constructor. Use newNoter() static method to create instances.
   *
   * @param root - The resolved notes root
   * @param now - Clock used when naming and templating notes
   */
  private constructor(root: NotesRoot, now: () => Date) {
    this.root = root;
    this.now = now;
  }

  /**
   * Factory method to create a new Noter instance.
   * Resolves the notes root from the options and applies settings overrides.
   *
   * @param options - Working directory, root override, clock and settings
   * @returns A Noter bound to the resolved root
   */
  static async newNoter(options: NoterOptions): Promise<Noter> {
    const root = await resolveNotesRoot(options.cwd, options.envRoot);
    const settings = mergeRootSettings(root.settings, options.settings);
    return new Noter({ ...root, settings }, options.now ?? (() => new Date()));
  }

  /** Absolute path of the notes root */
  get rootPath(): string {
    return this.root.path;
  }

  /** Effective settings after overrides */
  get settings(): RootSettings {
    return { ...this.root.settings };
  }

  /**
   * Create the folder for a new course.
   *
   * @param code - Course code, e.g. `EAS103`
   * @param title - Course title, e.g. `Premodern East Asia`
   * @returns The created course
   * @throws InvalidArgumentError if the code is empty or unsafe
   * @throws AlreadyExistsError if a folder for the code already exists
   * @throws NoterIOError on any other filesystem failure
   */
  async createCourse(code: string, title: string): Promise<Course> {
    const courseCode = validateCourseCode(code);
    const dirName = courseDirName(courseCode, title);
    const dirPath = path.join(this.root.path, dirName);

    const existing = (await this.listCourseDirs()).find((name) => matchesCourseCode(name, courseCode));
    if (existing) {
      throw new AlreadyExistsError(
        path.join(this.root.path, existing),
        `Folder for ${courseCode} already exists: ${existing}`,
      );
    }

    try {
      await fse.mkdir(dirPath);
    } catch (error) {
      throw toNoterError(error, dirPath, 'create folder');
    }
    log.debug(`Created course folder ${dirPath}`);
    return { code: courseCode, dirName, path: dirPath };
  }

  /**
   * Find the folder of an existing course.
   *
   * @param code - Course code to look for
   * @returns The matching course
   * @throws CourseNotFoundError if no folder matches
   * @throws AmbiguousCourseError if several folders match
   */
  async findCourse(code: string): Promise<Course> {
    const courseCode = validateCourseCode(code);
    const dirName = selectCourseDir(await this.listCourseDirs(), courseCode);
    if (!dirName) {
      throw new CourseNotFoundError(courseCode, this.root.path);
    }
    log.debug(`Course ${courseCode} resolved to ${dirName}`);
    return { code: courseCode, dirName, path: path.join(this.root.path, dirName) };
  }

  /**
   * Create a note in a course folder.
   * A title becomes the slugged file name; without one the note is numbered
   * `untitled-<n>` with the lowest free n.
   *
   * @param code - Course code of an existing course
   * @param title - Optional note title
   * @returns The created note
   * @throws CourseNotFoundError if no folder matches the code
   * @throws AlreadyExistsError if a note with the same title already exists
   * @throws NoterIOError on any other filesystem failure
   */
  async createNote(code: string, title?: string): Promise<Note> {
    const course = await this.findCourse(code);
    const created = this.now();
    const prefix = this.root.settings.datePrefix ? `${formatDate(created)}-` : '';

    const trimmed = title?.trim();
    const noteTitle = trimmed ? trimmed : undefined;
    const titledName = noteTitle ? titledNoteName(noteTitle, prefix) : undefined;
    if (noteTitle && !titledName) {
      log.warn(`Title "${noteTitle}" has no usable characters, creating an untitled note`);
    }

    const content = this.root.settings.frontmatter
      ? renderFrontmatter({ title: noteTitle, course: course.code, created })
      : '';

    if (titledName) {
      const notePath = path.join(course.path, titledName);
      await this.writeNewFile(notePath, content);
      return {
        course, fileName: titledName, path: notePath, title: noteTitle,
      };
    }

    const fileName = await this.writeUntitledNote(course, prefix, content);
    const note: Note = { course, fileName, path: path.join(course.path, fileName) };
    if (noteTitle) {
      note.title = noteTitle;
    }
    return note;
  }

  /**
   * Write an untitled note under the lowest free number.
   *
   * @returns The file name that was written
   */
  private async writeUntitledNote(course: Course, prefix: string, content: string): Promise<string> {
    let names: string[];
    try {
      names = await fse.readdir(course.path);
    } catch (error) {
      throw toNoterError(error, course.path, 'list');
    }

    try {
      const fileName = await claimUntitledName(course.path, names, prefix, async (name) => {
        await fse.writeFile(path.join(course.path, name), content, { encoding: NOTES_CONFIG.ENCODING, flag: 'wx' });
      });
      log.debug(`Created note ${path.join(course.path, fileName)}`);
      return fileName;
    } catch (error) {
      throw toNoterError(error, course.path, 'create note in');
    }
  }

  /**
   * Create a file that must not exist yet.
   */
  private async writeNewFile(filePath: string, content: string): Promise<void> {
    try {
      await fse.writeFile(filePath, content, { encoding: NOTES_CONFIG.ENCODING, flag: 'wx' });
    } catch (error) {
      throw toNoterError(error, filePath, 'create note');
    }
    log.debug(`Created note ${filePath}`);
  }

  /**
   * Names of the directories directly under the notes root.
   */
  private async listCourseDirs(): Promise<string[]> {
    try {
      const entries = await fse.readdir(this.root.path, { withFileTypes: true });
      return entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
    } catch (error) {
      throw toNoterError(error, this.root.path, 'list');
    }
  }
}

export default Noter;
