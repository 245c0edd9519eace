/**
 * A course folder on disk.
 */
export interface Course {
  /** Short course code, e.g. `EAS103` */
  code: string;
  /** Folder name under the notes root, e.g. `EAS103-premodern-east-asia` */
  dirName: string;
  /** Absolute path of the folder */
  path: string;
}

/**
 * A note file inside a course folder.
 */
export interface Note {
  course: Course;
  /** File name inside the course folder, e.g. `binomial-heaps.md` */
  fileName: string;
  /** Absolute path of the file */
  path: string;
  /** Title the note was created with, absent for untitled notes */
  title?: string;
}

/**
 * Per-root settings, stored in the marker file.
 */
export interface RootSettings {
  /** Prefix note file names with the local date (`YYYY-MM-DD-`) */
  datePrefix: boolean;
  /** Write YAML frontmatter into new notes instead of leaving them empty */
  frontmatter: boolean;
}

/**
 * The top-level directory under which all course folders live.
 */
export interface NotesRoot {
  path: string;
  /** Marker file the root was discovered through, if any */
  markerPath?: string;
  settings: RootSettings;
}

/**
 * Explicit configuration for a Noter instance.
 */
export interface NoterOptions {
  /** Directory the invocation runs from */
  cwd: string;
  /** Root override, usually from `NOTER_ROOT` */
  envRoot?: string;
  /** Clock used for date prefixes and frontmatter */
  now?: () => Date;
  /** Settings that take precedence over the marker file */
  settings?: Partial<RootSettings>;
}

/**
 * Fields rendered into a note's frontmatter.
 */
export interface NoteFrontmatter {
  title?: string;
  course: string;
  created: Date;
}
