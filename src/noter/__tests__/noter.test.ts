import fse from 'fs-extra';
import log from 'loglevel';
import * as os from 'os';
import * as path from 'path';
import {
  afterEach, beforeEach, describe, expect, test, vi,
} from 'vitest';
import Noter from '../index.js';
import {
  AlreadyExistsError, AmbiguousCourseError, CourseNotFoundError, InvalidArgumentError, NoterIOError,
} from '../errors.js';
import type { RootSettings } from '../type.js';
import { claimUntitledName } from '../utils.js';

const FIXED_NOW = new Date(2024, 8, 3, 10, 30, 0);

describe('Noter', () => {
  let root: string;

  beforeEach(async () => {
    root = await fse.mkdtemp(path.join(os.tmpdir(), 'noter-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fse.remove(root);
  });

  const newNoter = (settings: Partial<RootSettings> = {}) => Noter.newNoter({ cwd: root, now: () => FIXED_NOW, settings });

  describe('createCourse', () => {
    test('creates a folder named from code and slugged title', async () => {
      const noter = await newNoter();
      const course = await noter.createCourse('EAS103', 'Premodern East Asia');

      expect(course).toEqual({
        code: 'EAS103',
        dirName: 'EAS103-premodern-east-asia',
        path: path.join(root, 'EAS103-premodern-east-asia'),
      });
      expect((await fse.stat(course.path)).isDirectory()).toBe(true);
    });

    test('uses the bare code when the title is empty', async () => {
      const noter = await newNoter();
      const course = await noter.createCourse('MAT137', '');
      expect(await fse.readdir(root)).toEqual(['MAT137']);
      expect(course.dirName).toBe('MAT137');
    });

    test('fails the second time for the same code', async () => {
      const noter = await newNoter();
      await noter.createCourse('EAS103', 'Premodern East Asia');

      await expect(noter.createCourse('EAS103', 'Premodern East Asia')).rejects.toThrow(AlreadyExistsError);
      await expect(noter.createCourse('eas103', 'Another Title')).rejects.toThrow(AlreadyExistsError);
      expect(await fse.readdir(root)).toEqual(['EAS103-premodern-east-asia']);
    });

    test('does not replace a file in the way', async () => {
      await fse.writeFile(path.join(root, 'HIS101-rome'), 'keep me');
      const noter = await newNoter();

      await expect(noter.createCourse('HIS101', 'Rome')).rejects.toThrow(AlreadyExistsError);
      expect(await fse.readFile(path.join(root, 'HIS101-rome'), 'utf-8')).toBe('keep me');
    });

    test('fails with AlreadyExists when several folders hold the code', async () => {
      await fse.mkdir(path.join(root, 'CSC263-fall'));
      await fse.mkdir(path.join(root, 'CSC263-winter'));
      const noter = await newNoter();

      await expect(noter.createCourse('CSC263', 'Spring')).rejects.toThrow(AlreadyExistsError);
      expect((await fse.readdir(root)).sort()).toEqual(['CSC263-fall', 'CSC263-winter']);
    });

    test('rejects unsafe codes', async () => {
      const noter = await newNoter();
      await expect(noter.createCourse('../up', 'Escape')).rejects.toThrow(InvalidArgumentError);
      expect(await fse.readdir(root)).toEqual([]);
    });

    test('reports a missing root as an IO error', async () => {
      const noter = await newNoter();
      await fse.remove(root);
      await expect(noter.createCourse('EAS103', 'Premodern East Asia')).rejects.toThrow(NoterIOError);
    });
  });

  describe('createNote', () => {
    test('creates a titled note inside the course folder', async () => {
      await fse.mkdir(path.join(root, 'CSC263-data-structures'));
      const noter = await newNoter();

      const note = await noter.createNote('CSC263', 'Binomial Heaps');

      expect(note.fileName).toBe('binomial-heaps.md');
      expect(note.path).toBe(path.join(root, 'CSC263-data-structures', 'binomial-heaps.md'));
      expect(note.title).toBe('Binomial Heaps');
      expect(await fse.readFile(note.path, 'utf-8')).toBe('');
    });

    test('numbers untitled notes without collisions', async () => {
      await fse.mkdir(path.join(root, 'EAS330-modern-japan'));
      const noter = await newNoter();

      const first = await noter.createNote('EAS330');
      const second = await noter.createNote('EAS330');

      expect(first.fileName).toBe('untitled-1.md');
      expect(second.fileName).toBe('untitled-2.md');
      expect((await fse.readdir(path.join(root, 'EAS330-modern-japan'))).sort())
        .toEqual(['untitled-1.md', 'untitled-2.md']);
    });

    test('reuses the lowest free untitled number', async () => {
      const courseDir = path.join(root, 'EAS330-modern-japan');
      await fse.mkdir(courseDir);
      await fse.writeFile(path.join(courseDir, 'untitled-2.md'), '');
      const noter = await newNoter();

      expect((await noter.createNote('EAS330')).fileName).toBe('untitled-1.md');
      expect((await noter.createNote('EAS330')).fileName).toBe('untitled-3.md');
    });

    test('treats a blank title as untitled', async () => {
      await fse.mkdir(path.join(root, 'EAS330-modern-japan'));
      const noter = await newNoter();
      const note = await noter.createNote('EAS330', '   ');
      expect(note.fileName).toBe('untitled-1.md');
      expect(note.title).toBeUndefined();
    });

    test('falls back to untitled when the title has no usable characters', async () => {
      await fse.mkdir(path.join(root, 'EAS330-modern-japan'));
      const warn = vi.spyOn(log, 'warn').mockImplementation(() => undefined);
      const noter = await newNoter();

      const note = await noter.createNote('EAS330', '???');

      expect(note.fileName).toBe('untitled-1.md');
      expect(note.title).toBe('???');
      expect(warn).toHaveBeenCalledWith('Title "???" has no usable characters, creating an untitled note');
    });

    test('names the file exactly as written for long titles with astral letters', async () => {
      await fse.mkdir(path.join(root, 'CSC263-data-structures'));
      const noter = await newNoter();

      const note = await noter.createNote('CSC263', `${'a'.repeat(79)}\u{20000}b`);

      expect(note.fileName).toBe(`${'a'.repeat(79)}\u{20000}.md`);
      expect(await fse.readdir(path.join(root, 'CSC263-data-structures'))).toEqual([note.fileName]);
    });

    test('never overwrites an existing titled note', async () => {
      const courseDir = path.join(root, 'CSC263-data-structures');
      await fse.mkdir(courseDir);
      await fse.writeFile(path.join(courseDir, 'binomial-heaps.md'), 'old notes');
      const noter = await newNoter();

      await expect(noter.createNote('CSC263', 'Binomial Heaps')).rejects.toThrow(AlreadyExistsError);
      expect(await fse.readFile(path.join(courseDir, 'binomial-heaps.md'), 'utf-8')).toBe('old notes');
    });

    test('fails with CourseNotFound and creates nothing', async () => {
      await fse.mkdir(path.join(root, 'CSC263-data-structures'));
      const noter = await newNoter();

      await expect(noter.createNote('NOPE', 'Anything')).rejects.toThrow(CourseNotFoundError);
      expect(await fse.readdir(root)).toEqual(['CSC263-data-structures']);
      expect(await fse.readdir(path.join(root, 'CSC263-data-structures'))).toEqual([]);
    });

    test('ignores files that look like course folders', async () => {
      await fse.writeFile(path.join(root, 'CSC263-notes.md'), '');
      const noter = await newNoter();
      await expect(noter.createNote('CSC263')).rejects.toThrow(CourseNotFoundError);
    });

    test('finds folders in the space separated layout', async () => {
      await fse.mkdir(path.join(root, 'CSC263 Data Structures'));
      const noter = await newNoter();
      const note = await noter.createNote('csc263', 'Heaps');
      expect(note.path).toBe(path.join(root, 'CSC263 Data Structures', 'heaps.md'));
      expect(note.course.code).toBe('csc263');
    });

    test('refuses to guess between matching folders', async () => {
      await fse.mkdir(path.join(root, 'CSC263-fall'));
      await fse.mkdir(path.join(root, 'CSC263-winter'));
      const noter = await newNoter();
      await expect(noter.createNote('CSC263')).rejects.toThrow(AmbiguousCourseError);
    });

    test('prefixes file names with the date when configured', async () => {
      await fse.mkdir(path.join(root, 'CSC263-data-structures'));
      const noter = await newNoter({ datePrefix: true });

      expect((await noter.createNote('CSC263', 'Binomial Heaps')).fileName).toBe('2024-09-03-binomial-heaps.md');
      expect((await noter.createNote('CSC263')).fileName).toBe('2024-09-03-untitled-1.md');
    });

    test('writes frontmatter when configured', async () => {
      await fse.mkdir(path.join(root, 'CSC263-data-structures'));
      const noter = await newNoter({ frontmatter: true });

      const note = await noter.createNote('CSC263', 'Binomial Heaps');

      expect(await fse.readFile(note.path, 'utf-8')).toBe([
        '---',
        'title: "Binomial Heaps"',
        'course: CSC263',
        `created: ${FIXED_NOW.toISOString()}`,
        '---',
        '',
        '',
      ].join('\n'));
    });
  });

  describe('claimUntitledName', () => {
    const createIn = (dir: string) => async (fileName: string): Promise<void> => {
      await fse.writeFile(path.join(dir, fileName), 'new', { flag: 'wx' });
    };

    test('moves to the next number when a listed-free name was taken meanwhile', async () => {
      const courseDir = path.join(root, 'EAS330-modern-japan');
      await fse.mkdir(courseDir);
      await fse.writeFile(path.join(courseDir, 'untitled-1.md'), 'first');

      const fileName = await claimUntitledName(courseDir, [], '', createIn(courseDir));

      expect(fileName).toBe('untitled-2.md');
      expect(await fse.readFile(path.join(courseDir, 'untitled-1.md'), 'utf-8')).toBe('first');
      expect((await fse.readdir(courseDir)).sort()).toEqual(['untitled-1.md', 'untitled-2.md']);
    });

    test('gives up with AlreadyExists after the attempt limit', async () => {
      const courseDir = path.join(root, 'EAS330-modern-japan');
      await fse.mkdir(courseDir);
      await fse.writeFile(path.join(courseDir, 'untitled-1.md'), '');
      await fse.writeFile(path.join(courseDir, 'untitled-2.md'), '');
      await fse.writeFile(path.join(courseDir, 'untitled-3.md'), '');

      await expect(claimUntitledName(courseDir, [], '', createIn(courseDir), 3))
        .rejects.toThrow(AlreadyExistsError);
      expect((await fse.readdir(courseDir)).sort()).toEqual(['untitled-1.md', 'untitled-2.md', 'untitled-3.md']);
    });

    test('passes other failures through without retrying', async () => {
      const missingDir = path.join(root, 'missing');
      await expect(claimUntitledName(missingDir, [], '', createIn(missingDir)))
        .rejects.toMatchObject({ code: 'ENOENT' });
    });
  });

  test('picks up settings from the root marker', async () => {
    await fse.writeJson(path.join(root, '.noter.json'), { datePrefix: true });
    const noter = await newNoter();
    expect(noter.rootPath).toBe(root);
    expect(noter.settings).toEqual({ datePrefix: true, frontmatter: false });
  });

  test('explicit settings override the root marker', async () => {
    await fse.writeJson(path.join(root, '.noter.json'), { datePrefix: true });
    const noter = await newNoter({ datePrefix: false, frontmatter: true });
    expect(noter.settings).toEqual({ datePrefix: false, frontmatter: true });
  });
});
