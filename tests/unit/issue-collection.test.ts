import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  readIssueFiles,
  applyProjectOverride,
  applyParentDefault,
  parseLabels,
  IssueSourceError,
} from '../../src/lib/issue-collection';
import { Logger } from '../../src/lib/logger';
import { Issue } from '../../src/lib/types';

function makeIssue(title: string, fields: Partial<Issue> = {}): Issue {
  return {
    path: '/issues',
    fileName: `${title}.md`,
    title,
    body: '',
    labels: [],
    type: '',
    id: '',
    project: '',
    parent: '',
    ...fields,
  };
}

describe('issue collection', () => {
  describe('parseLabels', () => {
    it('should split on commas and drop blanks', () => {
      expect(parseLabels(' bug, ,ui ,')).toEqual(['bug', 'ui']);
      expect(parseLabels(undefined)).toEqual([]);
    });
  });

  describe('readIssueFiles', () => {
    let dir: string;
    let records: Array<Record<string, unknown>>;
    let logger: Logger;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'issues-'));
      records = [];
      logger = new Logger({ level: 'debug', json: true, write: (line) => records.push(JSON.parse(line)) });
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should build issues from files in name order, skipping bad ones', () => {
      fs.writeFileSync(
        path.join(dir, 'b-task.md'),
        '---\ntitle: Task B\nparent: Epic A\nlabels: x, y\nproject: Roadmap\n---\n\nDo the thing.\n'
      );
      fs.writeFileSync(path.join(dir, 'a-epic.md'), '---\ntitle: Epic A\ntype: Epic\nid: 5\n---\n');
      fs.symlinkSync(path.join(dir, 'does-not-exist.md'), path.join(dir, 'broken.md'));
      fs.writeFileSync(path.join(dir, 'c-dup.md'), '---\ntitle: epic a\n---\n');
      fs.writeFileSync(path.join(dir, 'untitled.md'), '---\nlabels: x\n---\n');
      fs.mkdirSync(path.join(dir, 'archive'));

      const issues = readIssueFiles(dir, logger);

      expect(issues).toEqual([
        {
          path: dir,
          fileName: 'a-epic.md',
          title: 'Epic A',
          body: '',
          labels: [],
          type: 'Epic',
          id: '5',
          project: '',
          parent: '',
        },
        {
          path: dir,
          fileName: 'b-task.md',
          title: 'Task B',
          body: 'Do the thing.',
          labels: ['x', 'y'],
          type: '',
          id: '',
          project: 'Roadmap',
          parent: 'Epic A',
        },
        {
          path: dir,
          fileName: 'c-dup.md',
          title: 'epic a',
          body: '',
          labels: [],
          type: '',
          id: '',
          project: '',
          parent: '',
        },
      ]);

      expect(records.map((r) => [r.level, r.msg, r.file])).toEqual([
        ['error', 'Error parsing front matter', 'broken.md'],
        ['warn', 'Duplicate issue title, parent references bind to the first placed', 'c-dup.md'],
        ['error', 'Issue file has no title, skipping', 'untitled.md'],
        ['debug', 'Read issue files', undefined],
      ]);
    });

    it('should keep titles and parents that contain colons or hashes', () => {
      fs.writeFileSync(path.join(dir, 'a.md'), '---\ntitle: Epic: Authentication\ntype: Epic\n---\n');
      fs.writeFileSync(path.join(dir, 'b.md'), '---\ntitle: Login Form\nparent: Epic: Authentication\n---\n');
      fs.writeFileSync(path.join(dir, 'c.md'), '---\ntitle: #12 follow-up\n---\n');

      const issues = readIssueFiles(dir, logger);

      expect(issues.map((issue) => [issue.title, issue.parent])).toEqual([
        ['Epic: Authentication', ''],
        ['Login Form', 'Epic: Authentication'],
        ['#12 follow-up', ''],
      ]);
      expect(records.filter((r) => r.level === 'error')).toEqual([]);
    });

    it('should throw IssueSourceError when the folder cannot be read', () => {
      const missing = path.join(dir, 'missing');

      expect(() => readIssueFiles(missing, logger)).toThrow(IssueSourceError);
      expect(() => readIssueFiles(missing, logger)).toThrow(`Cannot read issue folder "${missing}"`);
    });
  });

  describe('applyProjectOverride', () => {
    it('should set the project on every issue', () => {
      const issues = [makeIssue('A', { project: 'Old' }), makeIssue('B')];

      expect(applyProjectOverride(issues, 'New').map((issue) => issue.project)).toEqual(['New', 'New']);
    });

    it('should leave issues untouched without a project', () => {
      const issues = [makeIssue('A', { project: 'Old' })];

      expect(applyProjectOverride(issues, undefined)).toBe(issues);
    });
  });

  describe('applyParentDefault', () => {
    it('should only fill in missing parents and never parent an issue to itself', () => {
      const issues = [
        makeIssue('Epic', { type: 'Epic' }),
        makeIssue('Task', { parent: 'Other' }),
        makeIssue('Bug'),
      ];

      expect(applyParentDefault(issues, 'Epic').map((issue) => issue.parent)).toEqual(['', 'Other', 'Epic']);
    });
  });
});
