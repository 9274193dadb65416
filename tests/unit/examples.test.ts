import fs from 'fs';
import os from 'os';
import path from 'path';
import { generateExamples, renderExample, UnknownExampleTypeError } from '../../src/lib/examples';
import { parseFrontMatter } from '../../src/lib/front-matter';

describe('examples', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'examples-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('generateExamples', () => {
    it('should write the full sample set', () => {
      const written = generateExamples(dir);

      expect(written.map((file) => path.basename(file))).toEqual([
        'epic-parent-example.md',
        'epic-child-example.md',
        'task-with-parent-example.md',
        'task-standalone-example.md',
        'bug-with-parent-example.md',
        'feature-example.md',
      ]);
      expect(parseFrontMatter(path.join(dir, 'epic-child-example.md'))).toMatchObject({
        title: 'Multi-Factor Authentication Sub-Epic',
        type: 'Epic',
        parent: 'User Authentication System Epic',
        project: 'Auth Team',
        labels: 'epic, security, mfa',
        status: 'backlog',
      });
    });

    it('should not write ids into generated files', () => {
      generateExamples(dir);

      expect(parseFrontMatter(path.join(dir, 'epic-parent-example.md')).id).toBeUndefined();
    });

    it('should create the output folder', () => {
      const nested = path.join(dir, 'nested', 'issues');

      generateExamples(nested, { type: 'bug' });

      expect(fs.existsSync(path.join(nested, 'bug-example.md'))).toBe(true);
    });

    it('should write one example of a type with overrides', () => {
      const written = generateExamples(dir, { type: 'Task', title: 'My Task', labels: 'a, b', parent: 'My Epic' });

      expect(written).toEqual([path.join(dir, 'task-example.md')]);
      const record = parseFrontMatter(written[0]);
      expect(record).toMatchObject({
        title: 'My Task',
        type: 'Task',
        labels: 'a, b',
        parent: 'My Epic',
        project: 'Example Project',
        status: 'todo',
      });
      expect(record.body).toContain('## Description\n\nAn example task with specific implementation details.');
    });

    it('should reject unknown types', () => {
      expect(() => generateExamples(dir, { type: 'story' })).toThrow(UnknownExampleTypeError);
      expect(fs.readdirSync(dir)).toEqual([]);
    });
  });

  describe('renderExample', () => {
    it('should render bug sections with numbered steps', () => {
      const content = renderExample('bug', {
        title: 'Crash',
        project: 'Core',
        labels: 'bug',
        description: 'It crashes.',
        reproSteps: ['Open app', 'Click save'],
        severity: 'High',
      });

      expect(content).toContain('## Steps to Reproduce\n\n1. Open app\n2. Click save');
      expect(content).toContain('## Impact\n\n- **Severity**: High');
      expect(content).not.toContain('parent:');
    });
  });
});
