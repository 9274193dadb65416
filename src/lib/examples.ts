/**
 * Example issue file generator
 *
 * Writes sample markdown files that show the front-matter format the
 * collection builder reads: a parent epic, a child epic, tasks with and
 * without a parent, a bug and a feature.
 */

import fs from 'fs';
import path from 'path';
import matter from 'gray-matter';
import exampleData from './example-issues.json';
import { keyValueEngine } from './front-matter';

export const EXAMPLE_TYPES = ['epic', 'task', 'bug', 'feature'] as const;
export type ExampleType = (typeof EXAMPLE_TYPES)[number];

export interface ExampleIssue {
  title: string;
  project: string;
  labels: string;
  description: string;
  status?: string;
  parent?: string;
  implementationDetails?: string[];
  technicalRequirements?: string[];
  designRequirements?: string[];
  testingStrategy?: string[];
  reproSteps?: string[];
  expectedResult?: string;
  actualResult?: string;
  environment?: string[];
  severity?: string;
  priority?: string;
  affectedUsers?: string;
  businessImpact?: string;
  workaround?: string;
  rootCause?: string[];
  fixDescription?: string[];
}

interface ExampleSample {
  fileName: string;
  type: string;
  issue: ExampleIssue;
}

interface ExampleCatalog {
  defaults: Record<ExampleType, ExampleIssue>;
  samples: ExampleSample[];
}

const catalog: ExampleCatalog = exampleData;

export interface ExampleOverrides {
  title?: string;
  project?: string;
  labels?: string;
  parent?: string;
  description?: string;
}

export interface GenerateExamplesOptions extends ExampleOverrides {
  type?: string;
}

export class UnknownExampleTypeError extends Error {
  constructor(readonly type: string) {
    super(`Unknown example type "${type}". Expected one of: ${EXAMPLE_TYPES.join(', ')}`);
    this.name = 'UnknownExampleTypeError';
  }
}

export function isExampleType(value: string): value is ExampleType {
  return EXAMPLE_TYPES.some((type) => type === value);
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function bullets(items: string[]): string {
  return items.map((item) => `- ${item}`).join('\n');
}

function numbered(items: string[]): string {
  return items.map((item, i) => `${i + 1}. ${item}`).join('\n');
}

function renderBody(issue: ExampleIssue): string {
  const sections: string[] = [`## Description\n\n${issue.description}`];
  const add = (heading: string, text: string | undefined) => {
    if (text) sections.push(`## ${heading}\n\n${text}`);
  };
  const list = (heading: string, items: string[] | undefined, render: (items: string[]) => string = bullets) => {
    if (items && items.length > 0) add(heading, render(items));
  };

  list('Steps to Reproduce', issue.reproSteps, numbered);
  add('Expected Result', issue.expectedResult);
  add('Actual Result', issue.actualResult);
  list('Environment', issue.environment);

  const impact = [
    ['Severity', issue.severity],
    ['Priority', issue.priority],
    ['Affected Users', issue.affectedUsers],
    ['Business Impact', issue.businessImpact],
  ].filter((entry): entry is [string, string] => Boolean(entry[1]));
  if (impact.length > 0) {
    add('Impact', impact.map(([key, value]) => `- **${key}**: ${value}`).join('\n'));
  }
  add('Workaround', issue.workaround);
  list('Root Cause', issue.rootCause);
  list('Fix Description', issue.fixDescription, numbered);

  list('Implementation Details', issue.implementationDetails);
  list('Technical Requirements', issue.technicalRequirements);
  list('Design Requirements', issue.designRequirements);
  list('Testing Strategy', issue.testingStrategy);

  return sections.join('\n\n');
}

/**
 * Render one example issue file: front matter followed by markdown sections
 */
export function renderExample(type: ExampleType, issue: ExampleIssue): string {
  const data: Record<string, string> = {
    title: issue.title,
    type: capitalize(type),
    labels: issue.labels,
    project: issue.project,
  };
  if (issue.parent) data.parent = issue.parent;
  if (issue.status) data.status = issue.status;

  return matter.stringify(renderBody(issue), data, { engines: { yaml: keyValueEngine } });
}

function applyOverrides(issue: ExampleIssue, overrides: ExampleOverrides): ExampleIssue {
  const result: ExampleIssue = { ...issue };
  if (overrides.title) result.title = overrides.title;
  if (overrides.project) result.project = overrides.project;
  if (overrides.labels) result.labels = overrides.labels;
  if (overrides.parent) result.parent = overrides.parent;
  if (overrides.description) result.description = overrides.description;
  return result;
}

/**
 * Write example issue files into `outputDir` and return their paths.
 * With a `type`, a single `<type>-example.md` is written using that type's
 * defaults and the given overrides; otherwise the full sample set.
 */
export function generateExamples(outputDir: string, options: GenerateExamplesOptions = {}): string[] {
  fs.mkdirSync(outputDir, { recursive: true });

  const { type, ...overrides } = options;
  const written: string[] = [];
  const write = (fileName: string, content: string) => {
    const filePath = path.join(outputDir, fileName);
    fs.writeFileSync(filePath, content, 'utf-8');
    written.push(filePath);
  };

  if (type !== undefined) {
    const normalized = type.trim().toLowerCase();
    if (!isExampleType(normalized)) {
      throw new UnknownExampleTypeError(type);
    }
    const issue = applyOverrides(catalog.defaults[normalized], overrides);
    write(`${normalized}-example.md`, renderExample(normalized, issue));
    return written;
  }

  for (const sample of catalog.samples) {
    const sampleType = sample.type.toLowerCase();
    if (!isExampleType(sampleType)) {
      throw new UnknownExampleTypeError(sample.type);
    }
    write(sample.fileName, renderExample(sampleType, sample.issue));
  }
  return written;
}
