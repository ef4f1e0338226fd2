import { parseArgs } from 'node:util';
import { z } from 'zod';
import type { ViewportName } from '../types/index.js';
import { ViewportNameSchema } from '../schemas/index.js';
import { DEFAULT_STATES, DEFAULT_VIEWPORTS } from '../workflows/screenshot/viewports.js';
import { DEFAULT_BRANCH } from './git-publisher.js';

export interface ScreenshotCliArgs {
  htmlPath: string;
  outputDir: string;
  viewports: ViewportName[];
  states: string[];
  usePlaywright: boolean;
  commitToPr: boolean;
  branch: string;
}

export interface RunWorkflowCliArgs {
  name: string;
  params: Record<string, unknown>;
  recordingsDir?: string;
}

export const SCREENSHOT_USAGE =
  'Usage: generate-screenshots --html-path <file> --output-dir <dir> ' +
  '[--viewports desktop,tablet,mobile] [--states overview,...] ' +
  '[--use-playwright] [--commit-to-pr] [--branch <name>]';

export const RUN_WORKFLOW_USAGE =
  'Usage: run-workflow --name <workflow> [--params <json>] [--recordings-dir <dir>]';

function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

const StateNameSchema = z.string().refine((s) => DEFAULT_STATES.includes(s), {
  message: `state must be one of: ${DEFAULT_STATES.join(', ')}`,
});

export function parseScreenshotArgs(argv: string[]): ScreenshotCliArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      'html-path': { type: 'string' },
      'output-dir': { type: 'string' },
      viewports: { type: 'string' },
      states: { type: 'string' },
      'use-playwright': { type: 'boolean', default: false },
      'commit-to-pr': { type: 'boolean', default: false },
      branch: { type: 'string', default: DEFAULT_BRANCH },
    },
    strict: true,
  });

  const htmlPath = values['html-path'];
  const outputDir = values['output-dir'];
  if (!htmlPath || !outputDir) {
    throw new Error(SCREENSHOT_USAGE);
  }

  return {
    htmlPath,
    outputDir,
    viewports: z
      .array(ViewportNameSchema)
      .min(1)
      .parse(splitList(values.viewports) ?? [...DEFAULT_VIEWPORTS]),
    states: z.array(StateNameSchema).min(1).parse(splitList(values.states) ?? [...DEFAULT_STATES]),
    usePlaywright: values['use-playwright'] ?? false,
    commitToPr: values['commit-to-pr'] ?? false,
    branch: values.branch ?? DEFAULT_BRANCH,
  };
}

export function parseRunWorkflowArgs(argv: string[]): RunWorkflowCliArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      name: { type: 'string' },
      params: { type: 'string', default: '{}' },
      'recordings-dir': { type: 'string' },
    },
    strict: true,
  });

  if (!values.name) {
    throw new Error(RUN_WORKFLOW_USAGE);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(values.params ?? '{}');
  } catch {
    throw new Error(`--params must be a JSON object. ${RUN_WORKFLOW_USAGE}`);
  }

  return {
    name: values.name,
    params: z.record(z.unknown()).parse(raw),
    recordingsDir: values['recordings-dir'],
  };
}
