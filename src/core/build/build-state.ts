import { join } from 'path';
import * as yaml from 'js-yaml';
import { FILE_PATTERNS } from '../../constants/index.js';
import { readTextFileIfExists, writeTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

export const BUILD_STATES = ['NotConfigured', 'Configured', 'Built', 'Packaged', 'Failed'] as const;
export type BuildState = typeof BUILD_STATES[number];

export const BUILD_STEPS = ['configure', 'build', 'package'] as const;
export type BuildStep = typeof BUILD_STEPS[number];

export interface BuildStateRecord {
  state: BuildState;
  configId: string;
  /** Step that failed, set only in the Failed state */
  failedStep?: BuildStep;
}

export function stateFilePath(buildFolder: string): string {
  return join(buildFolder, FILE_PATTERNS.STATE_YML);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read the persisted state of a build folder. Missing, unreadable or
 * malformed files read as null, which callers treat as NotConfigured.
 */
export async function readBuildState(buildFolder: string): Promise<BuildStateRecord | null> {
  const path = stateFilePath(buildFolder);
  const content = await readTextFileIfExists(path);
  if (content === null) {
    return null;
  }

  let doc: unknown;
  try {
    doc = yaml.load(content);
  } catch (error) {
    logger.warn(`Ignoring unreadable state file ${path}`, { error });
    return null;
  }
  if (!isRecord(doc)) {
    return null;
  }

  const state = BUILD_STATES.find(s => s === doc.state);
  const configId = typeof doc.config_id === 'string' ? doc.config_id : undefined;
  if (!state || !configId) {
    logger.warn(`Ignoring malformed state file ${path}`);
    return null;
  }
  const failedStep = BUILD_STEPS.find(s => s === doc.failed_step);
  return failedStep && state === 'Failed' ? { state, configId, failedStep } : { state, configId };
}

export async function writeBuildState(buildFolder: string, record: BuildStateRecord): Promise<void> {
  const doc: Record<string, string> = { state: record.state, config_id: record.configId };
  if (record.state === 'Failed' && record.failedStep) {
    doc.failed_step = record.failedStep;
  }
  await writeTextFile(stateFilePath(buildFolder), yaml.dump(doc));
}
