import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { WorkflowManifest } from '../types/index.js';
import { ManifestDocumentSchema } from '../schemas/index.js';
import { MalformedManifestError } from '../exception/errors.js';
import { manifestFromDocument, manifestToRecord } from './manifest.js';

export const MANIFEST_FILE = 'manifest.json';

export function workflowDir(recordingsDir: string, workflowName: string): string {
  return join(recordingsDir, workflowName);
}

export function manifestPath(recordingsDir: string, workflowName: string): string {
  return join(workflowDir(recordingsDir, workflowName), MANIFEST_FILE);
}

/** Overwrites `path`. Rejects if the parent directory does not exist. */
export async function saveManifest(manifest: WorkflowManifest, path: string): Promise<void> {
  await writeFile(path, JSON.stringify(manifestToRecord(manifest), null, 2), 'utf-8');
}

export async function loadManifest(path: string): Promise<WorkflowManifest> {
  const raw = await readFile(path, 'utf-8');

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new MalformedManifestError(path, err);
  }

  const parsed = ManifestDocumentSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new MalformedManifestError(path, issues);
  }
  return manifestFromDocument(parsed.data);
}
