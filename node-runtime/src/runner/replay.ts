import { setTimeout as sleep } from 'node:timers/promises';
import type { WorkflowManifest } from '../types/index.js';
import { substituteParameters } from './template.js';

/**
 * Replays a recorded workflow. Returns the paths of the artifacts the replay
 * actually produced; they become the result's `artifacts`.
 */
export interface ReplayEngine {
  replay(
    manifest: WorkflowManifest,
    parameters: Record<string, unknown>,
    log: (line: string) => void,
  ): Promise<string[]>;
}

export const SIMULATED_REPLAY_DELAY_MS = 1000;

/** Stand-in until recordings can be replayed: waits, logs, produces nothing. */
export class SimulatedReplay implements ReplayEngine {
  async replay(
    manifest: WorkflowManifest,
    parameters: Record<string, unknown>,
    log: (line: string) => void,
  ): Promise<string[]> {
    log('Executing workflow...');
    await sleep(SIMULATED_REPLAY_DELAY_MS);

    for (const pattern of manifest.outputArtifacts) {
      log(`Would collect artifact: ${substituteParameters(pattern, parameters)}`);
    }
    return [];
  }
}
