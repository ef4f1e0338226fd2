import { open } from 'node:fs/promises';
import { setTimeout as sleep } from 'node:timers/promises';
import type { RenderSession, ScreenshotRenderer, ViewportSession } from './renderer.js';

export const STUB_CAPTURE_DELAY_MS = 100;

/** Writes an empty placeholder file per screenshot. */
export class StubRenderer implements ScreenshotRenderer {
  readonly workflowName = 'screenshot_workflow';

  async open(): Promise<RenderSession> {
    return {
      openViewport: async () => stubViewport,
      close: async () => {},
    };
  }
}

const stubViewport: ViewportSession = {
  enterState: async () => {},
  capture: async (path) => {
    await sleep(STUB_CAPTURE_DELAY_MS);
    const handle = await open(path, 'a');
    await handle.close();
  },
  close: async () => {},
};
