import type { ViewportConfig } from '../../types/index.js';

export type LogSink = (line: string) => void;

/** Produces screenshots of one HTML page. Picked when the workflow is built. */
export interface ScreenshotRenderer {
  /** Reported as the result's `workflowName`. */
  readonly workflowName: string;
  open(htmlPath: string, log: LogSink): Promise<RenderSession>;
}

export interface RenderSession {
  openViewport(viewport: ViewportConfig): Promise<ViewportSession>;
  close(): Promise<void>;
}

export interface ViewportSession {
  /** Best effort: a state that cannot be reached is logged, not thrown. */
  enterState(state: string): Promise<void>;
  capture(path: string): Promise<void>;
  close(): Promise<void>;
}
