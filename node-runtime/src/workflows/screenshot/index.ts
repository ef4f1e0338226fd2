export { ScreenshotWorkflow } from './screenshot-workflow.js';
export type { ScreenshotWorkflowOptions } from './screenshot-workflow.js';
export { StubRenderer, STUB_CAPTURE_DELAY_MS } from './stub-renderer.js';
export { PlaywrightRenderer, DEFAULT_STATE_ACTIONS, STATE_SETTLE_MS } from './playwright-renderer.js';
export type {
  PlaywrightBrowser,
  PlaywrightPage,
  PlaywrightRendererOptions,
  BrowserLauncher,
} from './playwright-renderer.js';
export type { ScreenshotRenderer, RenderSession, ViewportSession, LogSink } from './renderer.js';
export { VIEWPORTS, DEFAULT_VIEWPORTS, DEFAULT_STATES, screenshotName } from './viewports.js';
