import { basename, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { ViewportConfig } from '../../types/index.js';
import { ExternalToolUnavailableError, describeError } from '../../exception/errors.js';
import type { LogSink, RenderSession, ScreenshotRenderer, ViewportSession } from './renderer.js';

type LoadState = 'load' | 'domcontentloaded' | 'networkidle';

export interface PlaywrightPage {
  goto(url: string, options?: { waitUntil?: LoadState | 'commit' }): Promise<unknown>;
  waitForLoadState(state?: LoadState): Promise<void>;
  click(selector: string): Promise<void>;
  waitForTimeout(timeout: number): Promise<void>;
  screenshot(options?: { path?: string; fullPage?: boolean }): Promise<Buffer>;
  close(): Promise<void>;
}

export interface PlaywrightBrowser {
  newPage(options?: { viewport?: { width: number; height: number } | null }): Promise<PlaywrightPage>;
  close(): Promise<void>;
}

export type BrowserLauncher = () => Promise<PlaywrightBrowser>;

/** Click target that puts the page into a named state. */
export const DEFAULT_STATE_ACTIONS: Readonly<Record<string, string>> = {
  task_detail: '.task-item:first-child',
  log_expanded: '#log-toggle',
};

export const STATE_SETTLE_MS = 500;

export interface PlaywrightRendererOptions {
  launch?: BrowserLauncher;
  stateActions?: Record<string, string>;
}

async function launchChromium(): Promise<PlaywrightBrowser> {
  let playwright: typeof import('playwright');
  try {
    playwright = await import('playwright');
  } catch {
    throw new ExternalToolUnavailableError(
      'Playwright',
      'Run: npm install playwright && npx playwright install chromium',
    );
  }
  return playwright.chromium.launch({ headless: true });
}

/** Drives headless Chromium: one browser per run, one page per viewport. */
export class PlaywrightRenderer implements ScreenshotRenderer {
  readonly workflowName = 'playwright_screenshot_workflow';
  private readonly launch: BrowserLauncher;
  private readonly stateActions: Record<string, string>;

  constructor(options: PlaywrightRendererOptions = {}) {
    this.launch = options.launch ?? launchChromium;
    this.stateActions = { ...DEFAULT_STATE_ACTIONS, ...options.stateActions };
  }

  async open(htmlPath: string, log: LogSink): Promise<RenderSession> {
    const browser = await this.launch();
    log('Launched browser');

    const url = pathToFileURL(resolve(htmlPath)).href;
    const stateActions = this.stateActions;

    return {
      async openViewport(viewport: ViewportConfig): Promise<ViewportSession> {
        const page = await browser.newPage({
          viewport: { width: viewport.width, height: viewport.height },
        });
        try {
          await page.goto(url);
          await page.waitForLoadState('networkidle');
        } catch (err) {
          await page.close().catch((closeErr: unknown) => {
            log(`Could not close page: ${describeError(closeErr)}`);
          });
          throw err;
        }
        log(`Loaded page: ${url}`);
        return new PlaywrightViewport(page, stateActions, log);
      },
      async close(): Promise<void> {
        await browser.close();
        log('Browser closed');
      },
    };
  }
}

class PlaywrightViewport implements ViewportSession {
  constructor(
    private page: PlaywrightPage,
    private stateActions: Record<string, string>,
    private log: LogSink,
  ) {}

  async enterState(state: string): Promise<void> {
    const selector = this.stateActions[state];
    if (!selector) return;

    try {
      await this.page.click(selector);
      await this.page.waitForTimeout(STATE_SETTLE_MS);
    } catch (err) {
      this.log(`Could not navigate to state: ${state} (${describeError(err)})`);
    }
  }

  async capture(path: string): Promise<void> {
    await this.page.screenshot({ path, fullPage: false });
    this.log(`Captured: ${basename(path)}`);
  }

  async close(): Promise<void> {
    await this.page.close();
  }
}
