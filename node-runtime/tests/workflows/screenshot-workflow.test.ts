import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { ScreenshotWorkflow } from '../../src/workflows/screenshot/screenshot-workflow.js';
import type { ScreenshotRenderer, ViewportSession } from '../../src/workflows/screenshot/renderer.js';
import { PlaywrightRenderer } from '../../src/workflows/screenshot/playwright-renderer.js';
import type { PlaywrightBrowser, PlaywrightPage } from '../../src/workflows/screenshot/playwright-renderer.js';
import { ExternalToolUnavailableError } from '../../src/exception/errors.js';
import { pathExists } from '../../src/utils/fs.js';
import { createLogger } from '../../src/logging/logger.js';

const logger = createLogger('test', 'silent');

function mockPage(overrides: Partial<PlaywrightPage> = {}): PlaywrightPage {
  return {
    goto: vi.fn().mockResolvedValue(null),
    waitForLoadState: vi.fn().mockResolvedValue(undefined),
    click: vi.fn().mockResolvedValue(undefined),
    waitForTimeout: vi.fn().mockResolvedValue(undefined),
    screenshot: vi.fn().mockResolvedValue(Buffer.from('png')),
    close: vi.fn().mockResolvedValue(undefined),
    ...overrides,
  };
}

function mockBrowser(page: PlaywrightPage): PlaywrightBrowser {
  return {
    newPage: vi.fn().mockResolvedValue(page),
    close: vi.fn().mockResolvedValue(undefined),
  };
}

describe('ScreenshotWorkflow', () => {
  let dir: string;
  let htmlPath: string;
  let outputDir: string;

  beforeEach(async () => {
    dir = join(tmpdir(), `screenshot-test-${randomUUID()}`);
    await mkdir(dir, { recursive: true });
    htmlPath = join(dir, 'test.html');
    outputDir = join(dir, 'screenshots');
    await writeFile(htmlPath, '<html><body>Test</body></html>');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('fails with not found for a missing HTML file and creates nothing', async () => {
    const workflow = new ScreenshotWorkflow({
      htmlPath: join(dir, 'nonexistent.html'),
      outputDir,
      logger,
    });

    const result = await workflow.execute();

    expect(result.success).toBe(false);
    expect(result.errorKind).toBe('NotFound');
    expect(result.error).toBe(`HTML file not found: ${join(dir, 'nonexistent.html')}`);
    expect(result.error?.toLowerCase()).toContain('not found');
    expect(result.workflowName).toBe('screenshot_workflow');
    expect(await pathExists(outputDir)).toBe(false);
  });

  it('creates the output directory', async () => {
    const workflow = new ScreenshotWorkflow({ htmlPath, outputDir, states: ['overview'], logger });

    const result = await workflow.execute();

    expect(result.success).toBe(true);
    expect((await stat(outputDir)).isDirectory()).toBe(true);
  });

  it('captures one file per viewport and state', async () => {
    const workflow = new ScreenshotWorkflow({
      htmlPath,
      outputDir,
      viewports: ['desktop', 'mobile'],
      states: ['overview'],
      logger,
    });

    const result = await workflow.execute();

    expect(result.success).toBe(true);
    expect(result.artifacts).toEqual([
      join(outputDir, 'desktop_overview.png'),
      join(outputDir, 'mobile_overview.png'),
    ]);
    for (const artifact of result.artifacts) {
      expect((await stat(artifact)).isFile()).toBe(true);
    }
    expect(result.logs).toEqual([
      `Created output directory: ${outputDir}`,
      'Setting viewport: desktop (1920x1080)',
      'Capturing: desktop_overview.png',
      'Setting viewport: mobile (375x667)',
      'Capturing: mobile_overview.png',
    ]);
  });

  it('orders artifacts viewport-major in caller order', async () => {
    const workflow = new ScreenshotWorkflow({
      htmlPath,
      outputDir,
      viewports: ['tablet', 'desktop'],
      states: ['log_expanded', 'overview'],
      logger,
    });

    const result = await workflow.execute();

    expect(result.artifacts).toEqual([
      join(outputDir, 'tablet_log_expanded.png'),
      join(outputDir, 'tablet_overview.png'),
      join(outputDir, 'desktop_log_expanded.png'),
      join(outputDir, 'desktop_overview.png'),
    ]);
  });

  it('defaults to all viewports and the four standard states', () => {
    const workflow = new ScreenshotWorkflow({ htmlPath, outputDir, logger });

    expect(workflow.viewports).toEqual(['desktop', 'tablet', 'mobile']);
    expect(workflow.states).toEqual(['overview', 'task_detail', 'log_expanded', 'log_collapsed']);
  });

  it('can run twice into the same directory', async () => {
    const options = { htmlPath, outputDir, viewports: ['mobile' as const], states: ['overview'], logger };

    const first = await new ScreenshotWorkflow(options).execute();
    const second = await new ScreenshotWorkflow(options).execute();

    expect(first.success).toBe(true);
    expect(second.success).toBe(true);
    expect(second.artifacts).toEqual(first.artifacts);
    expect((await stat(join(outputDir, 'mobile_overview.png'))).size).toBe(0);
  });

  it('rejects empty viewport or state lists at construction', () => {
    expect(() => new ScreenshotWorkflow({ htmlPath, outputDir, viewports: [], logger })).toThrow();
    expect(() => new ScreenshotWorkflow({ htmlPath, outputDir, states: [], logger })).toThrow();
  });

  it('closes every session and keeps written artifacts when a capture fails', async () => {
    const closed: string[] = [];
    const renderer: ScreenshotRenderer = {
      workflowName: 'fake_renderer',
      open: async () => ({
        openViewport: async (viewport): Promise<ViewportSession> => ({
          enterState: async () => {},
          capture: async (path) => {
            if (path.endsWith('mobile_overview.png')) throw new Error('renderer crashed');
          },
          close: async () => {
            closed.push(viewport.name);
          },
        }),
        close: async () => {
          closed.push('session');
        },
      }),
    };
    const workflow = new ScreenshotWorkflow({
      htmlPath,
      outputDir,
      viewports: ['desktop', 'mobile'],
      states: ['overview'],
      renderer,
      logger,
    });

    const result = await workflow.execute();

    expect(result.success).toBe(false);
    expect(result.workflowName).toBe('fake_renderer');
    expect(result.error).toBe('renderer crashed');
    expect(result.errorKind).toBe('UnclassifiedFailure');
    expect(result.artifacts).toEqual([join(outputDir, 'desktop_overview.png')]);
    expect(closed).toEqual(['desktop', 'mobile', 'session']);
  });

  it('reports the capture error when closing the crashed page also fails', async () => {
    const page = mockPage({
      screenshot: vi.fn().mockRejectedValue(new Error('Target crashed')),
      close: vi.fn().mockRejectedValue(new Error('Target page, context or browser has been closed')),
    });
    const browser = mockBrowser(page);
    const workflow = new ScreenshotWorkflow({
      htmlPath,
      outputDir,
      viewports: ['desktop'],
      states: ['overview'],
      renderer: new PlaywrightRenderer({ launch: async () => browser }),
      logger,
    });

    const result = await workflow.execute();

    expect(result.success).toBe(false);
    expect(result.workflowName).toBe('playwright_screenshot_workflow');
    expect(result.error).toBe('Target crashed');
    expect(result.errorKind).toBe('UnclassifiedFailure');
    expect(result.artifacts).toEqual([]);
    expect(result.logs).toContain(
      'Could not close desktop page: Target page, context or browser has been closed',
    );
    expect(browser.close).toHaveBeenCalledTimes(1);
  });

  it('reports the capture error when closing the session also fails', async () => {
    const browser: PlaywrightBrowser = {
      newPage: vi.fn().mockResolvedValue(
        mockPage({ screenshot: vi.fn().mockRejectedValue(new Error('Target crashed')) }),
      ),
      close: vi.fn().mockRejectedValue(new Error('Browser has been closed')),
    };
    const workflow = new ScreenshotWorkflow({
      htmlPath,
      outputDir,
      viewports: ['mobile'],
      states: ['overview'],
      renderer: new PlaywrightRenderer({ launch: async () => browser }),
      logger,
    });

    const result = await workflow.execute();

    expect(result.error).toBe('Target crashed');
    expect(result.logs[result.logs.length - 1]).toBe(
      'Could not close renderer session: Browser has been closed',
    );
  });

  it('fails with external tool unavailable when playwright is not installed', async () => {
    const workflow = new ScreenshotWorkflow({
      htmlPath,
      outputDir,
      renderer: new PlaywrightRenderer({
        launch: async () => {
          throw new ExternalToolUnavailableError('Playwright', 'Run: npm install playwright');
        },
      }),
      logger,
    });

    const result = await workflow.execute();

    expect(result.success).toBe(false);
    expect(result.workflowName).toBe('playwright_screenshot_workflow');
    expect(result.errorKind).toBe('ExternalToolUnavailable');
    expect(result.error).toBe('Playwright not installed. Run: npm install playwright');
    expect(result.artifacts).toEqual([]);
  });

  it('fails with external tool unavailable when the browser binary is missing', async () => {
    const workflow = new ScreenshotWorkflow({
      htmlPath,
      outputDir,
      renderer: new PlaywrightRenderer({
        launch: async () => {
          throw new Error("browserType.launch: Executable doesn't exist at /opt/browsers/chromium/chrome");
        },
      }),
      logger,
    });

    const result = await workflow.execute();

    expect(result.success).toBe(false);
    expect(result.errorKind).toBe('ExternalToolUnavailable');
    expect(result.artifacts).toEqual([]);
  });
});
