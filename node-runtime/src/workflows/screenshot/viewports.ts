import type { ViewportConfig, ViewportName } from '../../types/index.js';

export const VIEWPORTS: Readonly<Record<ViewportName, ViewportConfig>> = {
  desktop: { name: 'desktop', width: 1920, height: 1080 },
  tablet: { name: 'tablet', width: 768, height: 1024 },
  mobile: { name: 'mobile', width: 375, height: 667 },
};

export const DEFAULT_VIEWPORTS: readonly ViewportName[] = ['desktop', 'tablet', 'mobile'];

export const DEFAULT_STATES: readonly string[] = [
  'overview',
  'task_detail',
  'log_expanded',
  'log_collapsed',
];

export function screenshotName(viewport: ViewportName, state: string): string {
  return `${viewport}_${state}.png`;
}
