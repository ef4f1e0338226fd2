export type ViewportName = 'desktop' | 'tablet' | 'mobile';

export interface ViewportConfig {
  name: ViewportName;
  width: number;
  height: number;
}
