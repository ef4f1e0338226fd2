export type DemoOutputFormat = 'gif' | 'mp4' | 'webm';
