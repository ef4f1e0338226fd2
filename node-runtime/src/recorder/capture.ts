/** External screen/action capture. The recorder only starts and stops it. */
export interface CaptureService {
  start(outputDir: string): Promise<void>;
  stop(): Promise<void>;
}

export class NoopCaptureService implements CaptureService {
  async start(_outputDir: string): Promise<void> {}

  async stop(): Promise<void> {}
}
