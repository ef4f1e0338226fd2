import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { Logger } from '../logging/logger.js';
import { createLogger } from '../logging/logger.js';
import { describeError } from '../exception/errors.js';

const execFileAsync = promisify(execFile);

export type CommandRunner = (command: string, args: string[]) => Promise<void>;

export const execCommand: CommandRunner = async (command, args) => {
  await execFileAsync(command, args);
};

export interface PublishResult {
  ok: boolean;
  error?: string;
}

export const DEFAULT_BRANCH = 'pr-screenshots';

/** Commits artifacts to a branch and pushes it. Each command runs once. */
export class GitPublisher {
  private readonly logger: Logger;

  constructor(
    private run: CommandRunner = execCommand,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger('git');
  }

  async commitAndPush(
    artifacts: readonly string[],
    branch: string = DEFAULT_BRANCH,
  ): Promise<PublishResult> {
    try {
      await this.switchBranch(branch);

      for (const artifact of artifacts) {
        await this.run('git', ['add', artifact]);
      }

      await this.run('git', [
        'commit',
        '-m',
        `Add screenshots\n\nGenerated ${artifacts.length} screenshots across viewports.`,
      ]);
      await this.run('git', ['push', '-u', 'origin', branch]);

      this.logger.info({ branch, count: artifacts.length }, 'Committed and pushed');
      return { ok: true };
    } catch (err) {
      const error = `Git operation failed: ${describeError(err)}`;
      this.logger.error({ branch }, error);
      return { ok: false, error };
    }
  }

  private async switchBranch(branch: string): Promise<void> {
    try {
      await this.run('git', ['checkout', '-b', branch]);
    } catch (err) {
      this.logger.debug({ branch, reason: describeError(err) }, 'Branch exists, switching to it');
      await this.run('git', ['checkout', branch]);
    }
  }
}
