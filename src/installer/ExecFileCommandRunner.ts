import { execFile } from 'node:child_process';

import type { CommandRequest, CommandResult, ICommandRunner } from './types.js';

export interface ExecFileCommandRunnerOptions {
  /** Characters of output kept, from the end. @default 65536 */
  maxOutputChars?: number;
  /** Passed to execFile as `maxBuffer`. @default 16 MiB */
  maxBufferBytes?: number;
}

/**
 * {@link ICommandRunner} over `child_process.execFile`. A command that runs
 * and exits non-zero resolves; one that cannot be started rejects.
 */
export class ExecFileCommandRunner implements ICommandRunner {
  private readonly maxOutputChars: number;
  private readonly maxBufferBytes: number;

  constructor(options: ExecFileCommandRunnerOptions = {}) {
    this.maxOutputChars = options.maxOutputChars ?? 64 * 1024;
    this.maxBufferBytes = options.maxBufferBytes ?? 16 * 1024 * 1024;
  }

  run(request: CommandRequest): Promise<CommandResult> {
    return new Promise<CommandResult>((resolve, reject) => {
      execFile(
        request.command,
        request.args,
        {
          cwd: request.cwd,
          timeout: request.timeoutMs,
          maxBuffer: this.maxBufferBytes,
          shell: false,
          windowsHide: true,
          encoding: 'utf8',
        },
        (error, stdout, stderr) => {
          const output = this.tail(`${stdout}${stderr}`);
          if (!error) {
            resolve({ exitCode: 0, output });
            return;
          }
          if (typeof error.code === 'number') {
            resolve({ exitCode: error.code, output, timedOut: error.killed === true });
            return;
          }
          if (error.killed || error.signal) {
            resolve({ exitCode: -1, output, timedOut: error.killed === true });
            return;
          }
          reject(error);
        },
      );
    });
  }

  private tail(output: string): string {
    return output.length > this.maxOutputChars ? output.slice(-this.maxOutputChars) : output;
  }
}
