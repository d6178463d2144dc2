/**
 * Extractors that shell out to `7z` and `tar`.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { Logger } from 'pino';
import { errorMessage } from '../errors.js';
import type { ArchiveExtractor, ExtractOptions, ExtractResult } from './types.js';

const execFileAsync = promisify(execFile);

export interface ExecOptions {
  signal?: AbortSignal;
  maxBuffer?: number;
}

export type ExecCommand = (
  file: string,
  args: string[],
  options: ExecOptions
) => Promise<{ stdout: string; stderr: string }>;

const defaultExec: ExecCommand = (file, args, options) => execFileAsync(file, args, options);

/** Builds the argument list for one extraction */
export type ArgsBuilder = (archivePath: string, destDir: string) => string[];

/** Options for creating a CommandExtractor */
export interface CommandExtractorOptions {
  /** Custom command executor (for testing) */
  execCommand?: ExecCommand;
}

/**
 * Runs an external command to extract an archive. A non-zero exit or a
 * missing binary is reported as a failed result.
 */
export class CommandExtractor implements ArchiveExtractor {
  readonly name: string;
  private readonly command: string;
  private readonly buildArgs: ArgsBuilder;
  private readonly logger: Logger;
  private readonly exec: ExecCommand;

  constructor(
    command: string,
    buildArgs: ArgsBuilder,
    logger: Logger,
    options?: CommandExtractorOptions
  ) {
    this.name = command;
    this.command = command;
    this.buildArgs = buildArgs;
    this.logger = logger.child({ component: 'command-extractor', command });
    this.exec = options?.execCommand ?? defaultExec;
  }

  async extract(
    archivePath: string,
    destDir: string,
    options: ExtractOptions = {}
  ): Promise<ExtractResult> {
    const args = this.buildArgs(archivePath, destDir);

    try {
      await this.exec(this.command, args, {
        signal: options.signal,
        maxBuffer: 10 * 1024 * 1024, // 10MB output buffer
      });
      this.logger.debug({ archivePath, destDir }, 'Extraction command completed');
      return { success: true };
    } catch (err) {
      const message = errorMessage(err);
      this.logger.error({ archivePath, error: message }, 'Extraction command failed');
      return { success: false, error: message };
    }
  }

  /**
   * Check if the command is installed.
   */
  async isAvailable(versionArgs: string[] = ['--help']): Promise<boolean> {
    try {
      await this.exec(this.command, versionArgs, {});
      return true;
    } catch (err) {
      this.logger.debug({ error: errorMessage(err) }, 'Extraction command unavailable');
      return false;
    }
  }
}

/** `7z x -y -o<dest> <archive>` for .zip and .7z */
export function sevenZipExtractor(
  logger: Logger,
  options?: CommandExtractorOptions
): CommandExtractor {
  return new CommandExtractor(
    '7z',
    (archivePath, destDir) => ['x', '-y', `-o${destDir}`, archivePath],
    logger,
    options
  );
}

/** `tar -xf <archive> -C <dest>`; tar detects the compression itself */
export function tarExtractor(logger: Logger, options?: CommandExtractorOptions): CommandExtractor {
  return new CommandExtractor(
    'tar',
    (archivePath, destDir) => ['-xf', archivePath, '-C', destDir],
    logger,
    options
  );
}
