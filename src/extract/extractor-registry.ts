import type { Logger } from 'pino';
import { archiveExtension } from '../manifest/archive-names.js';
import type { ArchiveExtension } from '../manifest/archive-names.js';
import { sevenZipExtractor, tarExtractor } from './command-extractor.js';
import type { CommandExtractorOptions } from './command-extractor.js';
import type { ArchiveExtractor } from './types.js';

/**
 * Chooses an extractor per archive by file extension.
 */
export class ExtractorRegistry {
  private readonly byExtension = new Map<ArchiveExtension, ArchiveExtractor>();

  /**
   * Registry with `7z` for .zip/.7z and `tar` for the tar family.
   */
  static withDefaults(logger: Logger, options?: CommandExtractorOptions): ExtractorRegistry {
    const registry = new ExtractorRegistry();
    registry.register(['.zip', '.7z'], sevenZipExtractor(logger, options));
    registry.register(['.tar', '.tar.gz', '.tgz', '.tar.xz', '.tar.bz2'], tarExtractor(logger, options));
    return registry;
  }

  /** Register (or replace) the extractor for some extensions */
  register(extensions: readonly ArchiveExtension[], extractor: ArchiveExtractor): this {
    for (const ext of extensions) {
      this.byExtension.set(ext, extractor);
    }
    return this;
  }

  resolve(archiveName: string): ArchiveExtractor | null {
    const ext = archiveExtension(archiveName);
    if (ext === null) {
      return null;
    }
    return this.byExtension.get(ext) ?? null;
  }
}
