export { ExtractionPipeline, stagingPathFor } from './extraction-pipeline.js';
export { ExtractorRegistry } from './extractor-registry.js';
export { CommandExtractor, sevenZipExtractor, tarExtractor } from './command-extractor.js';

export type { TypedExtractionPipelineEmitter } from './extraction-pipeline.js';
export type {
  ExecCommand,
  ExecOptions,
  ArgsBuilder,
  CommandExtractorOptions,
} from './command-extractor.js';
export type {
  ArchiveExtractor,
  ExtractOptions,
  ExtractResult,
  ExtractionState,
  ExtractionResult,
  ExtractionPipelineConfig,
  ExtractionPipelineEvents,
} from './types.js';
