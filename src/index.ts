export { loadTalkdeckConfig, type TalkdeckConfig } from './config.js'
export { EnhancementCache } from './enhance/cache.js'
export { TranscriptEnhancer, type EnhancementOutcome } from './enhance/enhancer.js'
export type { EnhancedSegment, EnhancementSettings, EnhancementStats } from './enhance/types.js'
export {
  createAbortError,
  createExternalCallError,
  createFrameMismatchError,
  createInsufficientInputError,
  isNamedError,
  type TalkdeckErrorName,
} from './errors.js'
export { createModelClient, type GenerateTextFn } from './llm/generate-text.js'
export { createTalkdeckLogger, type AppLogger } from './logging/logger.js'
export { runBatch, type BatchResults } from './pipeline/batch.js'
export { createPipelineDeps } from './pipeline/deps.js'
export { processVideo } from './pipeline/process-video.js'
export { createFileSink } from './pipeline/sink.js'
export type { DeckResult, OutputSink, PipelineDeps, VideoInput } from './pipeline/types.js'
export { renderDeckHtml } from './render/html.js'
export { renderDeckMarkdown } from './render/markdown.js'
export { runCli } from './run.js'
export { resolveTalkdeckSettings, type TalkdeckSettings } from './run/run-settings.js'
export * from './slides/index.js'
export { packTranscriptBatches, estimateTokens } from './transcript/batching.js'
export { sentenceRedistributor, type TextRedistributor } from './transcript/redistribute.js'
export { loadSubtitleFile, parseSubtitles } from './transcript/subtitles.js'
export type { TranscriptBatch, TranscriptSegment } from './transcript/types.js'
