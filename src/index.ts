export * from './shared/types'
export * from './shared/errors'
export * from './shared/constants/recovery'

export type { Decoder, DecodeRun } from './core/decoder/types'
export { XorDecoder, decodeEsetBytes, decodedOutputName } from './core/decoder/xor-decoder'
export { CommandDecoder, CONTAINER_PLACEHOLDER, parseCommandTemplate } from './core/decoder/command-decoder'
export type { CommandDecoderOptions } from './core/decoder/command-decoder'

export { ExtractionOrchestrator, findContainers, containerId } from './core/extraction/orchestrator'

export { parseSizeTokens } from './core/evidence/size-units'
export { parseEvidence, findFileName } from './core/evidence/evidence-parser'
export type { EvidenceParserOptions } from './core/evidence/evidence-parser'
export { TextFileOcrSource, TesseractOcrSource, preprocessScreenshot } from './core/evidence/ocr-source'
export type { OcrSource, TesseractOptions } from './core/evidence/ocr-source'

export { suggestNames, toAssignment, duplicateCounts, relativeError } from './core/matching/candidate-matcher'
export type { MatchOptions } from './core/matching/candidate-matcher'

export type { Prompter } from './core/review/prompter'
export { ReviewSession } from './core/review/review-session'
export { runReview, parseAction } from './core/review/run-review'
export type { ReviewOutcome } from './core/review/run-review'

export { FileWriter, FileWriterError } from './core/io/file-writer'
export type { CopyOptions, CopyResult } from './core/io/file-writer'
export { CommitWriter, safeFileName } from './core/commit/commit-writer'

export { parseCliArgs, RunOptionsSchema, USAGE } from './main/config'
export type { CliCommand, DecoderKind, RunOptions } from './main/config'
export { runPipeline } from './main/pipeline'
export type { PipelineDeps, PipelineOptions, PipelineResult } from './main/pipeline'
export { main } from './main/app'
