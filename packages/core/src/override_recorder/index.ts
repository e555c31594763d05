/**
 * OverrideRecorder - amend → override-commit → log-append fallback chain
 *
 * @module override_recorder
 */

export { OverrideRecorder, createOverrideRecord, DEFAULT_OVERRIDE_OPTIONS } from './override_recorder';
export {
  buildAppendix,
  buildRecordAppendix,
  buildOverrideCommitMessage,
  buildSentinelContent,
  buildLogBlock,
  RULE,
} from './appendix';
export { AmendStrategy, OverrideCommitStrategy, LogAppendStrategy } from './strategies';
export { FsOverrideFileSystem } from './fs';
export type { FsOverrideFileSystemOptions } from './fs';
export { MemoryOverrideFileSystem } from './memory';
export { OverrideError, PreconditionFailedError, FilesystemError } from './errors';
export type { FilesystemOperation } from './errors';
export type {
  OverrideRecord,
  OverrideTier,
  TierOutcome,
  TierAttempt,
  OverrideSuccess,
  OverrideFailure,
  OverrideResult,
  OverrideStrategy,
  StrategyContext,
  StrategySuccess,
  OverrideFileSystem,
  OverrideRecorderOptions,
  OverrideRecorderDependencies,
} from './override_recorder.types';
