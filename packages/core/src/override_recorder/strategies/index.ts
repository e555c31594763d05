export { AmendStrategy } from './amend_strategy';
export type { AmendStrategyDependencies } from './amend_strategy';
export { OverrideCommitStrategy } from './override_commit_strategy';
export type { OverrideCommitStrategyDependencies } from './override_commit_strategy';
export { LogAppendStrategy } from './log_append_strategy';
export type { LogAppendStrategyDependencies } from './log_append_strategy';
