export { createCommandRunner, runCommandLine } from './command-runner';
export type { CommandRunner, CommandOptions } from './command-runner';

export { buildUvEnvironment, isInsideContainer } from './uv-environment';
export type { UvEnvironmentOptions } from './uv-environment';

export { readUvLock, loadLockedVersions, hasPinnedRequirement, assertLockedVersion, seedIndexFromLock } from './uv-lock';
export type { LockedVersionFiles } from './uv-lock';

export { getExcludeNewer } from './pyproject';
export { copyProject, createIgnoreFilter, installNoopPreCommitHook, NOOP_HOOK } from './project-copy';

export { runUpgradeScenario, nextMajorVersion } from './upgrade-scenario';
export type { UpgradeScenarioOptions, ScenarioStep } from './upgrade-scenario';
