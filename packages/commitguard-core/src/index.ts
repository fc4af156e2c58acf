export * from './types/index.js';
export * from './errors.js';
export * from './utils/logger.js';
export { writeFileAtomic, writeJsonAtomic } from './utils/fs.js';
export { renderTemplate, shellJoin, shellQuote } from './utils/shell.js';
export * from './hooks/index.js';
export { DEFAULT_CONFIG_FILE, defaultConfigTemplate, loadConfig, parseConfig } from './config/loader.js';
export type { LoadedConfig } from './config/loader.js';
export { DEFAULT_INCLUDE, FileSelector, canonicalPath, validatePattern } from './selection/file-selector.js';
export type { HookPatterns, SelectorOptions } from './selection/file-selector.js';
export { CACHE_DIR_ENV, MARKER_FILE, ProvisioningManager, provisioningKey, resolveCacheDir } from './provisioning/manager.js';
export type { ProvisioningMarker, ProvisioningOptions } from './provisioning/manager.js';
export { HookExecutor, createOutcome } from './executor/executor.js';
export type { ExecutorOptions } from './executor/executor.js';
export { HookOrchestrator, buildReport, computeExitCode, summarizeOutcome, summarizeReport } from './orchestrator/orchestrator.js';
export type { OrchestratorOptions, RunOptions } from './orchestrator/orchestrator.js';
// Services
export { CHANGELOG_FILE, renderChangelogEntry, writeChangelog } from './services/changelog.js';
export { validateBuiltinHook } from './services/hook-validator.js';
export type { ValidationCheck } from './services/hook-validator.js';
export { SCAFFOLD_LANGUAGES, SNIPPET_FILE, isScaffoldLanguage, scaffoldHook } from './services/scaffold.js';
export type { ScaffoldLanguage, ScaffoldOptions, ScaffoldResult } from './services/scaffold.js';
export { SHIM_MARKER, installGitShim, renderPreCommitShim, resolveHookPath, writeShim } from './services/git-shim.js';
export type { ShimInstallResult } from './services/git-shim.js';
