/**
 * Built-in hooks: in-process transforms that run without provisioning.
 */

export { BuiltinHook } from './base.js';
export type { ChangeWording, FileCheckResult, HookFileContext, HookMode } from './base.js';
export { builtinNames, builtinTransforms, createBuiltinDescriptor, isBuiltin, resolveBuiltin } from './registry.js';
export type { BuiltinOverrides } from './registry.js';
export { TrailingWhitespaceHook, stripTrailingWhitespace } from './builtin/trailing-whitespace.js';
export { EndOfFileFixerHook, fixEndOfFile } from './builtin/end-of-file-fixer.js';
export { CheckYamlHook } from './builtin/check-yaml.js';
export { PrettyFormatJsonHook } from './builtin/pretty-format-json.js';
export { CheckAddedLargeFilesHook, DEFAULT_MAX_BYTES, parseMaxBytes } from './builtin/check-added-large-files.js';
