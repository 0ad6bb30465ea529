export {
	BYEXAMPLE_PROMPT_PATTERN,
	EXPECTED_OUTPUT_REPLACEMENT,
	PROMPT_MARKERS,
	removePrompts,
	replacePromptMarker,
	type PromptKind,
	type PromptMarker,
} from './filters/remove-prompts.js';
export {
	createEnvironment,
	type Filter,
	type Macro,
	type TemplateEnvironment,
} from './env/environment.js';
export type {
	EnvironmentOptions,
	ResolvedEnvironmentOptions,
} from './env/options.js';
export {resolveEnvironmentOptions} from './env/options.js';
export * from './env/errors.js';
export {
	REMOVE_CODE_PROMPT_FILTER,
	createDocsEnvironment,
	defineEnv,
} from './define-env.js';
export {
	createConsoleLogger,
	createNullLogger,
	createStreamLogger,
	formatEntry,
	isLogger,
	type LogLevel,
	type LogSink,
	type Logger,
	type StreamLoggerOptions,
} from './lib/logger.js';
export {describeError, reportError} from './lib/error-handler.js';
