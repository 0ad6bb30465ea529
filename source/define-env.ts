/**
 * Hook for defining variables, macros and filters on the docs environment.
 */

import {
	createEnvironment,
	type TemplateEnvironment,
} from './env/environment.js';
import type {EnvironmentOptions} from './env/options.js';
import {removePrompts} from './filters/remove-prompts.js';

/**
 * Filter name used by the page templates. The spelling is part of the
 * template contract.
 */
export const REMOVE_CODE_PROMPT_FILTER = 'remove_code_promt';

export function defineEnv(env: TemplateEnvironment): TemplateEnvironment {
	env.filter(REMOVE_CODE_PROMPT_FILTER, removePrompts);
	env.logger.debug('defineEnv', 'Docs filters ready', {
		filters: env.filterNames(),
	});
	return env;
}

/**
 * Create an environment with the docs filters already registered.
 *
 * @example
 * const env = createDocsEnvironment();
 * env.applyFilter('remove_code_promt', '>> 1 + 1\n=> 2\n');
 * // '1 + 1\n#=> 2\n'
 */
export function createDocsEnvironment(
	options?: EnvironmentOptions,
): TemplateEnvironment {
	return defineEnv(createEnvironment(options));
}
