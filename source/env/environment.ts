/**
 * Template environment - the object a documentation generator hands to its
 * `defineEnv` hook.
 *
 * Holds three name-keyed registries:
 * - variables: values templates can reference
 * - macros: functions templates can call
 * - filters: unary string transforms used as `{{ text | name }}`
 *
 * Registration happens once at startup; lookups afterwards are plain map
 * reads.
 */

import {reportError} from '../lib/error-handler.js';
import type {Logger} from '../lib/logger.js';
import {
	DuplicateRegistrationError,
	FilterNotFoundError,
	FilterResultError,
	InvalidRegistrationError,
	MacroNotFoundError,
	type RegistrationKind,
} from './errors.js';
import {
	resolveEnvironmentOptions,
	type EnvironmentOptions,
} from './options.js';

export type Filter = (text: string) => string;

export type Macro = (...args: never[]) => unknown;

const NAME_PATTERN = /^[A-Za-z_]\w*$/;

const COMPONENT = 'Environment';

export type TemplateEnvironment = {
	readonly variables: Record<string, unknown>;
	readonly logger: Logger;
	filter<F extends Filter>(name: string, fn: F): F;
	macro<M extends Macro>(name: string, fn: M): M;
	variable(name: string, value: unknown): void;
	getFilter(name: string): Filter | undefined;
	hasFilter(name: string): boolean;
	filterNames(): string[];
	macroNames(): string[];
	applyFilter(name: string, text: string): string;
	pipe(text: string, ...names: string[]): string;
	callMacro(name: string, ...args: unknown[]): unknown;
};

export function createEnvironment(
	options?: EnvironmentOptions,
): TemplateEnvironment {
	const {allowOverride, logger, variables} =
		resolveEnvironmentOptions(options);
	const vars: Record<string, unknown> = {...variables};
	const filters = new Map<string, Filter>();
	const macros = new Map<string, (...args: unknown[]) => unknown>();

	function register<T>(
		kind: RegistrationKind,
		registry: Map<string, T>,
		name: string,
		value: T,
	): void {
		if (!NAME_PATTERN.test(name)) {
			throw new InvalidRegistrationError(kind, name);
		}
		if (registry.has(name)) {
			if (!allowOverride) {
				throw new DuplicateRegistrationError(kind, name);
			}
			logger.warn(COMPONENT, `Overriding ${kind}`, {name});
		}
		registry.set(name, value);
		logger.debug(COMPONENT, `Registered ${kind}`, {name});
	}

	function applyFilter(name: string, text: string): string {
		const fn = filters.get(name);
		if (!fn) {
			throw new FilterNotFoundError(name);
		}
		// Filters may come from untyped template code.
		let result: unknown;
		try {
			result = fn(text);
		} catch (error) {
			reportError(COMPONENT, error, logger, {filter: name});
			throw error;
		}
		if (typeof result !== 'string') {
			throw new FilterResultError(
				name,
				result === null ? 'null' : typeof result,
			);
		}
		return result;
	}

	return {
		variables: vars,
		logger,

		filter<F extends Filter>(name: string, fn: F): F {
			register('filter', filters, name, fn);
			return fn;
		},

		macro<M extends Macro>(name: string, fn: M): M {
			// Templates call macros with whatever arguments they were given.
			register('macro', macros, name, (...args: unknown[]) =>
				Reflect.apply(fn, undefined, args),
			);
			return fn;
		},

		variable(name, value) {
			if (!NAME_PATTERN.test(name)) {
				throw new InvalidRegistrationError('variable', name);
			}
			vars[name] = value;
		},

		getFilter(name) {
			return filters.get(name);
		},

		hasFilter(name) {
			return filters.has(name);
		},

		filterNames() {
			return [...filters.keys()];
		},

		macroNames() {
			return [...macros.keys()];
		},

		applyFilter,

		pipe(text, ...names) {
			return names.reduce(
				(current, name) => applyFilter(name, current),
				text,
			);
		},

		callMacro(name, ...args) {
			const fn = macros.get(name);
			if (!fn) {
				throw new MacroNotFoundError(name);
			}
			return fn(...args);
		},
	};
}
