import {z} from 'zod';
import {createNullLogger, isLogger, type Logger} from '../lib/logger.js';
import {InvalidOptionsError} from './errors.js';

const environmentOptionsSchema = z.object({
	allowOverride: z.boolean().default(false),
	logger: z
		.custom<Logger>(isLogger, {
			message: 'expected an object with debug, info, warn and error methods',
		})
		.optional(),
	variables: z.record(z.string(), z.unknown()).default({}),
});

export type EnvironmentOptions = z.input<typeof environmentOptionsSchema>;

export type ResolvedEnvironmentOptions = {
	allowOverride: boolean;
	logger: Logger;
	variables: Record<string, unknown>;
};

function formatIssue(issue: z.ZodIssue): string {
	const where = issue.path.length > 0 ? issue.path.join('.') : 'options';
	return `${where}: ${issue.message}`;
}

/**
 * Validate environment options and fill in defaults.
 */
export function resolveEnvironmentOptions(
	options: unknown = {},
): ResolvedEnvironmentOptions {
	const parsed = environmentOptionsSchema.safeParse(options);
	if (!parsed.success) {
		throw new InvalidOptionsError(parsed.error.issues.map(formatIssue));
	}

	return {
		allowOverride: parsed.data.allowOverride,
		logger: parsed.data.logger ?? createNullLogger(),
		variables: parsed.data.variables,
	};
}
