/**
 * Errors raised by the template environment.
 */

export type RegistrationKind = 'filter' | 'macro' | 'variable';

export class TemplateEnvironmentError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'TemplateEnvironmentError';
	}
}

export class InvalidRegistrationError extends TemplateEnvironmentError {
	constructor(
		readonly kind: RegistrationKind,
		readonly registrationName: string,
	) {
		super(
			`Invalid ${kind} name ${JSON.stringify(registrationName)}: ` +
				'expected letters, digits and underscores, not starting with a digit',
		);
		this.name = 'InvalidRegistrationError';
	}
}

export class DuplicateRegistrationError extends TemplateEnvironmentError {
	constructor(
		readonly kind: RegistrationKind,
		readonly registrationName: string,
	) {
		super(`A ${kind} named "${registrationName}" is already registered`);
		this.name = 'DuplicateRegistrationError';
	}
}

export class FilterNotFoundError extends TemplateEnvironmentError {
	constructor(readonly filterName: string) {
		super(`No filter named "${filterName}" is registered`);
		this.name = 'FilterNotFoundError';
	}
}

export class MacroNotFoundError extends TemplateEnvironmentError {
	constructor(readonly macroName: string) {
		super(`No macro named "${macroName}" is registered`);
		this.name = 'MacroNotFoundError';
	}
}

export class FilterResultError extends TemplateEnvironmentError {
	constructor(
		readonly filterName: string,
		readonly resultType: string,
	) {
		super(`Filter "${filterName}" returned ${resultType}, expected string`);
		this.name = 'FilterResultError';
	}
}

export class InvalidOptionsError extends TemplateEnvironmentError {
	constructor(readonly issues: readonly string[]) {
		super(`Invalid environment options: ${issues.join('; ')}`);
		this.name = 'InvalidOptionsError';
	}
}

export function isTemplateEnvironmentError(
	error: unknown,
): error is TemplateEnvironmentError {
	return error instanceof TemplateEnvironmentError;
}
