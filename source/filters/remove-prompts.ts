/**
 * Prompt stripping for interactive example transcripts.
 *
 * Example code in the docs is written as a console session:
 *
 * ```
 * >> result = Operation.call(input)
 * .. do_something(result)
 * => #<Result ...>
 * ```
 *
 * Rendered pages show plain code instead: input prompts are dropped and
 * expected output becomes a `#=> ` comment.
 */

export type PromptMarker = '>>' | '..' | '=>';

export type PromptKind = 'primary' | 'continuation' | 'expected-output';

export const PROMPT_MARKERS: Readonly<Record<PromptMarker, PromptKind>> = {
	'>>': 'primary',
	'..': 'continuation',
	'=>': 'expected-output',
};

export const EXPECTED_OUTPUT_REPLACEMENT = '#=> ';

/**
 * A marker at the start of a line, followed by one space or the end of
 * the line.
 *
 * Line boundaries are `\n` only (`(?<![^\n])` / `(?![^\n])`); the `m`
 * flag is not used because it would also treat `\r`, U+2028 and U+2029
 * as line terminators.
 */
export const BYEXAMPLE_PROMPT_PATTERN = /(?<![^\n])(>>|\.\.|=>)( |(?![^\n]))/g;

function isPromptMarker(value: string): value is PromptMarker {
	return Object.hasOwn(PROMPT_MARKERS, value);
}

/**
 * Replacement text for a matched marker and its delimiter.
 */
export function replacePromptMarker(marker: PromptMarker): string {
	return PROMPT_MARKERS[marker] === 'expected-output'
		? EXPECTED_OUTPUT_REPLACEMENT
		: '';
}

/**
 * Strip `>> ` and `.. ` prompts and rewrite `=> ` to `#=> ` at every line
 * start. Everything else is returned as is.
 */
export function removePrompts(text: string): string {
	return text.replace(
		BYEXAMPLE_PROMPT_PATTERN,
		(match: string, marker: string) =>
			isPromptMarker(marker) ? replacePromptMarker(marker) : match,
	);
}
