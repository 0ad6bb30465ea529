import {describe, it, expect} from 'vitest';
import {
	EXPECTED_OUTPUT_REPLACEMENT,
	PROMPT_MARKERS,
	removePrompts,
	replacePromptMarker,
} from '../remove-prompts.js';

describe('removePrompts', () => {
	it('drops a primary prompt and its space', () => {
		expect(removePrompts('>> print(1)\n')).toBe('print(1)\n');
	});

	it('consumes only one space after a continuation prompt', () => {
		expect(removePrompts('..   more\n')).toBe('  more\n');
	});

	it('rewrites expected output as a comment', () => {
		expect(removePrompts('=> 42\n')).toBe('#=> 42\n');
	});

	it('always adds the space after #=>', () => {
		expect(removePrompts('=>\n')).toBe('#=> \n');
		expect(removePrompts('=>')).toBe('#=> ');
	});

	it('removes bare prompts at end of line or text', () => {
		expect(removePrompts('>>\n')).toBe('\n');
		expect(removePrompts('..')).toBe('');
		expect(removePrompts('>>')).toBe('');
	});

	it('rewrites a whole transcript', () => {
		const transcript = [
			'>> result = CreateUser.call(name: "Bob", age: 23)',
			'.. result.name',
			'=> "Bob"',
			'plain line',
			'',
		].join('\n');

		expect(removePrompts(transcript)).toBe(
			[
				'result = CreateUser.call(name: "Bob", age: 23)',
				'result.name',
				'#=> "Bob"',
				'plain line',
				'',
			].join('\n'),
		);
	});

	it('leaves lines without a leading marker alone', () => {
		expect(removePrompts('no prompt here\n')).toBe('no prompt here\n');
		expect(removePrompts('x >> y\n')).toBe('x >> y\n');
		expect(removePrompts('  >> indented\n')).toBe('  >> indented\n');
		expect(removePrompts('#=> 1\n')).toBe('#=> 1\n');
	});

	it('requires a space or line end after the marker', () => {
		expect(removePrompts('>>x\n')).toBe('>>x\n');
		expect(removePrompts('>>>\n')).toBe('>>>\n');
		expect(removePrompts('...\n')).toBe('...\n');
		expect(removePrompts('=>>\n')).toBe('=>>\n');
		expect(removePrompts('>>\tx\n')).toBe('>>\tx\n');
	});

	it('returns the empty string unchanged', () => {
		expect(removePrompts('')).toBe('');
	});

	it('only strips one marker per line', () => {
		expect(removePrompts('>> >> x\n')).toBe('>> x\n');
	});

	describe('line endings', () => {
		it('treats a carriage return as content', () => {
			expect(removePrompts('=>\r\n')).toBe('=>\r\n');
			expect(removePrompts('=> x\r\n')).toBe('#=> x\r\n');
			expect(removePrompts('>> a\r\n>> b\r\n')).toBe('a\r\nb\r\n');
		});

		it('does not start a line after a bare carriage return', () => {
			expect(removePrompts('a\r>> b')).toBe('a\r>> b');
		});

		it('does not start a line after a unicode line separator', () => {
			expect(removePrompts('a\u2028>> b')).toBe('a\u2028>> b');
		});
	});

	describe('properties', () => {
		const corpus = [
			'',
			'\n\n',
			'puts "hi"\n',
			'>> 1 + 1\n=> 2\n',
			'>> def add(a, b)\n..   a + b\n.. end\n=> :add\n',
			'=>\n>>\n..\n',
			'=> x\r\n>> y\r\n',
			'text >> inline\n=>> no\n',
			'>> a\n\n>> b',
		];

		it('is the identity on text without markers', () => {
			for (const text of ['', 'abc', 'x >> y\n', ' .. z\n', '->\n=>>']) {
				expect(removePrompts(text)).toBe(text);
			}
		});

		it('is idempotent on example transcripts', () => {
			for (const text of corpus) {
				const once = removePrompts(text);
				expect(removePrompts(once)).toBe(once);
			}
		});

		it('gives the same result on repeated calls', () => {
			const text = '>> a\n=> b\n';
			expect(removePrompts(text)).toBe('a\n#=> b\n');
			expect(removePrompts(text)).toBe('a\n#=> b\n');
		});
	});
});

describe('replacePromptMarker', () => {
	it('maps each marker to its replacement', () => {
		expect(replacePromptMarker('>>')).toBe('');
		expect(replacePromptMarker('..')).toBe('');
		expect(replacePromptMarker('=>')).toBe(EXPECTED_OUTPUT_REPLACEMENT);
	});

	it('knows every marker kind', () => {
		expect(PROMPT_MARKERS).toEqual({
			'>>': 'primary',
			'..': 'continuation',
			'=>': 'expected-output',
		});
	});
});
