import {describe, it, expect} from 'vitest';
import {dedupe, tokenize, tokenizeSlice} from '../tokenizer/index.js';

describe('tokenize', () => {
	it('splits on non-alphanumeric characters and lower-cases', () => {
		expect(tokenize('NewWidget(ctx context.Context, id int)')).toEqual([
			'newwidget',
			'ctx',
			'context',
			'context',
		]);
	});

	it('drops tokens of two characters or fewer', () => {
		expect(tokenize('a ab abc go Go123')).toEqual(['abc', 'go123']);
	});

	it('treats underscores and dashes as separators', () => {
		expect(tokenize('parse_user-config')).toEqual(['parse', 'user', 'config']);
	});

	it('keeps non-ASCII letters and counts code points', () => {
		expect(tokenize('Größe über ab')).toEqual(['größe', 'über']);
		expect(tokenize('日本語')).toEqual(['日本語']);
		expect(tokenize('日本')).toEqual([]);
	});

	it('returns an empty list for empty or separator-only input', () => {
		expect(tokenize('')).toEqual([]);
		expect(tokenize(' -- // ** ')).toEqual([]);
	});

	it('is idempotent on its own output', () => {
		const samples = [
			'// TODO: refactor this whole subsystem before release',
			'func (s *Server) HandleRequest(w http.ResponseWriter) error',
			'Größe_und_Gewicht 42 x9',
		];
		for (const sample of samples) {
			const tokens = tokenize(sample);
			expect(tokenize(tokens.join(' '))).toEqual(tokens);
			for (const token of tokens) {
				expect([...token].length).toBeGreaterThan(2);
				expect(token).toBe(token.toLowerCase());
				expect(token).toMatch(/^[\p{L}\p{Nd}]+$/u);
			}
		}
	});
});

describe('tokenizeSlice', () => {
	it('concatenates the tokens of every label', () => {
		expect(tokenizeSlice(['newwidget', 'request data', 'ab'])).toEqual([
			'newwidget',
			'request',
			'data',
		]);
	});
});

describe('dedupe', () => {
	it('keeps first-seen order and drops empty strings', () => {
		expect(dedupe(['b', '', 'a', 'b', 'c', 'a', ''])).toEqual(['b', 'a', 'c']);
	});
});
