/**
 * Parser for `key="value", key2="value2"` annotation text
 */

export class AnnotationSyntaxError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'AnnotationSyntaxError';
	}
}

const QUOTES = ['"', "'"];

class PairScanner {
	private pos = 0;

	constructor(private readonly text: string) {}

	get done(): boolean {
		return this.pos >= this.text.length;
	}

	skipWhitespace(): void {
		while (!this.done && /\s/.test(this.peek())) {
			this.pos++;
		}
	}

	expect(char: string): void {
		this.skipWhitespace();
		if (this.done) {
			throw new AnnotationSyntaxError(`expected "${char}" at end of input`);
		}
		if (this.peek() !== char) {
			throw new AnnotationSyntaxError(
				`expected "${char}" at position ${this.pos + 1}, found "${this.peek()}"`
			);
		}
		this.pos++;
	}

	/**
	 * Reads a quoted or bare key/value. Bare parts stop at any of `stops` or a quote.
	 */
	readPart(stops: string, role: 'key' | 'value'): string {
		this.skipWhitespace();
		const start = this.pos;
		const first = this.peek();
		if (QUOTES.includes(first)) {
			return this.readQuoted(first, role);
		}

		while (!this.done && !stops.includes(this.peek()) && !QUOTES.includes(this.peek())) {
			this.pos++;
		}
		const bare = this.text.slice(start, this.pos).trim();
		if (bare.length === 0) {
			throw new AnnotationSyntaxError(`empty ${role} at position ${start + 1}`);
		}
		return bare;
	}

	private readQuoted(quote: string, role: 'key' | 'value'): string {
		const start = this.pos;
		this.pos++;
		let value = '';
		while (!this.done) {
			const char = this.peek();
			if (char === '\\') {
				this.pos++;
				if (this.done) {
					break;
				}
				value += this.peek();
			} else if (char === quote) {
				this.pos++;
				return value;
			} else {
				value += char;
			}
			this.pos++;
		}
		throw new AnnotationSyntaxError(`unterminated quote in ${role} starting at position ${start + 1}`);
	}

	private peek(): string {
		return this.text.charAt(this.pos);
	}
}

/**
 * Splits annotation text into ordered key/value pairs.
 * Each pair splits on its first `=`; quoted parts may contain `,` and `=`.
 * Blank text yields no pairs.
 */
export function parsePairs(text: string): Array<[string, string]> {
	const scanner = new PairScanner(text);
	const pairs: Array<[string, string]> = [];

	scanner.skipWhitespace();
	if (scanner.done) {
		return pairs;
	}

	for (;;) {
		const key = scanner.readPart('=,', 'key');
		if (key.length === 0) {
			throw new AnnotationSyntaxError('empty key');
		}
		scanner.expect('=');
		const value = scanner.readPart(',', 'value');
		pairs.push([key, value]);

		scanner.skipWhitespace();
		if (scanner.done) {
			return pairs;
		}
		scanner.expect(',');
	}
}

/**
 * Normalizes free label text: trims it and drops one pair of matching surrounding quotes
 */
export function parseLabelText(text: string): string {
	const trimmed = text.trim();
	if (trimmed.length === 0) {
		throw new AnnotationSyntaxError('label text is empty');
	}
	const first = trimmed.charAt(0);
	if (trimmed.length >= 2 && QUOTES.includes(first) && trimmed.endsWith(first)) {
		return trimmed.slice(1, -1);
	}
	return trimmed;
}
