import {
	FormMismatchError,
	ParseError,
	PlacementError,
	type AnnotationArgument,
	type AnnotationForm,
	type AnnotationToken,
	type FieldDeclaration,
	type TypeDeclaration,
} from '@fieldmeta/protocol';
import type { ExtractedMetadata } from '../types.js';
import { AnnotationSyntaxError, parseLabelText, parsePairs } from './pair-parser.js';

/**
 * Rejects recognized annotations placed on the type itself
 */
export function checkTypePlacement(declaration: TypeDeclaration): void {
	const [misplaced] = declaration.annotations;
	if (misplaced) {
		throw new PlacementError(declaration.name, misplaced);
	}
}

function describeArgument(argument: AnnotationArgument): string {
	switch (argument.kind) {
		case 'string':
		case 'text':
			return 'a string';
		case 'object':
			return 'an object literal';
		case 'unsupported':
			return `\`${argument.text}\``;
	}
}

class FieldContext {
	constructor(
		private readonly declaration: TypeDeclaration,
		private readonly field: FieldDeclaration
	) {}

	/**
	 * Returns the field's single annotation, if any, after checking it matches the build form
	 */
	selectToken(form: AnnotationForm): AnnotationToken | undefined {
		const { annotations } = this.field;
		if (annotations.length > 1) {
			const names = annotations.map((token) => `@${token.name}`).join(', ');
			throw new ParseError(
				this.declaration.name,
				this.field.name,
				annotations[1].name,
				`a field takes at most one annotation, found ${names}`,
				annotations[1].location ?? this.field.location
			);
		}

		const [token] = annotations;
		if (token && token.form !== form) {
			throw new FormMismatchError(this.declaration.name, this.field.name, token, form);
		}
		return token;
	}

	malformed(token: AnnotationToken, reason: string): ParseError {
		return new ParseError(
			this.declaration.name,
			this.field.name,
			token.name,
			reason,
			token.location ?? this.field.location
		);
	}

	parse<T>(token: AnnotationToken, parser: () => T): T {
		try {
			return parser();
		} catch (error) {
			if (error instanceof AnnotationSyntaxError) {
				throw this.malformed(token, error.message);
			}
			throw error;
		}
	}
}

/**
 * Label form: the override string, or the field's own name when unannotated
 */
export function extractLabel(declaration: TypeDeclaration, field: FieldDeclaration): string {
	const context = new FieldContext(declaration, field);
	const token = context.selectToken('label');
	if (!token) {
		return field.name;
	}

	if (token.arguments.length !== 1) {
		throw context.malformed(token, `expected exactly one label, found ${token.arguments.length} arguments`);
	}

	const [argument] = token.arguments;
	switch (argument.kind) {
		case 'string':
			return argument.value;
		case 'text':
			return context.parse(token, () => parseLabelText(argument.text));
		default:
			throw context.malformed(token, `label must be a string literal, found ${describeArgument(argument)}`);
	}
}

/**
 * Meta form: ordered key/value pairs, empty when unannotated.
 * A repeated key keeps its first position and takes the last value.
 */
export function extractMeta(declaration: TypeDeclaration, field: FieldDeclaration): ReadonlyMap<string, string> {
	const context = new FieldContext(declaration, field);
	const token = context.selectToken('meta');
	const values = new Map<string, string>();
	if (!token) {
		return values;
	}

	for (const argument of token.arguments) {
		switch (argument.kind) {
			case 'object':
				for (const property of argument.properties) {
					if (property.key.length === 0) {
						throw context.malformed(token, 'empty key');
					}
					if (property.value.kind !== 'string') {
						throw context.malformed(
							token,
							`value of "${property.key}" must be a string literal, found ${describeArgument(property.value)}`
						);
					}
					values.set(property.key, property.value.value);
				}
				break;
			case 'string':
			case 'text': {
				const text = argument.kind === 'string' ? argument.value : argument.text;
				for (const [key, value] of context.parse(token, () => parsePairs(text))) {
					values.set(key, value);
				}
				break;
			}
			case 'unsupported':
				throw context.malformed(token, `unsupported argument ${describeArgument(argument)}`);
		}
	}

	return values;
}

/**
 * Extracts metadata for every field of a shape-validated declaration
 */
export function extractMetadata(declaration: TypeDeclaration, form: AnnotationForm): ExtractedMetadata {
	if (form === 'label') {
		const fields = new Map<string, string>();
		for (const field of declaration.fields) {
			fields.set(field.name, extractLabel(declaration, field));
		}
		return { form, fields };
	}

	const fields = new Map<string, ReadonlyMap<string, string>>();
	for (const field of declaration.fields) {
		fields.set(field.name, extractMeta(declaration, field));
	}
	return { form, fields };
}
