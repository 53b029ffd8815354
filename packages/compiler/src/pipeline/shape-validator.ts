import { ShapeError, type TypeDeclaration } from '@fieldmeta/protocol';

/**
 * Accepts only declarations with one or more uniquely named fields.
 * Field types are not inspected; nested described types are validated on their own.
 */
export function validateShape(declaration: TypeDeclaration): void {
	const { name, location } = declaration;

	switch (declaration.shape) {
		case 'PositionalFields':
			throw new ShapeError('PositionalFields', name, location);
		case 'NoFields':
			throw new ShapeError('NoFields', name, location);
		case 'NamedFields':
			break;
	}

	if (declaration.fields.length === 0) {
		throw new ShapeError('NoFields', name, location);
	}

	const seen = new Set<string>();
	for (const field of declaration.fields) {
		if (seen.has(field.name)) {
			throw new ShapeError('DuplicateFields', name, field.location ?? location, field.name);
		}
		seen.add(field.name);
	}
}
