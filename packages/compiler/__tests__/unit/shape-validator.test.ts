import { describe, it, expect } from '@jest/globals';
import { isShapeError, ShapeError } from '@fieldmeta/protocol';
import { validateShape } from '../../src/pipeline/shape-validator';
import { declaration, field, userStruct } from '../fixtures/declarations';

function shapeError(run: () => void): ShapeError {
	try {
		run();
	} catch (error) {
		if (isShapeError(error)) {
			return error;
		}
		throw error;
	}
	throw new Error('expected a ShapeError');
}

describe('validateShape', () => {
	it('should accept a declaration with uniquely named fields', () => {
		expect(() => validateShape(userStruct())).not.toThrow();
	});

	it('should accept fields whose types are other described types', () => {
		const nested = declaration('Wrapper', [field('inner'), field('tags')]);

		expect(() => validateShape(nested)).not.toThrow();
	});

	it('should reject positional fields', () => {
		const tuple = declaration('Pair', [field('0'), field('1')], { shape: 'PositionalFields' });

		const error = shapeError(() => validateShape(tuple));

		expect(error.kind).toBe('PositionalFields');
		expect(error.typeName).toBe('Pair');
		expect(error.message).toBe('Type "Pair" has positional fields; only types with named fields can be described');
	});

	it('should reject a declaration without fields', () => {
		const error = shapeError(() => validateShape(declaration('Marker', [])));

		expect(error.kind).toBe('NoFields');
		expect(error.message).toBe('Type "Marker" declares no fields; only types with named fields can be described');
	});

	it('should reject a named-fields shape with an empty field list', () => {
		const error = shapeError(() => validateShape(declaration('Empty', [], { shape: 'NamedFields' })));

		expect(error.kind).toBe('NoFields');
	});

	it('should reject a field declared twice', () => {
		const duplicated = declaration('Account', [
			field('id'),
			{ name: 'id', annotations: [], location: { file: 'account.ts', line: 4 } },
		]);

		const error = shapeError(() => validateShape(duplicated));

		expect(error.kind).toBe('DuplicateFields');
		expect(error.fieldName).toBe('id');
		expect(error.message).toBe('Type "Account" declares field "id" more than once (account.ts:4)');
	});
});
