import { describe, it, expect } from '@jest/globals';
import {
	FormMismatchError,
	ParseError,
	PlacementError,
	ShapeError,
	isCompileError,
	isFormMismatchError,
	isParseError,
	isPlacementError,
	isShapeError,
	type AnnotationToken,
} from '../../src/index';

const metaOnType: AnnotationToken = {
	form: 'meta',
	name: 'Meta',
	arguments: [{ kind: 'string', value: 'order="1"' }],
	location: { file: '/src/user.ts', line: 2 },
};

describe('compile errors', () => {
	it('should name the type and location for positional fields', () => {
		const error = new ShapeError('PositionalFields', 'Point', { file: '/src/geo.ts', line: 3 });

		expect(error.message).toBe(
			'Type "Point" has positional fields; only types with named fields can be described (/src/geo.ts:3)'
		);
		expect(error.kind).toBe('PositionalFields');
		expect(error.name).toBe('ShapeError');
		expect(error.typeName).toBe('Point');
		expect(error.location).toEqual({ file: '/src/geo.ts', line: 3 });
	});

	it('should describe types without fields', () => {
		const error = new ShapeError('NoFields', 'Marker');

		expect(error.message).toBe(
			'Type "Marker" declares no fields; only types with named fields can be described'
		);
		expect(error.location).toBeUndefined();
	});

	it('should name the repeated field', () => {
		const error = new ShapeError('DuplicateFields', 'Account', undefined, 'id');

		expect(error.message).toBe('Type "Account" declares field "id" more than once');
		expect(error.fieldName).toBe('id');
	});

	it('should report annotations placed on a type', () => {
		const error = new PlacementError('UserStruct', metaOnType);

		expect(error.message).toBe(
			'@Meta cannot be applied to type "UserStruct"; annotations apply only to its fields (/src/user.ts:2)'
		);
		expect(error.kind).toBe('AnnotationOnType');
		expect(error.annotation).toBe('Meta');
		expect(error.location).toEqual({ file: '/src/user.ts', line: 2 });
	});

	it('should report malformed annotations with field and reason', () => {
		const error = new ParseError('UserStruct', 'id', 'Meta', 'empty key');

		expect(error.message).toBe('Malformed @Meta on field "id" of type "UserStruct": empty key');
		expect(error.kind).toBe('MalformedAnnotation');
		expect(error.reason).toBe('empty key');
		expect(error.fieldName).toBe('id');
	});

	it('should report a form that does not match the build', () => {
		const token: AnnotationToken = { form: 'label', name: 'Label', arguments: [] };
		const error = new FormMismatchError('UserStruct', 'id', token, 'meta');

		expect(error.message).toBe('Field "id" of type "UserStruct" uses @Label but this build uses the meta form');
		expect(error.expected).toBe('meta');
		expect(error.found).toBe('label');
	});

	it('should narrow errors with the type guards', () => {
		const shape = new ShapeError('NoFields', 'Marker');
		const placement = new PlacementError('UserStruct', metaOnType);

		expect(isCompileError(shape)).toBe(true);
		expect(isCompileError(new Error('other'))).toBe(false);
		expect(isShapeError(shape)).toBe(true);
		expect(isShapeError(placement)).toBe(false);
		expect(isPlacementError(placement)).toBe(true);
		expect(isParseError(new ParseError('T', 'f', 'Meta', 'x'))).toBe(true);
		expect(isFormMismatchError(shape)).toBe(false);
		expect(shape).toBeInstanceOf(Error);
	});
});
