import { describe, it, expect } from '@jest/globals';
import { buildMetadataTable } from '../../src/pipeline/table-builder';
import { declaration, field, userStruct } from '../fixtures/declarations';

describe('buildMetadataTable', () => {
	it('should pair fields with meta values in declaration order', () => {
		const table = buildMetadataTable(userStruct(), {
			form: 'meta',
			fields: new Map([
				['details', new Map()],
				['org', new Map()],
				['username', new Map([['order', '0']])],
				['id', new Map([['order', '1']])],
			]),
		});

		expect(table.typeName).toBe('UserStruct');
		expect(table.form).toBe('meta');
		expect(table.entries.map((entry) => entry.field)).toEqual(['id', 'username', 'org', 'details']);
	});

	it('should build a label table', () => {
		const table = buildMetadataTable(declaration('Pair', [field('a'), field('b')]), {
			form: 'label',
			fields: new Map([
				['a', 'a'],
				['b', 'Bee'],
			]),
		});

		expect(table).toEqual({
			typeName: 'Pair',
			form: 'label',
			entries: [
				{ field: 'a', metadata: 'a' },
				{ field: 'b', metadata: 'Bee' },
			],
		});
	});

	it('should fail when a field has no extracted metadata', () => {
		const build = () =>
			buildMetadataTable(declaration('Pair', [field('a'), field('b')]), {
				form: 'label',
				fields: new Map([['a', 'a']]),
			});

		expect(build).toThrow('No metadata extracted for field "b" of type "Pair"');
	});
});
