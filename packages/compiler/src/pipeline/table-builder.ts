import type { MetadataTable, TypeDeclaration } from '@fieldmeta/protocol';
import type { ExtractedMetadata } from '../types.js';

function lookup<M>(fields: ReadonlyMap<string, M>, typeName: string, fieldName: string): M {
	const metadata = fields.get(fieldName);
	if (metadata === undefined) {
		throw new Error(`No metadata extracted for field "${fieldName}" of type "${typeName}"`);
	}
	return metadata;
}

/**
 * Pairs each field, in declaration order, with its extracted metadata
 */
export function buildMetadataTable(declaration: TypeDeclaration, extracted: ExtractedMetadata): MetadataTable {
	const typeName = declaration.name;

	if (extracted.form === 'label') {
		return {
			typeName,
			form: 'label',
			entries: declaration.fields.map((field) => ({
				field: field.name,
				metadata: lookup(extracted.fields, typeName, field.name),
			})),
		};
	}

	return {
		typeName,
		form: 'meta',
		entries: declaration.fields.map((field) => ({
			field: field.name,
			metadata: lookup(extracted.fields, typeName, field.name),
		})),
	};
}
