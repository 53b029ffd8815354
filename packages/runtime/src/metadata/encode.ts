import type { MetadataTable } from '@fieldmeta/protocol';

/**
 * Writes a JSON object member by member so keys keep the given order,
 * including integer-like keys a plain object would move to the front
 */
export function encodeOrderedObject(entries: Iterable<readonly [string, string]>): string {
	const members: string[] = [];
	for (const [key, value] of entries) {
		members.push(`${JSON.stringify(key)}:${JSON.stringify(value)}`);
	}
	return `{${members.join(',')}}`;
}

/**
 * Encodes a metadata table as compact JSON.
 * Label tables become one object keyed by field; meta tables an array of
 * single-key objects, one per field.
 */
export function encodeTable(table: MetadataTable): string {
	if (table.form === 'label') {
		return encodeOrderedObject(table.entries.map((entry) => [entry.field, entry.metadata] as const));
	}

	const elements = table.entries.map(
		(entry) => `{${JSON.stringify(entry.field)}:${encodeOrderedObject(entry.metadata)}}`
	);
	return `[${elements.join(',')}]`;
}
