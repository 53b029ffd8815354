import type {
	GeneratedOperations,
	LabelTable,
	MetadataTable,
	MetaTable,
	OutputSink,
} from '@fieldmeta/protocol';
import { encodeTable } from './encode.js';
import type { OperationsOptions } from './types.js';

export const stdoutSink: OutputSink = (line) => {
	process.stdout.write(`${line}\n`);
};

function freezeTable(table: MetadataTable): MetadataTable {
	if (table.form === 'label') {
		const labels: LabelTable = {
			typeName: table.typeName,
			form: 'label',
			entries: Object.freeze(table.entries.map((entry) => Object.freeze({ ...entry }))),
		};
		return Object.freeze(labels);
	}

	const meta: MetaTable = {
		typeName: table.typeName,
		form: 'meta',
		entries: Object.freeze(
			table.entries.map((entry) => Object.freeze({ field: entry.field, metadata: new Map(entry.metadata) }))
		),
	};
	return Object.freeze(meta);
}

/**
 * Synthesizes listFields/toMetadataString over a copy of the table.
 * Both recompute from the table on every call.
 */
export function createOperations(table: MetadataTable, options: OperationsOptions = {}): GeneratedOperations {
	const frozen = freezeTable(table);
	const defaultSink = options.sink ?? stdoutSink;

	return Object.freeze({
		typeName: frozen.typeName,

		listFields(sink: OutputSink = defaultSink): void {
			for (const entry of frozen.entries) {
				sink(entry.field);
			}
		},

		toMetadataString(): string {
			return encodeTable(frozen);
		},
	});
}
