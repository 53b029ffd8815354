import type { MetadataTable } from '@fieldmeta/protocol';
import type { CompiledType } from '../types.js';

export interface EmitOptions {
	/** Source path as shown in the generated header */
	sourceLabel: string;
	exportSuffix: string;
	runtimeModule: string;
}

const literal = (value: string): string => JSON.stringify(value);

function renderMap(values: ReadonlyMap<string, string>): string {
	if (values.size === 0) {
		return 'new Map()';
	}
	const pairs = Array.from(values, ([key, value]) => `[${literal(key)}, ${literal(value)}]`);
	return `new Map([${pairs.join(', ')}])`;
}

function renderEntries(table: MetadataTable): string[] {
	if (table.form === 'label') {
		return table.entries.map(
			(entry) => `{ field: ${literal(entry.field)}, metadata: ${literal(entry.metadata)} }`
		);
	}
	return table.entries.map((entry) => `{ field: ${literal(entry.field)}, metadata: ${renderMap(entry.metadata)} }`);
}

export function exportNameFor(typeName: string, exportSuffix: string): string {
	return `${typeName}${exportSuffix}`;
}

function renderType(compiled: CompiledType, options: EmitOptions): string {
	const { table } = compiled;
	const entries = renderEntries(table)
		.map((entry) => `\t\t${entry},\n`)
		.join('');

	return `export const ${exportNameFor(table.typeName, options.exportSuffix)} = createOperations({
	typeName: ${literal(table.typeName)},
	form: ${literal(table.form)},
	entries: [
${entries}\t],
});
`;
}

/**
 * Renders the module holding the operations of every type of one source file
 */
export function emitModule(types: CompiledType[], options: EmitOptions): string {
	const header = `/**
 * AUTO-GENERATED - DO NOT EDIT
 * Generated by fieldmeta from ${options.sourceLabel}
 */

import { createOperations } from '${options.runtimeModule}';
`;

	return [header, ...types.map((compiled) => renderType(compiled, options))].join('\n');
}
