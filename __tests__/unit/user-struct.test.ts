import { describe, it, expect, beforeEach } from '@jest/globals';
import { Project } from 'ts-morph';
import { DEFAULT_CONFIG, type ResolvedConfig } from '@fieldmeta/protocol';
import { MetadataGenerator } from '@fieldmeta/compiler';

const META_SOURCE = [
	"import { Described, Meta } from '@fieldmeta/runtime';",
	'',
	'@Described()',
	'export class Org {',
	'\tname!: string;',
	'}',
	'',
	'@Described()',
	'export class UserStruct {',
	'\t@Meta(\'override_name="Primary ID", order="1"\')',
	'\tid!: number;',
	'',
	"\t@Meta({ override_name: 'name', order: '0' })",
	'\tusername!: string;',
	'',
	'\torg!: Org;',
	'\tdetails!: Map<string, string>;',
	'}',
].join('\n');

const LABEL_SOURCE = [
	'/** @described */',
	'export interface UserStruct {',
	'\t/** @label "Primary ID" */',
	'\tid: number;',
	'\t/** @label name */',
	'\tusername: string;',
	'\torg: string;',
	'\tdetails: string;',
	'}',
].join('\n');

describe('UserStruct metadata', () => {
	let project: Project;
	const config: ResolvedConfig = { ...DEFAULT_CONFIG, rootDir: '/app' };

	beforeEach(() => {
		project = new Project({ useInMemoryFileSystem: true, compilerOptions: { experimentalDecorators: true } });
	});

	it('should list fields and encode key/value metadata', () => {
		project.createSourceFile('/app/src/user.ts', META_SOURCE);
		const lines: string[] = [];

		const { operations } = new MetadataGenerator(config, project).compileType('src/user.ts', 'UserStruct');
		operations.listFields((line) => lines.push(line));

		expect(lines).toEqual(['id', 'username', 'org', 'details']);
		expect(operations.toMetadataString()).toBe(
			'[{"id":{"override_name":"Primary ID","order":"1"}},{"username":{"override_name":"name","order":"0"}},{"org":{}},{"details":{}}]'
		);
	});

	it('should compile a nested described type on its own', () => {
		project.createSourceFile('/app/src/user.ts', META_SOURCE);

		const report = new MetadataGenerator(config, project).run();

		expect(report.failures).toEqual([]);
		expect(report.modules.map((generated) => generated.typeNames)).toEqual([['Org', 'UserStruct']]);
		expect(report.modules[0].content).toContain('export const OrgMetadata = createOperations({\n');
		expect(report.modules[0].content).toContain('export const UserStructMetadata = createOperations({\n');
	});

	it('should encode override labels in the legacy form', () => {
		project.createSourceFile('/app/src/user.ts', LABEL_SOURCE);

		const generator = new MetadataGenerator(config, project);
		const { operations } = generator.compileType('src/user.ts', 'UserStruct');

		expect(generator.run().form).toBe('label');
		expect(operations.toMetadataString()).toBe(
			'{"id":"Primary ID","username":"name","org":"org","details":"details"}'
		);
	});
});
