import { resolve } from 'path';
import { Project } from 'ts-morph';
import type { ResolvedConfig } from '@fieldmeta/protocol';

function resolveGlob(rootDir: string, glob: string): string {
	return glob.startsWith('!') ? `!${resolve(rootDir, glob.slice(1))}` : resolve(rootDir, glob);
}

/**
 * Creates the ts-morph project holding the configured sources
 */
export function createProject(config: ResolvedConfig): Project {
	const project = config.tsConfigFilePath
		? new Project({
				tsConfigFilePath: resolve(config.rootDir, config.tsConfigFilePath),
				skipAddingFilesFromTsConfig: true,
			})
		: new Project({
				compilerOptions: { experimentalDecorators: true },
			});

	project.addSourceFilesAtPaths(config.include.map((glob) => resolveGlob(config.rootDir, glob)));
	return project;
}
