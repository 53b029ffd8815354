import { join, parse, relative, resolve } from 'path';
import type { ResolvedConfig } from '@fieldmeta/protocol';

export type OutputPathConfig = Pick<ResolvedConfig, 'rootDir' | 'outDir' | 'outputSuffix'>;

/**
 * Where the generated module for a source file goes: beside it, or mirrored
 * under outDir relative to rootDir
 */
export function outputPathFor(sourcePath: string, config: OutputPathConfig): string {
	const { dir, name } = parse(sourcePath);
	const fileName = `${name}${config.outputSuffix}`;

	if (!config.outDir) {
		return join(dir, fileName);
	}

	const root = resolve(config.rootDir);
	return join(resolve(root, config.outDir), relative(root, dir), fileName);
}

export function isGeneratedPath(sourcePath: string, config: Pick<ResolvedConfig, 'outputSuffix'>): boolean {
	return sourcePath.endsWith(config.outputSuffix) || sourcePath.endsWith('.d.ts');
}
