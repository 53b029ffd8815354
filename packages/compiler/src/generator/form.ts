import type { AnnotationForm, BuildForm, TypeDeclaration } from '@fieldmeta/protocol';

/**
 * Picks the single annotation form of a build. `auto` takes the form of the
 * first field annotation found, or `meta` when there is none; annotations of
 * the other form then fail to compile.
 */
export function resolveBuildForm(form: BuildForm, declarations: TypeDeclaration[]): AnnotationForm {
	if (form !== 'auto') {
		return form;
	}
	const [first] = declarations.flatMap((declaration) => declaration.fields).flatMap((field) => field.annotations);
	return first ? first.form : 'meta';
}
