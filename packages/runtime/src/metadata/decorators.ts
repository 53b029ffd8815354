/**
 * Decorator markers for described types
 *
 * These decorators are MARKERS ONLY - they don't record anything at runtime.
 * Fields and annotations are read at BUILD TIME using ts-morph, so unannotated
 * fields are seen as well.
 */

export type MetaValues = Record<string, string>;

/**
 * Applies to properties and to constructor parameter properties
 */
export type FieldDecorator = (target: object, propertyKey: string | symbol | undefined, parameterIndex?: number) => void;

/**
 * Class decorator to mark a type for metadata generation
 */
export function Described() {
	return function <T extends abstract new (...args: never[]) => unknown>(constructor: T): T {
		return constructor;
	};
}

/**
 * Key/value metadata for a field.
 *
 * @example
 * ```ts
 * @Meta({ override_name: 'Primary ID', order: '1' })
 * id!: number;
 *
 * @Meta('override_name="name", order="0"')
 * username!: string;
 *
 * constructor(@Meta({ order: '2' }) public org: string) {}
 * ```
 */
export function Meta(values?: MetaValues): FieldDecorator;
export function Meta(...pairs: string[]): FieldDecorator;
export function Meta(..._args: Array<MetaValues | string | undefined>): FieldDecorator {
	return () => undefined;
}

/**
 * Single override label for a field (label form)
 */
export function Label(_text: string): FieldDecorator {
	return () => undefined;
}
