/**
 * Reads described declarations out of TypeScript sources with ts-morph.
 *
 * Classes are marked with `@Described()` or a `@described` JSDoc tag; interfaces,
 * type aliases and enums with the JSDoc tag. Field annotations are the `@Meta` /
 * `@Label` property decorators or the `@meta` / `@label` JSDoc tags.
 */

import {
	Node,
	type ClassDeclaration,
	type Decorator,
	type EnumDeclaration,
	type InterfaceDeclaration,
	type JSDocableNode,
	type PropertySignature,
	type SourceFile,
	type TypeAliasDeclaration,
} from 'ts-morph';
import type {
	AnnotationArgument,
	AnnotationForm,
	AnnotationProperty,
	AnnotationToken,
	CompileError,
	DeclarationShape,
	FieldDeclaration,
	SourceLocation,
	TypeDeclaration,
} from '@fieldmeta/protocol';
import { log } from '@fieldmeta/runtime';
import { DuplicateDeclarationError, UnsupportedDeclarationError } from './errors.js';

export const MARKER_DECORATOR = 'Described';
export const MARKER_TAG = 'described';

const DECORATOR_FORMS = new Map<string, AnnotationForm>([
	['Meta', 'meta'],
	['Label', 'label'],
]);

const TAG_FORMS = new Map<string, AnnotationForm>([
	['meta', 'meta'],
	['label', 'label'],
]);

export interface ReadResult {
	declarations: TypeDeclaration[];
	errors: CompileError[];
}

export function locate(node: Node): SourceLocation {
	return { file: node.getSourceFile().getFilePath(), line: node.getStartLineNumber() };
}

/**
 * Name of a property, enum member or object literal key; undefined for computed names
 */
function memberName(nameNode: Node): string | undefined {
	if (Node.isIdentifier(nameNode) || Node.isPrivateIdentifier(nameNode)) {
		return nameNode.getText();
	}
	if (Node.isStringLiteral(nameNode) || Node.isNoSubstitutionTemplateLiteral(nameNode)) {
		return nameNode.getLiteralValue();
	}
	if (Node.isNumericLiteral(nameNode)) {
		return String(nameNode.getLiteralValue());
	}
	return undefined;
}

function fieldName(nameNode: Node): string {
	return memberName(nameNode) ?? nameNode.getText();
}

function hasTag(node: JSDocableNode, tagName: string): boolean {
	return node.getJsDocs().some((doc) => doc.getTags().some((tag) => tag.getTagName() === tagName));
}

export function readArgument(node: Node): AnnotationArgument {
	if (Node.isStringLiteral(node) || Node.isNoSubstitutionTemplateLiteral(node)) {
		return { kind: 'string', value: node.getLiteralValue() };
	}

	if (Node.isObjectLiteralExpression(node)) {
		const properties: AnnotationProperty[] = [];
		for (const property of node.getProperties()) {
			if (!Node.isPropertyAssignment(property)) {
				return { kind: 'unsupported', text: node.getText() };
			}
			const key = memberName(property.getNameNode());
			const initializer = property.getInitializer();
			if (key === undefined || !initializer) {
				return { kind: 'unsupported', text: node.getText() };
			}
			properties.push({ key, value: readArgument(initializer) });
		}
		return { kind: 'object', properties };
	}

	return { kind: 'unsupported', text: node.getText() };
}

function decoratorTokens(decorators: Decorator[]): AnnotationToken[] {
	const tokens: AnnotationToken[] = [];
	for (const decorator of decorators) {
		const name = decorator.getName();
		const form = DECORATOR_FORMS.get(name);
		if (form) {
			tokens.push({
				form,
				name,
				arguments: decorator.getArguments().map(readArgument),
				location: locate(decorator),
			});
		}
	}
	return tokens;
}

function tagTokens(node: JSDocableNode): AnnotationToken[] {
	const tokens: AnnotationToken[] = [];
	for (const doc of node.getJsDocs()) {
		for (const tag of doc.getTags()) {
			const name = tag.getTagName();
			const form = TAG_FORMS.get(name);
			if (!form) {
				continue;
			}
			const text = tag.getCommentText();
			tokens.push({
				form,
				name,
				arguments: text && text.trim().length > 0 ? [{ kind: 'text', text }] : [],
				location: locate(tag),
			});
		}
	}
	return tokens;
}

function shapeOf(fields: FieldDeclaration[]): DeclarationShape {
	return fields.length > 0 ? 'NamedFields' : 'NoFields';
}

function readSignature(signature: PropertySignature): FieldDeclaration {
	return {
		name: fieldName(signature.getNameNode()),
		annotations: tagTokens(signature),
		location: locate(signature),
	};
}

function readClass(node: ClassDeclaration): TypeDeclaration | undefined {
	if (!node.getDecorator(MARKER_DECORATOR) && !hasTag(node, MARKER_TAG)) {
		return undefined;
	}

	const name = node.getName();
	if (!name) {
		log.warn('Skipping anonymous described class', { location: locate(node) });
		return undefined;
	}

	const properties = node
		.getProperties()
		.filter((property) => !property.isStatic())
		.map((property) => ({
			position: property.getStart(),
			field: {
				name: fieldName(property.getNameNode()),
				annotations: [...decoratorTokens(property.getDecorators()), ...tagTokens(property)],
				location: locate(property),
			},
		}));
	const parameterProperties = (node.getConstructors()[0]?.getParameters() ?? [])
		.filter((parameter) => parameter.isParameterProperty())
		.map((parameter) => ({
			position: parameter.getStart(),
			field: {
				name: fieldName(parameter.getNameNode()),
				annotations: decoratorTokens(parameter.getDecorators()),
				location: locate(parameter),
			},
		}));

	// constructor parameter properties count as fields, in source order
	const fields = [...properties, ...parameterProperties]
		.sort((a, b) => a.position - b.position)
		.map((member) => member.field);

	return {
		name,
		shape: shapeOf(fields),
		fields,
		annotations: [...decoratorTokens(node.getDecorators()), ...tagTokens(node)],
		location: locate(node),
	};
}

function readInterface(node: InterfaceDeclaration): TypeDeclaration | undefined {
	if (!hasTag(node, MARKER_TAG)) {
		return undefined;
	}

	const fields = node.getProperties().map(readSignature);
	return {
		name: node.getName(),
		shape: shapeOf(fields),
		fields,
		annotations: tagTokens(node),
		location: locate(node),
	};
}

function readTypeAlias(node: TypeAliasDeclaration): TypeDeclaration | undefined {
	if (!hasTag(node, MARKER_TAG)) {
		return undefined;
	}

	const name = node.getName();
	const typeNode = node.getTypeNode();
	const location = locate(node);

	if (typeNode && Node.isTypeLiteral(typeNode)) {
		const fields = typeNode.getProperties().map(readSignature);
		return { name, shape: shapeOf(fields), fields, annotations: tagTokens(node), location };
	}

	if (typeNode && Node.isTupleTypeNode(typeNode)) {
		const fields = typeNode.getElements().map((element, index) => ({
			name: String(index),
			annotations: [],
			location: locate(element),
		}));
		return { name, shape: 'PositionalFields', fields, annotations: tagTokens(node), location };
	}

	throw new UnsupportedDeclarationError(name, typeNode ? typeNode.getKindName() : 'type alias', location);
}

function readEnum(node: EnumDeclaration): TypeDeclaration | undefined {
	if (!hasTag(node, MARKER_TAG)) {
		return undefined;
	}

	const fields = node.getMembers().map((member) => ({
		name: fieldName(member.getNameNode()),
		annotations: tagTokens(member),
		location: locate(member),
	}));
	return {
		name: node.getName(),
		shape: shapeOf(fields),
		fields,
		annotations: tagTokens(node),
		location: locate(node),
	};
}

function readStatement(statement: Node): TypeDeclaration | undefined {
	if (Node.isClassDeclaration(statement)) {
		return readClass(statement);
	}
	if (Node.isInterfaceDeclaration(statement)) {
		return readInterface(statement);
	}
	if (Node.isTypeAliasDeclaration(statement)) {
		return readTypeAlias(statement);
	}
	if (Node.isEnumDeclaration(statement)) {
		return readEnum(statement);
	}
	return undefined;
}

/**
 * Reads the described declarations of a source file in source order.
 * Declarations the front end cannot map, and repeats of a name already read,
 * are returned as errors.
 */
export function readDeclarations(sourceFile: SourceFile): ReadResult {
	const result: ReadResult = { declarations: [], errors: [] };
	const seen = new Set<string>();

	for (const statement of sourceFile.getStatements()) {
		try {
			const declaration = readStatement(statement);
			if (!declaration) {
				continue;
			}
			if (seen.has(declaration.name)) {
				result.errors.push(new DuplicateDeclarationError(declaration.name, declaration.location));
				continue;
			}
			seen.add(declaration.name);
			result.declarations.push(declaration);
		} catch (error) {
			if (error instanceof UnsupportedDeclarationError) {
				result.errors.push(error);
				continue;
			}
			throw error;
		}
	}

	return result;
}
