export { validateShape } from './shape-validator.js';
export { checkTypePlacement, extractLabel, extractMeta, extractMetadata } from './annotation-extractor.js';
export { buildMetadataTable } from './table-builder.js';
export { parsePairs, parseLabelText, AnnotationSyntaxError } from './pair-parser.js';
