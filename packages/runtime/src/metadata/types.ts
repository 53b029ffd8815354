import type { OutputSink } from '@fieldmeta/protocol';

export interface OperationsOptions {
	/** Where listFields() writes when called without a sink (defaults to stdout) */
	sink?: OutputSink;
}
