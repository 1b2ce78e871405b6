export {Indexer, type BuildOptions, type BuildResult, type IndexerOptions} from './indexer.js';
export {IndexBuilder, isExportedName, type FileMetadata} from './builder.js';
export {buildKeywordIndex} from './keyword-index.js';
export {typeToString, describeFields, describeResults, UNKNOWN_TYPE} from './descriptors.js';
export type {
	CodeIndex,
	CommentRecord,
	CommentType,
	FileRecord,
	FunctionRecord,
	IndexStats,
	InterfaceRecord,
	ProgressCallback,
	Reference,
	ReferenceType,
	TypeKind,
	TypeRecord,
} from './types.js';
export {countIndex} from './types.js';
