/**
 * semindex core
 *
 * Structural indexing and keyword search over Go source trees.
 */

// Constants
export {
	SEMINDEX_DIR,
	DEFAULT_INDEX_PATH,
	RESULT_TYPES,
	getSemindexDir,
	getConfigPath,
	getLogsDir,
	resolveIndexPath,
} from './constants.js';

// Logger
export {
	createLogger,
	createMemoryLogger,
	createNullLogger,
	getLogPath,
	type Logger,
	type LogLevel,
	type LogEntry,
	type MemoryLogger,
} from './logger/index.js';

// Config
export {
	loadConfig,
	saveConfig,
	resolveConfig,
	DEFAULT_CONFIG,
	type SemindexConfig,
} from './config/index.js';

// Errors
export {
	IndexNotBuiltError,
	WalkError,
	ParseError,
	IndexPersistenceError,
	ConfigError,
} from './errors.js';
export {isAbortError} from './abort.js';

// Tokenizer, purposes, keywords
export {tokenize, tokenizeSlice, dedupe} from './tokenizer/index.js';
export {
	inferFunctionPurpose,
	inferTypePurpose,
	inferFilePurpose,
	classifyComment,
} from './purpose/index.js';
export {
	extractFunctionKeywords,
	extractTypeKeywords,
	extractFileKeywords,
	extractCommentKeywords,
} from './keywords/index.js';

// Parsing
export {GoDeclarationParser} from './parser/go.js';
export type {
	DeclarationParser,
	ParsedFile,
	FunctionDeclaration,
	TypeDeclaration,
	TypeShape,
	TypeExpr,
	FieldDeclaration,
	CommentGroup,
} from './parser/types.js';

// Indexing
export * from './indexer/index.js';
export {walkSourceFiles, type WalkOptions} from './walker/index.js';

// Search
export {
	searchIndex,
	termMatchScore,
	truncateText,
	type ResultType,
	type SearchQuery,
	type SearchResponse,
	type SearchResult,
} from './search/index.js';

// Persistence
export {saveIndex, loadIndex} from './store/index.js';

// Engine
export {CodeSearchEngine, type EngineOptions} from './engine.js';
