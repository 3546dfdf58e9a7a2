export const VERSION = "0.1.0";

export { TransactionManager, type QueryResponse, type TransactionManagerOptions } from "./engine/transaction.js";
export { compileQuery, parseQueryText } from "./query/compiler.js";
export { compileFilter, matches } from "./query/filter.js";
export type { CompiledQuery, FilterExpr, Operation } from "./query/types.js";
export { Library } from "./library/library.js";
export { loadLibrary, saveLibrary } from "./library/store.js";
export { GitRepository, type VersionControl } from "./library/git.js";
export { libraryPaths, locateLibraryFile, LIBRARY_FILENAME, type LibraryPaths } from "./library/paths.js";
export { OPTION_DEFINITIONS, decodeOption, defaultOptions } from "./library/options.js";
export type { Album, FieldValue, Metadata, OptionValue, Scalar, Song } from "./library/types.js";
export { DefaultTagCodec, Id3TagCodec, TAG_FIELDS, type TagCodec, type TagField, type TagValues } from "./sync/tags.js";
export { NodeFileSystem, type FileSystem } from "./sync/files.js";
export { similarity } from "./import/similarity.js";
export { GitError, QueryError, type ErrorReason, type ResponseError } from "./errors.js";
