export type { BlameRecord, PreviousRevision, GitBlameParams, GitBlameReport, BlameSource } from './types.js';
export {
  BlameParser,
  CONTENT_MARKER,
  FIELD_SETTERS,
  parseBlameOutput,
  parseRecord,
  shortCommit,
} from './blame-parser.js';
export type { FieldSetter, ParseOptions } from './blame-parser.js';
export { BlameParseError } from './errors.js';
export type { BlameParseReason } from './errors.js';
export { parseOrDefault, parseUnsigned, unsignedOrZero, splitOnce } from './coerce.js';
export { formatBlame, formatReport } from './format.js';
export { GitService } from './git-service.js';
export type { BlameGit, GitFactory, GitServiceOptions } from './git-service.js';
export { Logger } from './logger.js';
export { loadConfig } from './config.js';
export type { AppConfig, LogLevel } from './config.js';
