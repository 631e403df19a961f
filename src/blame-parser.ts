import { BlameRecord } from './types.js';
import { BlameParseError } from './errors.js';
import { splitOnce, unsignedOrZero } from './coerce.js';

// Prefix of the line carrying the source text; it also ends a blob.
export const CONTENT_MARKER = '\t';

type BlameDraft = { -readonly [K in keyof BlameRecord]: BlameRecord[K] };

export type FieldSetter = (draft: BlameDraft, value: string) => void;

export const FIELD_SETTERS: ReadonlyMap<string, FieldSetter> = new Map<string, FieldSetter>([
  ['filename', (d, v) => { d.filename = v; }],
  ['summary', (d, v) => { d.summary = v; }],
  ['author', (d, v) => { d.author = v; }],
  ['author-mail', (d, v) => { d.authorMail = v; }],
  ['author-time', (d, v) => { d.authorTime = unsignedOrZero(v); }],
  ['author-tz', (d, v) => { d.authorTz = v; }],
  ['committer', (d, v) => { d.committer = v; }],
  ['committer-mail', (d, v) => { d.committerMail = v; }],
  ['committer-time', (d, v) => { d.committerTime = unsignedOrZero(v); }],
  ['committer-tz', (d, v) => { d.committerTz = v; }],
  ['previous', (d, v) => {
    // Format: previous <hash> <filename>; both parts or nothing
    const parts = splitOnce(v, ' ');
    if (parts) {
      d.previous = { commit: parts[0], filepath: parts[1] };
    }
  }],
]);

const BOUNDARY_KEYWORD = 'boundary';

function emptyDraft(commit: string): BlameDraft {
  return {
    commit,
    originalLineNo: 0,
    finalLineNo: 0,
    filename: '',
    summary: '',
    content: '',
    boundary: false,
    author: '',
    authorMail: '',
    authorTime: 0,
    authorTz: '',
    committer: '',
    committerMail: '',
    committerTime: 0,
    committerTz: '',
  };
}

function applyMetadata(draft: BlameDraft, raw: string): void {
  const pair = splitOnce(raw, ' ');
  if (!pair) {
    if (raw === BOUNDARY_KEYWORD) {
      draft.boundary = true;
    }
    return;
  }

  // "summary: text" is accepted as "summary text"
  const key = pair[0].endsWith(':') ? pair[0].slice(0, -1) : pair[0];
  FIELD_SETTERS.get(key)?.(draft, pair[1]);
}

/**
 * Builds one record from a blob: the header line, any metadata lines and the
 * content line that closes it. Unknown keys and malformed values are
 * tolerated; only a missing header fails.
 *
 * @param startLine input line where the blob starts, used in the error
 */
export function parseRecord(blob: readonly string[], startLine = 1): BlameRecord {
  const header = blob[0];
  const tokens =
    header === undefined || header.startsWith(CONTENT_MARKER)
      ? []
      : header.split(/\s+/).filter((token) => token.length > 0);
  const commit = tokens[0];
  if (commit === undefined) {
    throw new BlameParseError('no header', startLine);
  }

  const draft = emptyDraft(commit);
  draft.originalLineNo = unsignedOrZero(tokens[1]);
  draft.finalLineNo = unsignedOrZero(tokens[2]);

  for (const raw of blob.slice(1)) {
    if (raw.startsWith(CONTENT_MARKER)) {
      draft.content = raw.substring(CONTENT_MARKER.length);
    } else {
      applyMetadata(draft, raw);
    }
  }

  return Object.freeze(draft);
}

export interface ParseOptions {
  /** Called with the trailing lines that never reached a content line. */
  onDiscarded?: (lines: readonly string[]) => void;
}

function splitLines(text: string): string[] {
  if (text.length === 0) {
    return [];
  }
  const lines = text.split('\n');
  if (text.endsWith('\n')) {
    lines.pop();
  }
  return lines.map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

/**
 * Splits `git blame --line-porcelain` output into blobs and parses each one.
 * Records come back in input order; the first malformed blob aborts the
 * whole parse.
 */
export function parseBlameOutput(blameOutput: string, options: ParseOptions = {}): BlameRecord[] {
  const records: BlameRecord[] = [];
  let blob: string[] = [];
  let blobStart = 1;

  splitLines(blameOutput).forEach((raw, index) => {
    if (blob.length === 0) {
      blobStart = index + 1;
    }
    blob.push(raw);
    if (raw.startsWith(CONTENT_MARKER)) {
      records.push(parseRecord(blob, blobStart));
      blob = [];
    }
  });

  if (blob.length > 0) {
    options.onDiscarded?.(blob);
  }
  return records;
}

export function shortCommit(record: Pick<BlameRecord, 'commit'>): string {
  return record.commit.substring(0, 7);
}

export class BlameParser {
  constructor(private readonly options: ParseOptions = {}) {}

  parseBlameOutput(blameOutput: string): BlameRecord[] {
    return parseBlameOutput(blameOutput, this.options);
  }
}
