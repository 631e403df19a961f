import { BlameRecord } from './types.js';
import { shortCommit } from './blame-parser.js';

export function formatBlame(record: BlameRecord): string {
  const lineNo = String(record.originalLineNo).padStart(4, '0');
  return [
    `* ${shortCommit(record)}: ${lineNo} by ${record.author} ${record.authorMail}`,
    `summary: ${record.summary}`,
    `content: \`${record.content}\``,
    '',
  ].join('\n');
}

export function formatReport(records: readonly BlameRecord[]): string {
  return records.map(record => formatBlame(record) + '\n').join('');
}
