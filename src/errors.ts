export type BlameParseReason = 'no header';

export class BlameParseError extends Error {
  readonly reason: BlameParseReason;
  // 1-based line of the raw output where the failing blob starts
  readonly lineNumber: number;

  constructor(reason: BlameParseReason, lineNumber: number) {
    super(`Error parsing git blame output: ${reason} at input line ${lineNumber}`);
    this.name = 'BlameParseError';
    this.reason = reason;
    this.lineNumber = lineNumber;
  }
}
