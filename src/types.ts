export interface PreviousRevision {
  commit: string;
  filepath: string;
}

/**
 * One source line as attributed by `git blame --line-porcelain`.
 *
 * `authorTime` and `committerTime` are unix epoch seconds. `previous` is only
 * present when the commit has a predecessor touching this line.
 */
export interface BlameRecord {
  readonly commit: string;
  readonly originalLineNo: number;
  readonly finalLineNo: number;
  readonly filename: string;
  readonly summary: string;
  readonly content: string;
  readonly previous?: Readonly<PreviousRevision>;
  readonly boundary: boolean;
  readonly author: string;
  readonly authorMail: string;
  readonly authorTime: number;
  readonly authorTz: string;
  readonly committer: string;
  readonly committerMail: string;
  readonly committerTime: number;
  readonly committerTz: string;
}

export interface GitBlameParams {
  filePath: string;
  lineFrom?: number;
  lineTo?: number;
}

export interface GitBlameReport {
  filePath: string;
  totalLines: number;
  requestedLines: number;
  lineRange: { from: number; to: number };
  blame: BlameRecord[];
}

export interface BlameSource {
  getBlameInfo(params: GitBlameParams): Promise<GitBlameReport>;
}
