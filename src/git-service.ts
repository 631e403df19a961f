import { simpleGit } from 'simple-git';
import { existsSync, statSync } from 'fs';
import { resolve, dirname } from 'path';
import { BlameRecord, BlameSource, GitBlameParams, GitBlameReport } from './types.js';
import { BlameParser } from './blame-parser.js';
import { BlameParseError } from './errors.js';
import { Logger } from './logger.js';

/** The part of simple-git the blame service talks to. */
export interface BlameGit {
  checkIsRepo(): Promise<boolean>;
  raw(commands: string[]): Promise<string>;
}

export type GitFactory = (baseDir: string) => BlameGit;

export interface GitServiceOptions {
  gitFactory?: GitFactory;
  logger?: Logger;
}

const defaultGitFactory: GitFactory = (baseDir) => simpleGit({ baseDir });

export class GitService implements BlameSource {
  private parser: BlameParser;
  private logger: Logger;
  private gitFactory: GitFactory;

  constructor(options: GitServiceOptions = {}) {
    this.logger = options.logger ?? Logger.getInstance();
    this.gitFactory = options.gitFactory ?? defaultGitFactory;
    this.parser = new BlameParser({
      onDiscarded: (lines) => {
        this.logger.warn('Discarded trailing blame lines without content line', {
          lineCount: lines.length,
          firstLine: lines[0],
        });
      },
    });
  }

  async getBlameInfo(params: GitBlameParams): Promise<GitBlameReport> {
    const startTime = Date.now();
    const { filePath, lineFrom, lineTo } = params;

    if (!filePath) {
      throw new Error('File path is required');
    }

    const absolutePath = resolve(filePath);
    if (!existsSync(absolutePath)) {
      throw new Error(`File does not exist: ${absolutePath}`);
    }
    if (!statSync(absolutePath).isFile()) {
      throw new Error(`Not a file: ${absolutePath}`);
    }

    // Scope git to the file's directory rather than the process CWD, which
    // may not be inside the repository.
    const baseDir = dirname(absolutePath);
    const git = this.gitFactory(baseDir);

    const isRepo = await git.checkIsRepo();
    if (!isRepo) {
      throw new Error('Not in a git repository');
    }

    // Convert path separators for Git compatibility on Windows
    const gitPath = absolutePath.replace(/\\/g, '/');
    let blameResult: string;
    try {
      blameResult = await git.raw(['blame', '--line-porcelain', gitPath]);
    } catch (error) {
      throw new Error(`Failed to run git blame: ${error instanceof Error ? error.message : String(error)}`);
    }

    let blame: BlameRecord[];
    try {
      blame = this.parser.parseBlameOutput(blameResult);
    } catch (error) {
      if (error instanceof BlameParseError) {
        this.logger.error('Blame output rejected', { filePath: absolutePath, lineNumber: error.lineNumber });
      }
      throw error;
    }

    let filtered = blame;
    if (lineFrom !== undefined || lineTo !== undefined) {
      const startLine = lineFrom ?? 1;
      const endLine = lineTo ?? blame.length;
      filtered = blame.filter(record =>
        record.finalLineNo >= startLine && record.finalLineNo <= endLine
      );
    }

    this.logger.info('git blame parsed', {
      filePath: absolutePath,
      totalLines: blame.length,
      requestedLines: filtered.length,
      duration: `${Date.now() - startTime}ms`,
    });

    return {
      filePath: absolutePath,
      totalLines: blame.length,
      requestedLines: filtered.length,
      lineRange: {
        from: lineFrom ?? 1,
        to: lineTo ?? blame.length,
      },
      blame: filtered,
    };
  }
}
