import { cac } from 'cac';
import { BlameSource, GitBlameParams } from './types.js';
import { parseUnsigned } from './coerce.js';
import { formatReport } from './format.js';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

interface CliFlags {
  from?: string | number;
  to?: string | number;
  json?: boolean;
}

function lineOption(name: string, value: string | number | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const line = parseUnsigned(String(value));
  if (line === undefined || line < 1) {
    throw new Error(`Invalid --${name} line number: ${value}`);
  }
  return line;
}

/**
 * Runs the `blame-porcelain` command against `args` (without the node and
 * script entries) and resolves to the exit code.
 */
export async function runCli(args: string[], source: BlameSource, io: CliIO): Promise<number> {
  const cli = cac('blame-porcelain');

  cli
    .command('<file>', 'Show git blame for every line of a file')
    .option('--from <line>', 'First line to show (1-based)')
    .option('--to <line>', 'Last line to show (1-based)')
    .option('--json', 'Print the report as JSON')
    .action(async (file: string, flags: CliFlags) => {
      const params: GitBlameParams = {
        filePath: file,
        lineFrom: lineOption('from', flags.from),
        lineTo: lineOption('to', flags.to),
      };
      const report = await source.getBlameInfo(params);
      io.stdout(flags.json ? JSON.stringify(report, null, 2) + '\n' : formatReport(report.blame));
    });

  cli.help();
  cli.version('1.0.0');

  try {
    cli.parse(['node', 'blame-porcelain', ...args], { run: false });
    await cli.runMatchedCommand();
    return 0;
  } catch (error) {
    io.stderr(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }
}
