import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  CallToolResult,
  ListToolsRequestSchema,
  Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { BlameSource } from './types.js';
import { shortCommit } from './blame-parser.js';
import { GitService } from './git-service.js';
import { Logger } from './logger.js';

const gitBlameArgsSchema = z.object({
  filePath: z.string().min(1),
  lineFrom: z.number().int().min(1).optional(),
  lineTo: z.number().int().min(1).optional(),
});

export const GIT_BLAME_TOOL: Tool = {
  name: 'git_blame',
  description: 'Get line-by-line git blame records (commit, author, committer, summary, content) for a file or a line range',
  inputSchema: {
    type: 'object',
    properties: {
      filePath: {
        type: 'string',
        description: 'Absolute path to a readable file (directories are not allowed)',
      },
      lineFrom: {
        type: 'number',
        description: 'Starting line number (1-based, optional)',
        minimum: 1,
      },
      lineTo: {
        type: 'number',
        description: 'Ending line number (1-based, optional)',
        minimum: 1,
      },
    },
    required: ['filePath'],
  },
};

export class BlameServer {
  private server: Server;
  private source: BlameSource;
  private logger: Logger;

  constructor(source?: BlameSource, logger?: Logger) {
    this.server = new Server(
      {
        name: 'blame-porcelain',
        version: '1.0.0',
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.logger = logger ?? Logger.getInstance();
    this.source = source ?? new GitService({ logger: this.logger });
    this.setupToolHandlers();
  }

  private setupToolHandlers() {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return { tools: [GIT_BLAME_TOOL] };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      return this.callTool(request.params.name, request.params.arguments ?? {});
    });
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<CallToolResult> {
    if (name === GIT_BLAME_TOOL.name) {
      return this.handleGitBlame(args);
    }
    throw new Error(`Unknown tool: ${name}`);
  }

  private async handleGitBlame(args: Record<string, unknown>): Promise<CallToolResult> {
    const startTime = Date.now();
    this.logger.logToolCall(GIT_BLAME_TOOL.name, args);

    try {
      const params = gitBlameArgsSchema.parse(args);
      const result = await this.source.getBlameInfo(params);

      this.logger.info('git_blame completed successfully', {
        filePath: result.filePath,
        requestedLines: result.requestedLines,
        duration: `${Date.now() - startTime}ms`
      });

      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify({
              ...result,
              blame: result.blame.map(record => ({ ...record, shortCommit: shortCommit(record) })),
            }, null, 2)
          }
        ]
      };
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.logToolError(GIT_BLAME_TOOL.name, cause, {
        ...args,
        duration: `${Date.now() - startTime}ms`
      });
      throw new Error(`Failed to get git blame information: ${cause.message}`);
    }
  }

  async run() {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    // Nothing on stdout: it carries the MCP protocol
    this.logger.info('blame-porcelain MCP server running on stdio');
  }
}
