import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  analyzeProfile,
  analyzeProfileSchema,
  scoreRecords,
  scoreRecordsSchema,
  type AnalyzeProfileInput,
  type ScoreRecordsInput,
  type ToolContext,
} from './tools/index.js';
import { logger } from './logger.js';

interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

/** Input as logged: credentials never reach the log */
function redact(args: Record<string, unknown>): Record<string, unknown> {
  return 'token' in args && args.token ? { ...args, token: '[redacted]' } : args;
}

export function createServer(context: ToolContext = {}, version = '0.0.0'): McpServer {
  logger.info('Creating devscore MCP server');

  const server = new McpServer({
    name: 'devscore',
    version,
  });

  // Register tools with logging wrapper
  const wrapTool = <T extends Record<string, unknown>, R>(name: string, fn: (args: T) => R | Promise<R>) => {
    return async (args: T): Promise<ToolResult> => {
      logger.tool(name, redact(args));

      try {
        const result = await fn(args);
        logger.debug(`Tool ${name} completed`);
        return {
          content: [{ type: 'text' as const, text: JSON.stringify(result, null, 2) }],
        };
      } catch (error) {
        logger.error(`Tool ${name} failed`, error);
        const message = error instanceof Error ? error.message : String(error);
        return {
          content: [{ type: 'text' as const, text: JSON.stringify({ error: message }) }],
          isError: true,
        };
      }
    };
  };

  server.tool(
    'devscore_analyze_profile',
    'Fetch a GitHub user\'s profile, repositories and recent events and score profile health (0-10) with strengths, weaknesses and recommendations',
    analyzeProfileSchema.shape,
    wrapTool('devscore_analyze_profile', (args: AnalyzeProfileInput) => analyzeProfile(args, context))
  );

  server.tool(
    'devscore_score_records',
    'Score profile health from profile, repository and event records already fetched from the GitHub API',
    scoreRecordsSchema.shape,
    wrapTool('devscore_score_records', (args: ScoreRecordsInput) => scoreRecords(args))
  );

  return server;
}
