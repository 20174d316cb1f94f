import { readFileSync } from 'fs';
import { z } from 'zod';
import { analyzeProfile, type ToolContext } from './tools/analyze.js';
import { getConfigPath, loadConfig, maskToken, resolveSettings, setToken } from './config.js';
import { metricLabel, formatPercent } from './feedback.js';
import { clamp01 } from './metrics.js';
import { METRIC_NAMES, type ResultBundle } from './types.js';

// ANSI colors
const reset = '\x1b[0m';
const bold = '\x1b[1m';
const dim = '\x1b[2m';
const red = '\x1b[31m';
const green = '\x1b[32m';
const yellow = '\x1b[33m';
const cyan = '\x1b[36m';

export type CLIResult = 'handled' | 'server' | 'failed';

export interface CLIOptions extends ToolContext {
  color?: boolean;
}

const packageInfoSchema = z.object({
  name: z.string(),
  version: z.string(),
});

export type PackageInfo = z.infer<typeof packageInfoSchema>;

export function loadPackageInfo(): PackageInfo {
  const raw: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  return packageInfoSchema.parse(raw);
}

function painter(enabled: boolean) {
  return (code: string, text: string): string => (enabled ? `${code}${text}${reset}` : text);
}

export function progressBar(value: number, width = 20, color = false): string {
  const filled = Math.round(clamp01(value) * width);
  const paint = painter(color);
  return `${paint(green, '█'.repeat(filled))}${paint(dim, '░'.repeat(width - filled))}`;
}

export function scoreColor(score: number): string {
  if (score >= 8) return green;
  if (score >= 5) return yellow;
  return red;
}

/** "code_quality" -> "Code Quality" */
function titleCase(text: string): string {
  return text.replace(/\b\w/g, c => c.toUpperCase());
}

export function formatReport(username: string, result: ResultBundle, color = false): string {
  const paint = painter(color);
  const list = (items: string[]): string[] => items.map(item => `    - ${item}`);

  const lines = [
    '',
    `  ${paint(bold, `Profile report for ${username}`)}`,
    '',
    `  Score: ${paint(bold + scoreColor(result.score), result.score.toFixed(2))}/10`,
    `  ${result.appreciation}`,
    '',
    `  ${paint(bold, 'Metrics')}`,
    ...METRIC_NAMES.map(name => {
      const value = result.metrics[name];
      const label = titleCase(metricLabel(name)).padEnd(15);
      return `    ${label}${progressBar(value, 20, color)} ${formatPercent(value).padStart(4)}`;
    }),
    '',
    `  ${paint(bold, 'Strengths')}`,
    ...list(result.strengths),
    '',
    `  ${paint(bold, 'Weaknesses')}`,
    ...list(result.weaknesses),
    '',
    `  ${paint(bold, 'Recommendations')}`,
    ...list(result.recommendations),
  ];

  if (result.avatar_url) {
    lines.push('', `  ${paint(dim, `Avatar: ${result.avatar_url}`)}`);
  }

  lines.push('');
  return lines.join('\n');
}

export interface AnalyzeArgs {
  username?: string;
  json: boolean;
  token?: string;
}

export function parseAnalyzeArgs(args: string[]): AnalyzeArgs {
  const parsed: AnalyzeArgs = { json: false };
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--json') {
      parsed.json = true;
    } else if (arg === '--token' || arg === '-t') {
      parsed.token = args[++i];
    } else if (arg.startsWith('--token=')) {
      parsed.token = arg.slice('--token='.length);
    } else if (!arg.startsWith('-') && parsed.username === undefined) {
      parsed.username = arg;
    }
  }
  return parsed;
}

export function showHelp(): void {
  console.log(`
${bold}${cyan}devscore${reset} - GitHub profile health score

${bold}Usage:${reset}
  devscore analyze <username>         Score a profile and print the report
  devscore analyze <username> --json  Print the result as JSON
  devscore analyze <username> --token <token>
                                      Use a GitHub token for this run
  devscore config show                Show resolved settings
  devscore config set-token <token>   Save a token to ~/.devscore/config.json
  devscore server                     Start MCP server on stdio
  devscore version                    Show version
  devscore help                       Show this help

${bold}Environment:${reset}
  GITHUB_TOKEN          Token used when --token is not given
  DEVSCORE_TIMEOUT_MS   Per-request timeout (default 10000)
  DEVSCORE_LOG_LEVEL    debug | info | warn | error
`);
}

async function runAnalyze(args: string[], options: CLIOptions): Promise<CLIResult> {
  const parsed = parseAnalyzeArgs(args);
  if (!parsed.username) {
    console.log('\n  Usage: devscore analyze <username> [--json] [--token <token>]\n');
    return 'failed';
  }

  try {
    const result = await analyzeProfile({ username: parsed.username, token: parsed.token }, options);
    if (parsed.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      console.log(formatReport(parsed.username, result, options.color ?? process.stdout.isTTY === true));
    }
    return 'handled';
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`\n  ${red}Error:${reset} ${message}\n`);
    return 'failed';
  }
}

function runConfig(args: string[], options: CLIOptions): CLIResult {
  const action: string | undefined = args[0];
  const value: string | undefined = args[1];

  switch (action) {
    case 'set-token': {
      if (!value) {
        console.log('\n  Usage: devscore config set-token <token>\n');
        return 'failed';
      }
      setToken(value, options.configDir);
      console.log(`\n  OK - token saved to ${getConfigPath(options.configDir)}\n`);
      return 'handled';
    }
    case 'show':
    case undefined: {
      const file = loadConfig(options.configDir);
      const settings = resolveSettings({}, { configDir: options.configDir, env: options.env });
      console.log('');
      console.log(`  ${bold}Config file:${reset} ${getConfigPath(options.configDir)}${file.token ? '' : ` ${dim}(no token saved)${reset}`}`);
      console.log(`  ${bold}Token:${reset}       ${settings.token ? maskToken(settings.token) : `${dim}none${reset}`}`);
      console.log(`  ${bold}Timeout:${reset}     ${settings.timeoutMs}ms`);
      console.log(`  ${bold}API:${reset}         ${settings.apiBaseUrl}`);
      console.log('');
      return 'handled';
    }
    default:
      console.log(`\n  Unknown config action: ${action}\n`);
      return 'failed';
  }
}

export async function runCLI(args: string[], options: CLIOptions = {}): Promise<CLIResult> {
  const command: string | undefined = args[0];
  const rest = args.slice(1);

  switch (command) {
    case 'analyze':
      return runAnalyze(rest, options);
    case 'server':
      return 'server';
    case 'config':
      return runConfig(rest, options);
    case 'version':
    case '--version':
    case '-v':
      console.log(loadPackageInfo().version);
      return 'handled';
    case 'help':
    case '--help':
    case '-h':
    case undefined:
      showHelp();
      return 'handled';
    default:
      // `devscore octocat` is shorthand for `devscore analyze octocat`
      if (!command.startsWith('-')) {
        return runAnalyze(args, options);
      }
      console.log(`\n  Unknown option: ${command}\n`);
      showHelp();
      return 'failed';
  }
}
