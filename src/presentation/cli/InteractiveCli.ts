import * as readline from 'readline';
import { QueryRouterService } from '../../application/services/QueryRouterService.js';
import { DOMAIN_LABELS } from '../../core/entities/Domain.js';
import { QueryResult } from '../../core/entities/Query.js';
import { UpstreamError, toUserMessage } from '../../core/errors.js';
import { Logger, silentLogger } from '../../utils/logger.js';

const EXIT_COMMANDS = new Set(['exit', 'quit']);

export interface CliStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

export function renderResult(result: QueryResult): string {
  const body = result.response.length > 0 ? result.response : '(The model returned an empty answer.)';
  return `[${DOMAIN_LABELS[result.domain]}]\n${body}\n`;
}

/**
 * Answer a single query and report the process exit code
 */
export async function runOnce(
  router: QueryRouterService,
  query: string,
  output: NodeJS.WritableStream = process.stdout
): Promise<number> {
  try {
    const result = await router.handle(query);
    output.write(renderResult(result));
    return 0;
  } catch (error) {
    output.write(`${toUserMessage(error)}\n`);
    return 1;
  }
}

/**
 * Read-answer loop over stdin/stdout.
 * Ctrl+C cancels the request in flight, or ends the session when idle.
 */
export class InteractiveCli {
  private inFlight: AbortController | null = null;
  private rl: readline.Interface | null = null;

  constructor(
    private router: QueryRouterService,
    private streams: CliStreams = { input: process.stdin, output: process.stdout },
    private logger: Logger = silentLogger
  ) {}

  async run(): Promise<void> {
    const { input, output } = this.streams;
    const rl = readline.createInterface({
      input,
      output,
      terminal: 'isTTY' in input && input.isTTY === true,
    });

    this.rl = rl;
    rl.on('SIGINT', () => this.interrupt());

    output.write('Ask about government schemes, health, education or the environment. Type "exit" to quit.\n');
    rl.setPrompt('> ');
    rl.prompt();

    try {
      for await (const line of rl) {
        const query = line.trim();
        if (EXIT_COMMANDS.has(query.toLowerCase())) {
          break;
        }
        if (query.length > 0) {
          output.write(await this.answer(query));
        }
        rl.prompt();
      }
    } finally {
      rl.close();
      this.rl = null;
    }
  }

  /**
   * Ctrl+C: cancel the request in flight, or end the session when idle
   */
  interrupt(): void {
    if (this.inFlight) {
      this.inFlight.abort();
      return;
    }
    this.rl?.close();
  }

  private async answer(query: string): Promise<string> {
    const controller = new AbortController();
    this.inFlight = controller;
    try {
      return renderResult(await this.router.handle(query, { signal: controller.signal }));
    } catch (error) {
      if (error instanceof UpstreamError && error.reason === 'aborted') {
        this.logger.debug('Request cancelled by user');
        return '(cancelled)\n';
      }
      return `${toUserMessage(error)}\n`;
    } finally {
      this.inFlight = null;
    }
  }
}
