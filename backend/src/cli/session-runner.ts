/**
 * Read, run and print steps shared by the one-shot and interactive CLI modes.
 *
 * Every query runs as a fresh session through the same loop, starting at the
 * dispatcher. The reader and writer are injected so the steps run without a
 * terminal.
 *
 * @module cli/session-runner
 */

import { userQuerySchema, type SessionResult } from '@campus-desk/shared';
import type { IConversationLoop } from '@/domains/agent/orchestration/types';
import { formatSessionResult } from './transcript-formatter';

/** Next line of input, or `null` at end of input. */
export type QueryReader = () => Promise<string | null>;

export type OutputWriter = (text: string) => void;

export const EXIT_COMMANDS: ReadonlySet<string> = new Set(['exit', 'quit']);

export const INTERACTIVE_FLAG = '--interactive';

export interface CliArgs {
  interactive: boolean;
  query: string;
}

/** Interactive when asked for, or when no query is given. */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const query = argv.filter(a => a !== INTERACTIVE_FLAG).join(' ').trim();
  return { interactive: argv.includes(INTERACTIVE_FLAG) || !query, query };
}

export const INTERACTIVE_BANNER = 'Campus Desk: ask a question, or type "exit" to quit.';

/**
 * Validate one query, run it and print the transcript.
 *
 * @returns the session result, or `null` when the query was rejected
 */
export async function runQuery(
  loop: IConversationLoop,
  rawQuery: string,
  write: OutputWriter
): Promise<SessionResult | null> {
  const input = userQuerySchema.safeParse({ query: rawQuery });
  if (!input.success) {
    write(`❌ ${input.error.issues.map(i => i.message).join('; ')}`);
    return null;
  }

  const result = await loop.run(input.data.query, { context: input.data.context });
  write(formatSessionResult(result));
  return result;
}

export interface InteractiveSessionOptions {
  loop: IConversationLoop;
  readQuery: QueryReader;
  write: OutputWriter;
}

export interface InteractiveSummary {
  /** Sessions run */
  sessions: number;
  /** Sessions that ended with `status: 'failure'` */
  failures: number;
}

/**
 * Prompt repeatedly until end of input or an exit command. Blank lines are
 * skipped.
 */
export async function runInteractiveSession(options: InteractiveSessionOptions): Promise<InteractiveSummary> {
  const { loop, readQuery, write } = options;
  const summary: InteractiveSummary = { sessions: 0, failures: 0 };

  write(INTERACTIVE_BANNER);

  for (;;) {
    const line = await readQuery();
    if (line === null) {
      break;
    }

    const query = line.trim();
    if (EXIT_COMMANDS.has(query.toLowerCase())) {
      break;
    }
    if (!query) {
      continue;
    }

    const result = await runQuery(loop, query, write);
    if (result) {
      summary.sessions += 1;
      if (result.status === 'failure') {
        summary.failures += 1;
      }
    }
  }

  return summary;
}
