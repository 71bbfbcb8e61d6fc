/**
 * Campus Desk CLI
 *
 * Validates configuration, connects to SQL Server, migrates and seeds the
 * schema and registers the agents. With a query on the command line it runs
 * one session, prints the transcript and exits 0 on success, 1 otherwise.
 * Without one (or with `--interactive`) it prompts for queries until end of
 * input or `exit`, running each as a fresh session.
 *
 * Usage:
 *   npm start -- "Which courses suit a data scientist?"
 *   npm start -- --interactive
 */

import { createInterface } from 'readline/promises';
import { env, requireDatabaseConnectionString } from '@/infrastructure/config/environment';
import { MssqlStorage, runMigrations } from '@/infrastructure/database';
import { registerAgents, FileInstructionSource } from '@/modules/agents/core';
import { ToolGateway } from '@/domains/agent/tools';
import { createConversationLoop } from '@/domains/agent/orchestration';
import { LangChainAgentExecutor } from '@/core/langchain/LangChainAgentExecutor';
import {
  parseCliArgs,
  runInteractiveSession,
  runQuery,
  type QueryReader,
} from '@/cli/session-runner';
import { createChildLogger } from '@/shared/utils/logger';
import { toErrorMessage } from '@/types/error.types';

const logger = createChildLogger({ service: 'CLI' });

/** Prompting line reader over stdin; resolves `null` at end of input. */
function createLineReader(): { readQuery: QueryReader; close: () => void } {
  const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: 'campus-desk> ' });
  const lines = rl[Symbol.asyncIterator]();

  return {
    readQuery: async () => {
      rl.prompt();
      const next = await lines.next();
      return next.done ? null : next.value;
    },
    close: () => rl.close(),
  };
}

async function main(): Promise<number> {
  const connectionString = requireDatabaseConnectionString();
  const storage = new MssqlStorage(connectionString);

  console.log('🔌 Connecting to the database...');
  await storage.connect();

  try {
    const { seeded } = await runMigrations(storage);
    console.log(seeded ? '✅ Schema created and sample data loaded' : '✅ Schema ready');

    const registry = registerAgents({
      instructionSource: new FileInstructionSource(env.INSTRUCTIONS_DIR ?? process.cwd()),
    });
    const loop = createConversationLoop({
      registry,
      executor: new LangChainAgentExecutor(),
      gateway: new ToolGateway(registry, storage),
      maxTurns: env.MAX_TURNS,
    });

    const args = parseCliArgs(process.argv.slice(2));
    if (!args.interactive) {
      const result = await runQuery(loop, args.query, text => console.log(text));
      return result?.status === 'success' ? 0 : 1;
    }

    const reader = createLineReader();
    try {
      const { sessions, failures } = await runInteractiveSession({
        loop,
        readQuery: reader.readQuery,
        write: text => console.log(text),
      });
      logger.info({ sessions, failures }, 'Interactive mode ended');
      return 0;
    } finally {
      reader.close();
    }
  } finally {
    await storage.close();
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error({ err: error }, 'Campus Desk failed to start');
    console.error(`❌ ${toErrorMessage(error)}`);
    process.exitCode = 1;
  });
