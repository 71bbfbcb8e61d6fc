/**
 * Plain-text rendering of a session result for the terminal.
 *
 * @module cli/transcript-formatter
 */

import { AGENT_DISPLAY_NAME, type Message, type SessionResult } from '@campus-desk/shared';

const RULE = '━'.repeat(40);

function speaker(message: Message): string {
  switch (message.role) {
    case 'user':
      return 'User';
    case 'agent':
      return message.agentId ? AGENT_DISPLAY_NAME[message.agentId] : 'Agent';
    case 'tool':
      return `Tool ${message.toolName ?? 'result'}`;
  }
}

export function formatMessage(message: Message): string {
  const lines = [`[${speaker(message)}] ${message.content}`];
  for (const call of message.toolCalls ?? []) {
    lines.push(`  → ${call.name} ${JSON.stringify(call.args)}`);
  }
  return lines.join('\n');
}

export function formatSessionResult(result: SessionResult): string {
  const lines = [
    RULE,
    result.metadata.title,
    RULE,
    ...result.transcript.map(formatMessage),
    RULE,
    `Status: ${result.status} (${result.terminationReason}) after ${result.turns} turns`,
    `Final agent: ${AGENT_DISPLAY_NAME[result.finalAgentId]}`,
  ];
  if (result.error) {
    lines.push(`Error: ${result.error}`);
  }
  return lines.join('\n');
}
