/**
 * Instruction Source
 *
 * Two-tier instruction resolution, run once when a descriptor is built:
 * an optional override file (`instructions_<Stem>.txt`), then the built-in
 * default. Falling back is a normal return value, never an exception.
 *
 * @module modules/agents/core/instructions/instruction-source
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { AGENT_INSTRUCTION_FILE_STEM, type AgentId } from '@campus-desk/shared';
import { createChildLogger, type Logger } from '@/shared/utils/logger';

export type InstructionOrigin = 'file' | 'default';

export interface ResolvedInstructions {
  text: string;
  origin: InstructionOrigin;
  /** Override file path, when one was read */
  path?: string;
}

/**
 * First tier: returns override text, or undefined when there is none.
 */
export interface InstructionSource {
  load(agentId: AgentId): { text: string; path: string } | undefined;
}

export function instructionFileName(agentId: AgentId): string {
  return `instructions_${AGENT_INSTRUCTION_FILE_STEM[agentId]}.txt`;
}

/**
 * Reads override files from a directory. Missing, unreadable or blank files
 * yield undefined.
 */
export class FileInstructionSource implements InstructionSource {
  private readonly logger: Logger;

  constructor(private readonly directory: string, logger?: Logger) {
    this.logger = logger ?? createChildLogger({ service: 'InstructionSource' });
  }

  load(agentId: AgentId): { text: string; path: string } | undefined {
    const path = join(this.directory, instructionFileName(agentId));
    if (!existsSync(path)) {
      return undefined;
    }

    try {
      const text = readFileSync(path, 'utf-8').trim();
      return text ? { text, path } : undefined;
    } catch (error) {
      this.logger.warn({ err: error, agentId, path }, 'Instruction file unreadable');
      return undefined;
    }
  }
}

/**
 * Resolve instructions for one agent.
 */
export function resolveInstructions(
  agentId: AgentId,
  defaultText: string,
  source?: InstructionSource
): ResolvedInstructions {
  const loaded = source?.load(agentId);
  if (loaded) {
    return { text: loaded.text, origin: 'file', path: loaded.path };
  }
  return { text: defaultText, origin: 'default' };
}
