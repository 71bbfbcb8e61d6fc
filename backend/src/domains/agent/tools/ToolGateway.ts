/**
 * @module domains/agent/tools/ToolGateway
 *
 * Pass-through from agent-issued data tools to the storage collaborator.
 * Checks scope and arguments, forwards the query, returns raw rows. No
 * caching, retries or row shaping happen here.
 *
 * @example
 * ```typescript
 * const gateway = new ToolGateway(registry, storage);
 * const rows = await gateway.execute('read_query', { query: 'SELECT * FROM courses' }, 'course-advisor');
 * ```
 */

import {
  EXTERNAL_TOOL,
  readQueryArgsSchema,
  type AgentId,
  type ExternalToolName,
} from '@campus-desk/shared';
import type { AgentRegistry } from '@/modules/agents/core/registry/AgentRegistry';
import { createChildLogger, type Logger } from '@/shared/utils/logger';
import { validateReadOnlyQuery } from '@/shared/utils/sql/validators';
import {
  InvalidToolArgumentsError,
  ScopeViolationError,
  StorageUnavailableError,
  toErrorMessage,
} from '@/types/error.types';
import type { ToolSpec } from '@/modules/agents/handoffs/handoff-handler';
import type { IStorageCollaborator, IToolGateway, StorageRow } from './types';

const EXTERNAL_TOOL_NAMES: readonly string[] = Object.values(EXTERNAL_TOOL);

const EXTERNAL_TOOL_SPECS: Record<ExternalToolName, ToolSpec> = {
  [EXTERNAL_TOOL.READ_QUERY]: {
    name: EXTERNAL_TOOL.READ_QUERY,
    description:
      'Run a read-only SQL query (SELECT or WITH) against the university database and return the matching rows.',
    schema: readQueryArgsSchema,
  },
};

export class ToolGateway implements IToolGateway {
  private readonly logger: Logger;

  constructor(
    private readonly registry: AgentRegistry,
    private readonly storage: IStorageCollaborator,
    logger?: Logger
  ) {
    this.logger = logger ?? createChildLogger({ service: 'ToolGateway' });
  }

  handles(toolName: string): boolean {
    return EXTERNAL_TOOL_NAMES.includes(toolName);
  }

  /**
   * Specs of the external tools the agent is scoped for.
   */
  getToolSpecs(agentId: AgentId): ToolSpec[] {
    return this.registry.resolve(agentId).externalToolScopes.map(scope => EXTERNAL_TOOL_SPECS[scope]);
  }

  /**
   * @throws ScopeViolationError if the caller has no scope for the tool
   * @throws InvalidToolArgumentsError for missing, blank or non-read-only queries
   * @throws StorageUnavailableError if the storage collaborator fails
   */
  async execute(toolName: string, args: Record<string, unknown>, callerAgentId: AgentId): Promise<StorageRow[]> {
    const caller = this.registry.resolve(callerAgentId);
    if (!caller.externalToolScopes.some(scope => scope === toolName)) {
      throw new ScopeViolationError(callerAgentId, toolName);
    }

    const parsed = readQueryArgsSchema.safeParse(args);
    if (!parsed.success) {
      throw new InvalidToolArgumentsError(toolName, parsed.error.issues.map(i => i.message).join('; '));
    }

    const check = validateReadOnlyQuery(parsed.data.query);
    if (!check.valid) {
      throw new InvalidToolArgumentsError(toolName, check.reason);
    }

    this.logger.debug({ toolName, callerAgentId, query: check.statement }, 'Forwarding query to storage');

    try {
      const rows = await this.storage.query(check.statement);
      this.logger.debug({ toolName, callerAgentId, rowCount: rows.length }, 'Query returned');
      return rows;
    } catch (error) {
      this.logger.warn({ err: error, toolName, callerAgentId }, 'Storage query failed');
      if (error instanceof StorageUnavailableError) {
        throw error;
      }
      throw new StorageUnavailableError(`Storage query failed: ${toErrorMessage(error)}`, { cause: error });
    }
  }
}
