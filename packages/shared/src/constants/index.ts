/**
 * Constants Index
 *
 * Barrel export for all shared constants.
 *
 * @module @campus-desk/shared/constants
 */

export {
  AGENT_ID,
  ALL_AGENT_IDS,
  isAgentId,
  AGENT_DISPLAY_NAME,
  AGENT_INSTRUCTION_FILE_STEM,
  AGENT_ICON,
  AGENT_DESCRIPTION,
  HANDOFF_TOOL,
  EXTERNAL_TOOL,
  CONTEXT_KEY,
  CLOSING_SENTINEL,
  CANONICAL_CLOSING_MESSAGE,
  POET_HAIKU_CLOSING,
} from './agent-registry.constants';

export type {
  AgentId,
  HandoffToolName,
  ExternalToolName,
} from './agent-registry.constants';

export { UNIVERSITY_BLUEPRINT_METADATA, DEFAULT_MAX_TURNS } from './blueprint.constants';
