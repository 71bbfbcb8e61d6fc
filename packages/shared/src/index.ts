/**
 * @campus-desk/shared
 *
 * Shared TypeScript definitions for Campus Desk.
 * Single source of truth for agent ids, tool names, transcript types and
 * validation schemas used by the backend and the CLI.
 *
 * @module @campus-desk/shared
 *
 * @example
 * ```typescript
 * import { AGENT_ID, HANDOFF_TOOL } from '@campus-desk/shared';
 * import type { Message, SessionResult } from '@campus-desk/shared';
 * ```
 */

export * from './constants';
export * from './types';
export * from './schemas';
