/**
 * Blueprint Constants
 *
 * Descriptive metadata attached to every session result.
 *
 * @module @campus-desk/shared/constants/blueprint
 */

import type { BlueprintMetadata } from '../types/session.types';

export const UNIVERSITY_BLUEPRINT_METADATA: BlueprintMetadata = {
  title: 'University Support System',
  description: 'Multi-agent university support: triage, course advice, campus culture and scheduling.',
  requiredStorage: ['mssql'],
  envVars: ['DATABASE_CONNECTION_STRING'],
};

export const DEFAULT_MAX_TURNS = 20;
