/**
 * Agent Registry Constants
 *
 * Centralized constants for agent identity, handoff tool names and the
 * fixed closing payloads. Single source of truth for backend and CLI.
 *
 * @module @campus-desk/shared/constants/agent-registry
 */

// ============================================
// AGENT IDs (single source of truth)
// ============================================
export const AGENT_ID = {
  TRIAGE: 'triage',
  COURSE_ADVISOR: 'course-advisor',
  UNIVERSITY_POET: 'university-poet',
  SCHEDULING_ASSISTANT: 'scheduling-assistant',
} as const;

export type AgentId = (typeof AGENT_ID)[keyof typeof AGENT_ID];

export const ALL_AGENT_IDS: readonly AgentId[] = Object.values(AGENT_ID);

export function isAgentId(value: string): value is AgentId {
  return ALL_AGENT_IDS.some(id => id === value);
}

// ============================================
// AGENT DISPLAY NAMES
// ============================================
export const AGENT_DISPLAY_NAME: Record<AgentId, string> = {
  [AGENT_ID.TRIAGE]: 'Triage Agent',
  [AGENT_ID.COURSE_ADVISOR]: 'Course Advisor',
  [AGENT_ID.UNIVERSITY_POET]: 'University Poet',
  [AGENT_ID.SCHEDULING_ASSISTANT]: 'Scheduling Assistant',
} as const;

/**
 * File-name stem for per-agent instruction overrides
 * (`instructions_<stem>.txt`).
 */
export const AGENT_INSTRUCTION_FILE_STEM: Record<AgentId, string> = {
  [AGENT_ID.TRIAGE]: 'TriageAgent',
  [AGENT_ID.COURSE_ADVISOR]: 'CourseAdvisor',
  [AGENT_ID.UNIVERSITY_POET]: 'UniversityPoet',
  [AGENT_ID.SCHEDULING_ASSISTANT]: 'SchedulingAssistant',
} as const;

// ============================================
// AGENT ICONS
// ============================================
export const AGENT_ICON: Record<AgentId, string> = {
  [AGENT_ID.TRIAGE]: '🧭',
  [AGENT_ID.COURSE_ADVISOR]: '📚',
  [AGENT_ID.UNIVERSITY_POET]: '🪶',
  [AGENT_ID.SCHEDULING_ASSISTANT]: '🗓️',
} as const;

// ============================================
// AGENT DESCRIPTIONS (for routing prompts)
// ============================================
export const AGENT_DESCRIPTION: Record<AgentId, string> = {
  [AGENT_ID.TRIAGE]: 'Analyses the user query and hands it to the right specialist.',
  [AGENT_ID.COURSE_ADVISOR]: 'Recommends courses based on academic interests and goals, using the course catalogue.',
  [AGENT_ID.UNIVERSITY_POET]: 'Answers questions about campus culture, events and social life, often in haiku.',
  [AGENT_ID.SCHEDULING_ASSISTANT]: 'Provides class times, exam dates and academic timelines from the schedule.',
} as const;

// ============================================
// TOOL NAMES
// ============================================
export const HANDOFF_TOOL = {
  ROUTE_TO_COURSE_ADVISOR: 'route_to_course_advisor',
  ROUTE_TO_UNIVERSITY_POET: 'route_to_university_poet',
  ROUTE_TO_SCHEDULING_ASSISTANT: 'route_to_scheduling_assistant',
  COURSE_ADVISOR_FINALISE: 'course_advisor_finalise',
  UNIVERSITY_POET_FINALISE: 'university_poet_finalise',
  SCHEDULING_ASSISTANT_FINALISE: 'scheduling_assistant_finalise',
} as const;

export type HandoffToolName = (typeof HANDOFF_TOOL)[keyof typeof HANDOFF_TOOL];

export const EXTERNAL_TOOL = {
  READ_QUERY: 'read_query',
} as const;

export type ExternalToolName = (typeof EXTERNAL_TOOL)[keyof typeof EXTERNAL_TOOL];

// ============================================
// CONTEXT KEYS
// ============================================
export const CONTEXT_KEY = {
  RESPONSE_HAIKU: 'response_haiku',
} as const;

// ============================================
// CLOSING PAYLOADS
// ============================================

/** Prefix used to recognise a closing message already in the transcript. */
export const CLOSING_SENTINEL = 'Thank you for using the University Support System';

export const CANONICAL_CLOSING_MESSAGE =
  `${CLOSING_SENTINEL}. If you have more questions, feel free to reach out!`;

export const POET_HAIKU_CLOSING = [
  'A student asks why,',
  'Campus calls with ancient tales,',
  'Wisdom finds its way.',
].join('\n');
