/**
 * Barrel export for all prompts.
 */

export {
  JOURNAL_GUIDE_SYSTEM_PROMPT,
  FORMAT_RULES,
  CORRECTIVE_INSTRUCTION,
  COMPOSE_JOURNAL_SYSTEM_PROMPT,
} from './journal-guide.js';
export { EXTRACTION_SYSTEM_PROMPT, STRICT_EXTRACTION_SUFFIX, EXTRACTION_USER_PROMPT } from './extraction.js';
export { INTENT_TEMPLATES, TONE_GUIDANCE, MODE_GUIDANCE } from './intents.js';
export { SUMMARY_SYSTEM_PROMPT, SUMMARY_USER_PROMPT, TITLE_SYSTEM_PROMPT, TITLE_USER_PROMPT } from './summary.js';
export { STATIC_WELCOME, WELCOME_SYSTEM_PROMPT, WELCOME_USER_PROMPT } from './welcome.js';
