/**
 * Prompts for summarizing a finished journaling session and titling it.
 */

export const SUMMARY_SYSTEM_PROMPT =
  'You create concise, empathetic summaries of journaling conversations.';

export const SUMMARY_USER_PROMPT = (transcript: string) => `Summarize this journaling conversation in 2-3 sentences, capturing the key themes, emotions and insights. Focus on what the user shared about their thoughts, feelings or experiences.

Conversation:
${transcript}

Summary:`;

export const TITLE_SYSTEM_PROMPT = 'You create short, descriptive titles for journal entries.';

export const TITLE_USER_PROMPT = (firstMessage: string) => `Create a short, descriptive title (3-6 words) for this journal entry based on the opening message:

"${firstMessage}"

Title:`;
