/**
 * Welcome message for greeting-only turns.
 */

export const STATIC_WELCOME = 'Welcome back. How have you been?';

export const WELCOME_SYSTEM_PROMPT =
  'You are an empathetic journaling companion. Write a brief, warm welcome (under 20 words) that may lightly reference the user\'s recent journal entries. End with exactly one simple question. Example: "Welcome back. How have you been since the move?"';

export const WELCOME_USER_PROMPT = (recentContext: string) =>
  `Recent context from the user's journal:\n${recentContext}\n\nWrite the welcome message.`;
