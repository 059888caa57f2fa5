import { z } from 'zod';

/**
 * Runtime shapes of Supabase rows. The client is untyped, so every row read
 * back is parsed here before it reaches the pipeline.
 */

export const TurnSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  timestamp: z.string(),
});

export const SessionRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  transcript: z.array(TurnSchema).nullable().transform((turns) => turns ?? []),
  started_at: z.string(),
  ended_at: z.string().nullable(),
});

export const EntryRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  session_id: z.string(),
  title: z.string(),
  summarized_text: z.string(),
  transcript: z.array(TurnSchema).nullable().transform((turns) => turns ?? []),
  created_at: z.string(),
});

export const MatchedChunkRowSchema = z.object({
  id: z.string(),
  entry_id: z.string(),
  user_id: z.string(),
  content: z.string(),
  embedding_version: z.string(),
  chunk_index: z.number().int(),
  created_at: z.string(),
  similarity: z.number(),
});
