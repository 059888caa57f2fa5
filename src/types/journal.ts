/**
 * Journal domain records: sessions in progress, saved entries and their chunks.
 */

export type TurnRole = 'user' | 'assistant';

export interface Turn {
  role: TurnRole;
  content: string;
  timestamp: string;
}

/**
 * In-progress conversation, persisted between turns until it is saved as an entry.
 */
export interface JournalSession {
  id: string;
  user_id: string;
  transcript: Turn[];
  started_at: string;
  ended_at: string | null;
}

/**
 * One saved journaling session. Immutable once saved, except for deletion.
 */
export interface Entry {
  id: string;
  user_id: string;
  session_id: string;
  title: string;
  summarized_text: string;
  transcript: Turn[];
  created_at: string;
}

/**
 * Retrieval-sized slice of an entry's summary plus its embedding.
 */
export interface Chunk {
  id: string;
  entry_id: string;
  user_id: string;
  content: string;
  embedding: number[];
  embedding_version: string;
  chunk_index: number;
  created_at: string;
}

export interface ScoredChunk {
  chunk: Omit<Chunk, 'embedding'>;
  similarity: number;
}
