import type { SupabaseClient } from '@supabase/supabase-js';
import type { SessionStore } from '../types/capabilities.js';
import type { JournalSession, Turn } from '../types/journal.js';
import { SessionRowSchema } from './rowSchemas.js';

const SESSION_COLUMNS = 'id, user_id, transcript, started_at, ended_at';

/**
 * In-progress journaling sessions. The transcript is a JSONB array of turns.
 */
export class SessionRepository implements SessionStore {
  constructor(private readonly supabase: SupabaseClient) {}

  async get(userId: string, sessionId: string): Promise<JournalSession | null> {
    const { data, error } = await this.supabase
      .from('journal_sessions')
      .select(SESSION_COLUMNS)
      .eq('id', sessionId)
      .eq('user_id', userId)
      .maybeSingle();

    if (error) {
      throw new Error(`Failed to fetch journal session: ${error.message}`);
    }

    return data ? SessionRowSchema.parse(data) : null;
  }

  /**
   * Append in one statement through `append_session_turns`
   * (supabase/schema.sql), creating the session when it is new. Concurrent
   * appends both land; an ended session or another user's session is left
   * untouched.
   *
   * @returns false when nothing was appended
   */
  async appendTurns(userId: string, sessionId: string, turns: Turn[]): Promise<boolean> {
    const { data, error } = await this.supabase.rpc('append_session_turns', {
      p_session_id: sessionId,
      p_user_id: userId,
      p_turns: turns,
    });

    if (error) {
      throw new Error(`Failed to append session turns: ${error.message}`);
    }

    return data === true;
  }

  async markEnded(userId: string, sessionId: string): Promise<void> {
    const { error } = await this.supabase
      .from('journal_sessions')
      .update({ ended_at: new Date().toISOString() })
      .eq('id', sessionId)
      .eq('user_id', userId)
      .is('ended_at', null);

    if (error) {
      throw new Error(`Failed to end journal session: ${error.message}`);
    }
  }
}
