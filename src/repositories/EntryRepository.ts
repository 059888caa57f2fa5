import type { SupabaseClient } from '@supabase/supabase-js';
import type { EntryStore } from '../types/capabilities.js';
import type { Entry } from '../types/journal.js';
import { EntryRowSchema } from './rowSchemas.js';

const ENTRY_COLUMNS = 'id, user_id, session_id, title, summarized_text, transcript, created_at';

export class EntryRepository implements EntryStore {
  constructor(private readonly supabase: SupabaseClient) {}

  /**
   * Insert an entry. Saved entries never change, so an existing row with the
   * same id wins and is returned.
   */
  async create(entry: Entry): Promise<Entry> {
    const { data, error } = await this.supabase
      .from('journal_entries')
      .upsert(entry, { onConflict: 'id', ignoreDuplicates: true })
      .select(ENTRY_COLUMNS)
      .maybeSingle();

    if (error) {
      throw new Error(`Failed to insert journal entry: ${error.message}`);
    }

    if (data) {
      return EntryRowSchema.parse(data);
    }

    const existing = await this.getById(entry.user_id, entry.id);
    if (!existing) {
      throw new Error(`Journal entry ${entry.id} belongs to another user`);
    }
    return existing;
  }

  async getById(userId: string, entryId: string): Promise<Entry | null> {
    const { data, error } = await this.supabase
      .from('journal_entries')
      .select(ENTRY_COLUMNS)
      .eq('id', entryId)
      .eq('user_id', userId)
      .maybeSingle();

    if (error) {
      throw new Error(`Failed to fetch journal entry: ${error.message}`);
    }

    return data ? EntryRowSchema.parse(data) : null;
  }

  /**
   * Most recent entries first
   */
  async listByUser(userId: string, limit: number = 20): Promise<Entry[]> {
    const { data, error } = await this.supabase
      .from('journal_entries')
      .select(ENTRY_COLUMNS)
      .eq('user_id', userId)
      .order('created_at', { ascending: false })
      .limit(limit);

    if (error) {
      throw new Error(`Failed to list journal entries: ${error.message}`);
    }

    return (data ?? []).map((row) => EntryRowSchema.parse(row));
  }

  async delete(userId: string, entryId: string): Promise<boolean> {
    const { data, error } = await this.supabase
      .from('journal_entries')
      .delete()
      .eq('id', entryId)
      .eq('user_id', userId)
      .select('id');

    if (error) {
      throw new Error(`Failed to delete journal entry: ${error.message}`);
    }

    return (data ?? []).length > 0;
  }
}
