/**
 * In-process stand-ins for the external capabilities. Test-only; excluded
 * from the build.
 */

import { createHash } from 'crypto';
import { DEFAULT_PIPELINE_SETTINGS, type PipelineSettings } from '../config/env.js';
import { NodeLabels, TRAVERSABLE_RELATIONSHIPS } from '../constants/graph.js';
import type {
  ChunkStore,
  CompletionRequest,
  EmbeddingProvider,
  EntryStore,
  GraphBackend,
  ObjectRequest,
  SessionStore,
  TextGenerator,
} from '../types/capabilities.js';
import type { GraphEdgeSpec, GraphFact, GraphNodeSpec, GraphProjection } from '../types/graph.js';
import type { Chunk, Entry, JournalSession, ScoredChunk, Turn } from '../types/journal.js';
import { DependencyUnavailableError, SchemaValidationError } from '../utils/errors.js';
import { edgeIdentity, entryNodeKey } from '../utils/graphProjection.js';

export function testSettings(overrides: Partial<PipelineSettings> = {}): PipelineSettings {
  return { ...DEFAULT_PIPELINE_SETTINGS, ...overrides };
}

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  return normA === 0 || normB === 0 ? 0 : dot / Math.sqrt(normA * normB);
}

/**
 * Bag-of-words vectors from hashed lowercase tokens. Identical text gives an
 * identical vector.
 */
export class HashEmbeddingProvider implements EmbeddingProvider {
  failing = false;
  calls = 0;

  constructor(
    readonly version: string = 'test-hash-v1',
    private readonly dimensions: number = 64
  ) {}

  async embed(text: string): Promise<number[]> {
    this.calls++;
    if (this.failing) {
      throw new DependencyUnavailableError('embedding', 'test embedding outage');
    }
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of text.toLowerCase().match(/[a-z0-9']+/g) ?? []) {
      const digest = createHash('sha256').update(token).digest();
      vector[digest[0] % this.dimensions] += 1;
    }
    return vector;
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (const text of texts) {
      vectors.push(await this.embed(text));
    }
    return vectors;
  }
}

export class InMemoryChunkStore implements ChunkStore {
  readonly rows = new Map<string, Chunk>();
  failing = false;

  async upsertChunks(chunks: Chunk[]): Promise<void> {
    this.check();
    for (const chunk of chunks) {
      this.rows.set(chunk.id, chunk);
    }
  }

  async nearest(userId: string, queryVector: number[], k: number, embeddingVersion: string): Promise<ScoredChunk[]> {
    this.check();
    return [...this.rows.values()]
      .filter((row) => row.user_id === userId && row.embedding_version === embeddingVersion)
      .map(({ embedding, ...chunk }) => ({ chunk, similarity: cosineSimilarity(queryVector, embedding) }))
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, k);
  }

  async deleteByEntry(userId: string, entryId: string): Promise<void> {
    this.check();
    for (const [id, row] of this.rows) {
      if (row.user_id === userId && row.entry_id === entryId) {
        this.rows.delete(id);
      }
    }
  }

  private check(): void {
    if (this.failing) {
      throw new Error('chunk store offline');
    }
  }
}

/**
 * Merge-by-key graph with owner-scoped, undirected path search over the
 * traversable relationship types.
 */
export class InMemoryGraphBackend implements GraphBackend {
  readonly nodes = new Map<string, GraphNodeSpec>();
  readonly edges = new Map<string, GraphEdgeSpec>();
  available = true;
  schemaDeclarations = 0;

  async ensureSchema(): Promise<void> {
    this.check();
    this.schemaDeclarations++;
  }

  async mergeProjection(projection: GraphProjection): Promise<void> {
    this.check();
    for (const node of projection.nodes) {
      const existing = this.nodes.get(node.key);
      this.nodes.set(node.key, existing ? { ...existing, properties: { ...existing.properties, ...node.properties } } : node);
    }
    for (const edge of projection.edges) {
      const id = edgeIdentity(edge);
      const existing = this.edges.get(id);
      this.edges.set(id, existing ? { ...existing, properties: { ...existing.properties, ...edge.properties } } : edge);
    }
  }

  async neighborhood(userId: string, nameKeys: string[], depth: number): Promise<GraphFact[]> {
    this.check();
    const traversable = [...this.edges.values()].filter(
      (edge) => edge.user_id === userId && TRAVERSABLE_RELATIONSHIPS.includes(edge.type)
    );
    const anchors = [...this.nodes.values()].filter(
      (node) => node.user_id === userId && node.name_key !== undefined && nameKeys.includes(node.name_key)
    );
    const facts: GraphFact[] = [];

    const walk = (anchor: GraphNodeSpec, current: string, visited: Set<string>, hops: number) => {
      if (hops >= depth) {
        return;
      }
      for (const edge of traversable) {
        const next = edge.from_key === current ? edge.to_key : edge.to_key === current ? edge.from_key : undefined;
        const nextNode = next !== undefined ? this.nodes.get(next) : undefined;
        if (next === undefined || visited.has(next) || !nextNode || nextNode.user_id !== userId) {
          continue;
        }
        facts.push({
          anchor: anchor.name,
          subject: this.display(edge.from_key),
          relation: edge.relation ?? edge.type.toLowerCase(),
          object: this.display(edge.to_key),
          hops: hops + 1,
        });
        walk(anchor, next, new Set([...visited, next]), hops + 1);
      }
    };

    for (const anchor of anchors) {
      walk(anchor, anchor.key, new Set([anchor.key]), 0);
    }
    return facts;
  }

  async deleteEntry(userId: string, entryId: string): Promise<void> {
    this.check();
    const key = entryNodeKey(entryId);
    const node = this.nodes.get(key);
    if (!node || node.user_id !== userId) {
      return;
    }
    this.nodes.delete(key);
    for (const [id, edge] of this.edges) {
      if (edge.from_key === key || edge.to_key === key) {
        this.edges.delete(id);
      }
    }
  }

  private display(key: string): string {
    const node = this.nodes.get(key);
    if (!node) {
      return key;
    }
    if (node.label === NodeLabels.Entry) {
      const summary = node.properties.summary;
      return `entry: ${typeof summary === 'string' ? summary : node.name}`;
    }
    return node.name;
  }

  private check(): void {
    if (!this.available) {
      throw new DependencyUnavailableError('graph', 'test graph outage');
    }
  }
}

type ScriptedReply = string | Error;

export type RecordedObjectRequest = Omit<ObjectRequest<unknown>, 'schema'>;

/**
 * Returns queued replies in order, then `fallbackReply` (or throws when it is
 * undefined). Records every request. Structured calls read the reply as JSON
 * and validate it against the request schema, the way generateObject does.
 */
export class ScriptedTextGenerator implements TextGenerator {
  readonly requests: CompletionRequest[] = [];
  readonly objectRequests: RecordedObjectRequest[] = [];
  private readonly queue: ScriptedReply[];

  constructor(
    replies: ScriptedReply[] = [],
    private readonly fallbackReply?: string,
    private readonly available: boolean = true
  ) {
    this.queue = [...replies];
  }

  isAvailable(): boolean {
    return this.available;
  }

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    return this.next();
  }

  async completeObject<T>(request: ObjectRequest<T>): Promise<T> {
    const { schema, ...recorded } = request;
    this.objectRequests.push(recorded);
    const raw = this.next();

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new SchemaValidationError('Model output was not JSON', [String(error)]);
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new SchemaValidationError(
        'Model output did not match schema',
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      );
    }
    return parsed.data;
  }

  private next(): string {
    if (!this.available) {
      throw new DependencyUnavailableError('generation', 'no test key');
    }
    const next = this.queue.shift() ?? this.fallbackReply;
    if (next === undefined) {
      throw new DependencyUnavailableError('generation', 'script exhausted');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

export class InMemoryEntryStore implements EntryStore {
  readonly rows = new Map<string, Entry>();
  failing = false;
  creates = 0;

  async create(entry: Entry): Promise<Entry> {
    this.check();
    this.creates++;
    const existing = this.rows.get(entry.id);
    if (existing) {
      return existing;
    }
    this.rows.set(entry.id, entry);
    return entry;
  }

  async getById(userId: string, entryId: string): Promise<Entry | null> {
    this.check();
    const entry = this.rows.get(entryId);
    return entry && entry.user_id === userId ? entry : null;
  }

  async listByUser(userId: string, limit: number): Promise<Entry[]> {
    this.check();
    return [...this.rows.values()]
      .filter((entry) => entry.user_id === userId)
      .sort((a, b) => b.created_at.localeCompare(a.created_at))
      .slice(0, limit);
  }

  async delete(userId: string, entryId: string): Promise<boolean> {
    this.check();
    const entry = this.rows.get(entryId);
    if (!entry || entry.user_id !== userId) {
      return false;
    }
    return this.rows.delete(entryId);
  }

  private check(): void {
    if (this.failing) {
      throw new Error('entry store offline');
    }
  }
}

export class InMemorySessionStore implements SessionStore {
  readonly sessions = new Map<string, JournalSession>();
  failing = false;

  constructor(private readonly now: () => string = () => '2026-01-01T09:00:00.000Z') {}

  seed(userId: string, sessionId: string, transcript: Turn[], startedAt: string = this.now()): JournalSession {
    const session: JournalSession = { id: sessionId, user_id: userId, transcript, started_at: startedAt, ended_at: null };
    this.sessions.set(sessionId, session);
    return session;
  }

  async get(userId: string, sessionId: string): Promise<JournalSession | null> {
    this.check();
    const session = this.sessions.get(sessionId);
    return session && session.user_id === userId ? session : null;
  }

  async appendTurns(userId: string, sessionId: string, turns: Turn[]): Promise<boolean> {
    this.check();
    const session = this.sessions.get(sessionId) ?? this.seed(userId, sessionId, []);
    if (session.user_id !== userId || session.ended_at !== null) {
      return false;
    }
    session.transcript = [...session.transcript, ...turns];
    return true;
  }

  async markEnded(userId: string, sessionId: string): Promise<void> {
    const session = await this.get(userId, sessionId);
    if (session && session.ended_at === null) {
      session.ended_at = this.now();
    }
  }

  private check(): void {
    if (this.failing) {
      throw new Error('session store offline');
    }
  }
}

export function turn(role: Turn['role'], content: string, timestamp: string = '2026-01-01T09:00:00.000Z'): Turn {
  return { role, content, timestamp };
}
