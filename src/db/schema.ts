import { NodeLabels } from '../constants/graph.js';
import type { Neo4jService } from './neo4j.js';

type SchemaRunner = Pick<Neo4jService, 'executeQuery'>;

/**
 * Initialize Neo4j schema with constraints and indexes.
 *
 * Every statement is IF NOT EXISTS, so running this on every start is safe.
 */
export async function initializeGraphSchema(db: SchemaRunner): Promise<void> {
  console.log('[Graph] Initializing Neo4j schema...');

  try {
    await createConstraints(db);
    await createIndexes(db);
    console.log('[Graph] Neo4j schema initialized');
  } catch (error) {
    if (error instanceof Error) {
      console.error('[Graph] Schema initialization failed:', error.message);
    } else {
      console.error('[Graph] Schema initialization failed with unknown error:', error);
    }
    throw error;
  }
}

/**
 * Execute a schema statement, treating "already exists" as success
 */
async function runIfNotExists(db: SchemaRunner, statement: string): Promise<void> {
  try {
    await db.executeQuery(statement);
  } catch (caughtError) {
    if (!(caughtError instanceof Error)) {
      throw caughtError;
    }

    const isAlreadyExists =
      caughtError.message.includes('equivalent constraint already exists') ||
      caughtError.message.includes('equivalent index already exists');

    if (!isAlreadyExists) {
      throw caughtError;
    }
  }
}

export const GRAPH_CONSTRAINTS = [
  // entity_key is the merge identity of every node
  `CREATE CONSTRAINT person_entity_key_unique IF NOT EXISTS FOR (p:${NodeLabels.Person}) REQUIRE (p.entity_key) IS UNIQUE`,
  `CREATE CONSTRAINT entity_entity_key_unique IF NOT EXISTS FOR (e:${NodeLabels.Entity}) REQUIRE (e.entity_key) IS UNIQUE`,
  `CREATE CONSTRAINT emotion_entity_key_unique IF NOT EXISTS FOR (m:${NodeLabels.Emotion}) REQUIRE (m.entity_key) IS UNIQUE`,
  `CREATE CONSTRAINT entry_entity_key_unique IF NOT EXISTS FOR (n:${NodeLabels.Entry}) REQUIRE (n.entity_key) IS UNIQUE`,

  // (owner, type, normalized name) is unique among named nodes
  `CREATE CONSTRAINT person_name_user IF NOT EXISTS FOR (p:${NodeLabels.Person}) REQUIRE (p.user_id, p.name_key) IS UNIQUE`,
  `CREATE CONSTRAINT entity_name_type_user IF NOT EXISTS FOR (e:${NodeLabels.Entity}) REQUIRE (e.user_id, e.entity_type, e.name_key) IS UNIQUE`,
  `CREATE CONSTRAINT emotion_name_user IF NOT EXISTS FOR (m:${NodeLabels.Emotion}) REQUIRE (m.user_id, m.name_key) IS UNIQUE`,
];

export const GRAPH_INDEXES = [
  `CREATE INDEX person_user_id IF NOT EXISTS FOR (p:${NodeLabels.Person}) ON (p.user_id)`,
  `CREATE INDEX person_is_owner IF NOT EXISTS FOR (p:${NodeLabels.Person}) ON (p.is_owner)`,
  `CREATE INDEX entity_user_id IF NOT EXISTS FOR (e:${NodeLabels.Entity}) ON (e.user_id)`,
  `CREATE INDEX entity_name_key IF NOT EXISTS FOR (e:${NodeLabels.Entity}) ON (e.name_key)`,
  `CREATE INDEX emotion_user_id IF NOT EXISTS FOR (m:${NodeLabels.Emotion}) ON (m.user_id)`,
  `CREATE INDEX entry_user_id IF NOT EXISTS FOR (n:${NodeLabels.Entry}) ON (n.user_id)`,
];

async function createConstraints(db: SchemaRunner): Promise<void> {
  for (const constraint of GRAPH_CONSTRAINTS) {
    await runIfNotExists(db, constraint);
  }
  console.log('[Graph]   Constraints created');
}

async function createIndexes(db: SchemaRunner): Promise<void> {
  for (const index of GRAPH_INDEXES) {
    await runIfNotExists(db, index);
  }
  console.log('[Graph]   Indexes created');
}
