import neo4j, { type Driver } from 'neo4j-driver';

export interface Neo4jCredentials {
  uri: string;
  username: string;
  password: string;
}

export interface CypherStatement {
  cypher: string;
  params: Record<string, unknown>;
}

/**
 * Converts Neo4j-specific types to JavaScript primitives
 * Handles: Integer, Date, DateTime, LocalDateTime, Time, LocalTime, Duration
 */
export function serializeNeo4jValue(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (neo4j.isInt(value)) {
    return value.toNumber();
  }

  if (
    neo4j.isDate(value) ||
    neo4j.isDateTime(value) ||
    neo4j.isLocalDateTime(value) ||
    neo4j.isTime(value) ||
    neo4j.isLocalTime(value) ||
    neo4j.isDuration(value)
  ) {
    return value.toString();
  }

  if (Array.isArray(value)) {
    return value.map(serializeNeo4jValue);
  }

  if (typeof value === 'object') {
    const serialized: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      serialized[key] = serializeNeo4jValue(val);
    }
    return serialized;
  }

  return value;
}

export class Neo4jService {
  private driver: Driver | null = null;

  constructor(private readonly credentials: Neo4jCredentials) {}

  /**
   * Initialize the Neo4j driver connection
   */
  async connect(): Promise<void> {
    try {
      this.driver = neo4j.driver(
        this.credentials.uri,
        neo4j.auth.basic(this.credentials.username, this.credentials.password)
      );
      await this.driver.verifyConnectivity();
    } catch (error) {
      console.error('[Graph] Neo4j connection failed:', error);
      throw error;
    }
  }

  getDriver(): Driver {
    if (!this.driver) {
      throw new Error('Neo4j driver not initialized. Call connect() first.');
    }
    return this.driver;
  }

  async close(): Promise<void> {
    if (this.driver) {
      await this.driver.close();
      this.driver = null;
    }
  }

  /**
   * Execute a Cypher query and return plain records
   */
  async executeQuery(cypher: string, params: Record<string, unknown> = {}): Promise<Record<string, unknown>[]> {
    const session = this.getDriver().session();

    try {
      const result = await session.run(cypher, params);
      return result.records.map((record) => serializeRecord(record.toObject()));
    } catch (error) {
      console.error('[Graph] Neo4j query error:', error);
      throw error;
    } finally {
      await session.close();
    }
  }

  /**
   * Run several write statements in one transaction. Either all of them
   * apply or none do.
   */
  async executeWrite(statements: CypherStatement[]): Promise<void> {
    if (statements.length === 0) {
      return;
    }

    const session = this.getDriver().session();

    try {
      await session.executeWrite(async (tx) => {
        for (const statement of statements) {
          await tx.run(statement.cypher, statement.params);
        }
      });
    } catch (error) {
      console.error('[Graph] Neo4j write transaction failed:', error);
      throw error;
    } finally {
      await session.close();
    }
  }
}

function serializeRecord(record: Record<string, unknown>): Record<string, unknown> {
  const serialized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    serialized[key] = serializeNeo4jValue(value);
  }
  return serialized;
}
