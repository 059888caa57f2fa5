#!/usr/bin/env node

/**
 * Journal CLI
 *
 *   journal turn <userId> <sessionId> <message...>
 *   journal save <userId> <sessionId>
 *   journal entries <userId> [limit]
 *   journal show <userId> <entryId>
 *   journal delete <userId> <entryId>
 *   journal init-schema
 *
 * A message may also be piped on stdin: echo "hello" | journal turn u1 s1
 */

import { config } from 'dotenv';
import { loadConfig, type AppConfig } from './config/env.js';
import { initTracing } from './config/tracing.js';
import { Neo4jService } from './db/neo4j.js';
import { initializeGraphSchema } from './db/schema.js';
import { createJournalApp, type JournalApp } from './index.js';
import { errorMessage } from './utils/errors.js';

config();

const USAGE = `Usage:
  journal turn <userId> <sessionId> <message...>
  journal save <userId> <sessionId>
  journal entries <userId> [limit]
  journal show <userId> <entryId>
  journal delete <userId> <entryId>
  journal init-schema`;

async function readStdin(): Promise<string> {
  if (process.stdin.isTTY) {
    return '';
  }
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8').trim();
}

function requireArgs(args: string[], count: number): string[] {
  if (args.length < count) {
    throw new Error(`Expected ${count} argument(s)\n\n${USAGE}`);
  }
  return args;
}

async function initSchema(appConfig: AppConfig): Promise<void> {
  if (!appConfig.neo4j) {
    throw new Error('Missing Neo4j credentials. Set NEO4J_URI, NEO4J_USERNAME and NEO4J_PASSWORD.');
  }
  const neo4jService = new Neo4jService(appConfig.neo4j);
  await neo4jService.connect();
  try {
    await initializeGraphSchema(neo4jService);
  } finally {
    await neo4jService.close();
  }
}

async function runCommand(app: JournalApp, command: string, args: string[]): Promise<void> {
  switch (command) {
    case 'turn': {
      const [userId, sessionId, ...words] = requireArgs(args, 2);
      const message = words.length > 0 ? words.join(' ') : await readStdin();
      if (!message) {
        throw new Error('No message provided');
      }
      console.log(await app.pipeline.handleTurn(userId, sessionId, message));
      return;
    }
    case 'save': {
      const [userId, sessionId] = requireArgs(args, 2);
      console.log(await app.entries.saveEntry(userId, sessionId));
      return;
    }
    case 'entries': {
      const [userId, limit] = requireArgs(args, 1);
      const entries = await app.entries.listEntries(userId, limit ? Number.parseInt(limit, 10) : undefined);
      console.log(
        JSON.stringify(
          entries.map(({ id, title, created_at, summarized_text }) => ({ id, title, created_at, summary: summarized_text })),
          null,
          2
        )
      );
      return;
    }
    case 'show': {
      const [userId, entryId] = requireArgs(args, 2);
      const entry = await app.entries.getEntry(userId, entryId);
      if (!entry) {
        throw new Error(`Entry ${entryId} not found`);
      }
      console.log(JSON.stringify(entry, null, 2));
      return;
    }
    case 'delete': {
      const [userId, entryId] = requireArgs(args, 2);
      const deleted = await app.entries.deleteEntry(userId, entryId);
      console.log(deleted ? `Deleted ${entryId}` : `Entry ${entryId} not found`);
      return;
    }
    default:
      throw new Error(`Unknown command: ${command}\n\n${USAGE}`);
  }
}

async function main(): Promise<void> {
  const [command, ...args] = process.argv.slice(2);

  if (!command || command === '--help' || command === '-h') {
    console.error(USAGE);
    process.exitCode = command ? 0 : 1;
    return;
  }

  const appConfig = loadConfig();
  initTracing(appConfig.tracingMode);

  if (command === 'init-schema') {
    await initSchema(appConfig);
    return;
  }

  const app = await createJournalApp(appConfig);
  try {
    await runCommand(app, command, args);
  } finally {
    await app.close();
  }
}

main().catch((error: unknown) => {
  console.error('Error:', errorMessage(error));
  process.exit(1);
});
