/**
 * Journal Pipeline (read-path)
 *
 * One turn: Idle → Retrieving → Routing → Generating → Validating → Done,
 * or Failed when generation is unavailable after a retry. Retrieval and NLU
 * run concurrently; the graph query waits for NLU entities. Every external
 * stage degrades to an empty result, so a turn always produces a reply.
 */

import {
  COMPOSE_JOURNAL_SYSTEM_PROMPT,
  CORRECTIVE_INSTRUCTION,
  STATIC_WELCOME,
  WELCOME_SYSTEM_PROMPT,
  WELCOME_USER_PROMPT,
} from '../agents/prompts/index.js';
import type { PipelineSettings } from '../config/env.js';
import type { ChatMessage, EntryStore, SessionStore, TextGenerator } from '../types/capabilities.js';
import type { JournalSession } from '../types/journal.js';
import type { RetrievalContext, TurnOutcome, TurnState } from '../types/pipeline.js';
import { formatDateDayOnly } from '../utils/contextFormatting.js';
import { SessionEndedError, errorMessage } from '../utils/errors.js';
import { runStage, skippedStage } from '../utils/stage.js';
import { countWords } from '../utils/tokenCounter.js';
import { TraceAttributes, annotateActiveSpan, buildStageAttributes, withSpan } from '../utils/tracing.js';
import type { ContextBudgeter } from './contextBudgetService.js';
import type { IntentRouter } from './intentRouterService.js';
import type { KnowledgeGraph } from './knowledgeGraphService.js';
import type { NluService } from './nluService.js';
import type { ResponseFormatValidator } from './responseFormatService.js';
import type { SemanticRetriever } from './semanticRetrievalService.js';

export const FAILURE_REPLY = "I'm having trouble processing that right now. Could you try again?";

const GREETING_MAX_WORDS = 3;
const GREETING_PATTERN = /^(?:hi|hello|hey|hiya|howdy|yo|greetings|good\s+(?:morning|afternoon|evening))\b/i;
const WELCOME_MAX_WORDS = 20;
const WELCOME_MAX_OUTPUT_TOKENS = 60;
const WELCOME_RECENT_ENTRIES = 2;
const GENERATION_ATTEMPTS = 2;

/**
 * Short messages that only say hello
 */
export function isGreeting(message: string): boolean {
  const words = countWords(message);
  return words > 0 && words <= GREETING_MAX_WORDS && GREETING_PATTERN.test(message.trim());
}

export interface JournalPipelineDeps {
  retriever: SemanticRetriever;
  nlu: NluService;
  graph: KnowledgeGraph;
  budgeter: ContextBudgeter;
  router: IntentRouter;
  validator: ResponseFormatValidator;
  generator: TextGenerator;
  sessions: SessionStore;
  entries: EntryStore;
  settings: PipelineSettings;
}

export class JournalPipeline {
  constructor(private readonly deps: JournalPipelineDeps) {}

  /**
   * Reply text for one user message. Never throws for dependency failures.
   *
   * @throws SessionEndedError when the session was already saved as an entry
   */
  async handleTurn(userId: string, sessionId: string, message: string): Promise<string> {
    const outcome = await this.runTurn(userId, sessionId, message);
    return outcome.reply;
  }

  async runTurn(userId: string, sessionId: string, message: string): Promise<TurnOutcome> {
    return withSpan('pipeline.turn', buildStageAttributes('turn', userId, { sessionId }), async () => {
      const transitions: TurnState[] = ['Idle'];
      const history = await this.loadHistory(userId, sessionId);

      const outcome = isGreeting(message)
        ? await this.greet(userId, transitions)
        : await this.respond(userId, message, history, transitions);

      await this.recordTurn(userId, sessionId, message, outcome.reply);

      annotateActiveSpan({
        [TraceAttributes.TURN_STATE]: outcome.state,
        [TraceAttributes.INTENT]: outcome.routing?.intent,
        [TraceAttributes.TONE]: outcome.routing?.tone,
        [TraceAttributes.QUALITY_FLAGGED]: outcome.qualityFlagged,
      });
      console.log(`[Pipeline] Turn ${outcome.state}: ${transitions.join(' → ')}`);

      return outcome;
    });
  }

  private async respond(
    userId: string,
    message: string,
    history: ChatMessage[],
    transitions: TurnState[]
  ): Promise<TurnOutcome> {
    const { settings } = this.deps;

    transitions.push('Retrieving');
    const [semantic, facts] = await Promise.all([
      this.deps.retriever.retrieve(message, userId, settings.retrievalTopK),
      this.deps.nlu.extract(message, history),
    ]);

    const entityNames = facts.entities.map((entity) => entity.name).slice(0, settings.graphMaxEntities);
    const graph =
      entityNames.length > 0
        ? await this.deps.graph.related(userId, entityNames, settings.graphDepth)
        : skippedStage('graph', []);

    const context: RetrievalContext = {
      semantic,
      graph,
      facts,
      extractionOk: facts.strategy === 'generative',
    };

    transitions.push('Routing');
    const routing = this.deps.router.route(message, facts);
    const block = this.deps.budgeter.assemble(semantic, graph, facts, settings.contextMaxTokens);
    const system = COMPOSE_JOURNAL_SYSTEM_PROMPT(routing.templateGuidance, block.text, settings.replyMaxWords);
    const messages: ChatMessage[] = [...history, { role: 'user', content: message }];

    transitions.push('Generating');
    const reply = await this.generate(system, messages, 'journal-reply');
    if (reply === undefined) {
      transitions.push('Failed');
      return { reply: FAILURE_REPLY, state: 'Failed', transitions, qualityFlagged: false, routing, context, greeting: false };
    }

    transitions.push('Validating');
    let served = reply;
    let check = this.deps.validator.check(served);

    if (!check.valid) {
      console.warn(`[Quality] Reply broke format (${check.violations.join('; ')}), regenerating once`);
      const corrected = await this.generate(
        `${system}\n\n${CORRECTIVE_INSTRUCTION(check.violations, settings.replyMaxWords)}`,
        messages,
        'journal-reply-corrective'
      );
      if (corrected !== undefined) {
        served = corrected;
        check = this.deps.validator.check(served);
      }
    }

    const qualityFlagged = !check.valid;
    if (qualityFlagged) {
      console.warn(`[Quality] Serving reply that still breaks format: ${check.violations.join('; ')}`);
    }

    transitions.push('Done');
    return { reply: served, state: 'Done', transitions, qualityFlagged, routing, context, greeting: false };
  }

  /**
   * Welcome for greeting-only messages. Skips NLU and the graph; uses recent
   * entries when there are any, the static welcome otherwise.
   */
  private async greet(userId: string, transitions: TurnState[]): Promise<TurnOutcome> {
    transitions.push('Retrieving');
    const recent = await runStage('recent-entries', this.deps.settings.timeouts.graphMs, [], () =>
      this.deps.entries.listByUser(userId, WELCOME_RECENT_ENTRIES)
    );

    const done = (reply: string): TurnOutcome => {
      transitions.push('Done');
      return { reply, state: 'Done', transitions, qualityFlagged: false, greeting: true };
    };

    if (recent.value.length === 0) {
      return done(STATIC_WELCOME);
    }

    const recentContext = recent.value
      .map((entry) => `${formatDateDayOnly(entry.created_at) ?? 'recently'}: ${entry.title}. ${entry.summarized_text}`)
      .join('\n');

    transitions.push('Generating');
    const welcome = await this.generate(
      WELCOME_SYSTEM_PROMPT,
      [{ role: 'user', content: WELCOME_USER_PROMPT(recentContext) }],
      'journal-welcome',
      WELCOME_MAX_OUTPUT_TOKENS,
      1
    );
    if (welcome === undefined) {
      return done(STATIC_WELCOME);
    }

    transitions.push('Validating');
    try {
      this.deps.validator.assertValid(welcome);
    } catch (error) {
      console.warn(`[Quality] Welcome rejected, using static welcome: ${errorMessage(error)}`);
      return done(STATIC_WELCOME);
    }

    return done(countWords(welcome) <= WELCOME_MAX_WORDS ? welcome : STATIC_WELCOME);
  }

  /**
   * Generation with retry on unavailability. Empty text counts as unavailable.
   */
  private async generate(
    system: string,
    messages: ChatMessage[],
    functionId: string,
    maxOutputTokens: number = this.deps.settings.replyMaxOutputTokens,
    attempts: number = GENERATION_ATTEMPTS
  ): Promise<string | undefined> {
    for (let attempt = 1; attempt <= attempts; attempt++) {
      const result = await runStage('generation', this.deps.settings.timeouts.generationMs, '', async () => {
        const text = await this.deps.generator.complete({ system, messages, maxOutputTokens, functionId });
        if (!text.trim()) {
          throw new Error('generation returned empty text');
        }
        return text.trim();
      });

      if (result.ok) {
        return result.value;
      }
    }
    return undefined;
  }

  /**
   * Recent history of an open session. A missing session is a new one.
   *
   * @throws SessionEndedError when the session was already saved as an entry
   */
  private async loadHistory(userId: string, sessionId: string): Promise<ChatMessage[]> {
    let session: JournalSession | null;
    try {
      session = await this.deps.sessions.get(userId, sessionId);
    } catch (error) {
      console.warn(`[Pipeline] Session history unavailable, continuing without it: ${errorMessage(error)}`);
      return [];
    }

    if (session?.ended_at) {
      throw new SessionEndedError(sessionId);
    }

    const window = this.deps.settings.historyWindow;
    if (!session || window <= 0) {
      return [];
    }
    return session.transcript.slice(-window).map((turn) => ({ role: turn.role, content: turn.content }));
  }

  private async recordTurn(userId: string, sessionId: string, message: string, reply: string): Promise<void> {
    const timestamp = new Date().toISOString();
    try {
      const appended = await this.deps.sessions.appendTurns(userId, sessionId, [
        { role: 'user', content: message, timestamp },
        { role: 'assistant', content: reply, timestamp },
      ]);
      if (!appended) {
        console.warn(`[Pipeline] Session ${sessionId} ended during the turn; turns not recorded`);
      }
    } catch (error) {
      console.error(`[Pipeline] Failed to persist session turns: ${errorMessage(error)}`);
    }
  }
}
