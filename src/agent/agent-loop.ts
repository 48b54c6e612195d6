/**
 * Agent Loop
 *
 * Bounded think → act → observe cycle over one Conversation. Each THINKING
 * entry renders the system prompt, calls the model once and parses the
 * response; ACTING dispatches the parsed invocations and appends one tool
 * turn per invocation, in order, before the next model call.
 *
 * Model-call failures end the run and are rethrown unmodified; retries and
 * timeouts belong to the provider.
 */

import { randomUUID } from 'crypto';
import type {
  AgentRunResult,
  AgentToolCall,
  AgentUsageStats,
  Invocation,
  LoopState,
  ModelResponse,
  Observation,
  WireMessage,
} from '../types/agent-types.js';
import type { LLMProvider } from './llm-provider.js';
import type { ToolRegistry } from './tool-registry.js';
import { createLogger, type Logger } from '../shared/logger.js';
import { Conversation } from './conversation.js';
import { ToolDispatcher, cancelledObservation } from './dispatcher.js';
import { ActloopError, ConcurrentRunError, ConfigError, RunCancelledError, errorMessageOf } from './errors.js';
import { PromptBuilder } from './prompt-builder.js';
import { RunEventEmitter, type RunEventListener } from './run-events.js';
import { ToolCallParser } from './tool-call-parser.js';

export const EXHAUSTED_MESSAGE = 'Reached the maximum number of rounds without a final answer.';

export const DEFAULT_FINAL_ANSWER_MARKERS: readonly string[] = ['final_answer', 'final answer'];

export const DEFAULT_MAX_ROUNDS = 5;

// =============================================================================
// State Machine
// =============================================================================

export type LoopEvent =
  | { type: 'response'; invocations: number; finalAnswer: boolean }
  | { type: 'dispatched' }
  | { type: 'budget_exhausted' };

/**
 * Transition function of the round state machine. DONE and EXHAUSTED are
 * terminal.
 */
export function nextState(state: LoopState, event: LoopEvent): LoopState {
  switch (state) {
    case 'THINKING':
      if (event.type === 'budget_exhausted') return 'EXHAUSTED';
      if (event.type === 'response') {
        if (event.invocations > 0) return 'ACTING';
        return event.finalAnswer ? 'DONE' : 'THINKING';
      }
      break;
    case 'ACTING':
      if (event.type === 'dispatched') return 'THINKING';
      break;
    case 'DONE':
    case 'EXHAUSTED':
      return state;
  }
  throw new ActloopError(`Invalid transition: ${event.type} in state ${state}`);
}

export function containsFinalAnswer(content: string | undefined, markers: readonly string[]): boolean {
  if (!content) return false;
  const haystack = content.toLowerCase();
  return markers.some((marker) => haystack.includes(marker.toLowerCase()));
}

// =============================================================================
// Agent Loop
// =============================================================================

export interface AgentLoopConfig {
  provider: LLMProvider;
  registry: ToolRegistry;
  /** Defaults to the built-in template over `workingDirectory` */
  promptBuilder?: PromptBuilder;
  parser?: ToolCallParser;
  /** Round budget (default: 5) */
  maxRounds?: number;
  /** Render tool turns as user text and drop `tool_calls` (default: true) */
  compatMode?: boolean;
  /** Send the capability catalog in the request's `tools` field (default: false) */
  nativeToolCalling?: boolean;
  /** Run a round's invocations concurrently; append order is unchanged (default: false) */
  parallelDispatch?: boolean;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  finalAnswerMarkers?: readonly string[];
  /** Directory handed to capabilities and listed in the prompt (default: process.cwd()) */
  workingDirectory?: string;
  logger?: Logger;
  onEvent?: RunEventListener;
}

export interface RunOptions {
  signal?: AbortSignal;
}

interface RunContext {
  runId: string;
  signal?: AbortSignal;
  dispatcher: ToolDispatcher;
  rounds: number;
  toolCalls: AgentToolCall[];
  usage: AgentUsageStats;
  lastContent: string;
  pending: Invocation[];
}

export class AgentLoop {
  readonly conversation = new Conversation();

  private provider: LLMProvider;
  private registry: ToolRegistry;
  private promptBuilder: PromptBuilder;
  private parser: ToolCallParser;
  private maxRounds: number;
  private compatMode: boolean;
  private nativeToolCalling: boolean;
  private parallelDispatch: boolean;
  private model?: string;
  private maxTokens?: number;
  private temperature?: number;
  private finalAnswerMarkers: readonly string[];
  private workingDirectory: string;
  private logger: Logger;
  private events: RunEventEmitter;

  private currentState: LoopState = 'THINKING';
  private running = false;

  constructor(config: AgentLoopConfig) {
    const maxRounds = config.maxRounds ?? DEFAULT_MAX_ROUNDS;
    if (!Number.isInteger(maxRounds) || maxRounds < 1) {
      throw new ConfigError([`maxRounds must be a positive integer, got ${maxRounds}`]);
    }

    this.provider = config.provider;
    this.registry = config.registry;
    this.workingDirectory = config.workingDirectory ?? process.cwd();
    this.logger = config.logger ?? createLogger('AgentLoop');
    this.promptBuilder = config.promptBuilder ?? new PromptBuilder({ workingDirectory: this.workingDirectory });
    this.parser = config.parser ?? new ToolCallParser({ logger: this.logger });
    this.maxRounds = maxRounds;
    this.compatMode = config.compatMode ?? true;
    this.nativeToolCalling = config.nativeToolCalling ?? false;
    this.parallelDispatch = config.parallelDispatch ?? false;
    this.model = config.model;
    this.maxTokens = config.maxTokens;
    this.temperature = config.temperature;
    this.finalAnswerMarkers = config.finalAnswerMarkers ?? DEFAULT_FINAL_ANSWER_MARKERS;
    this.events = new RunEventEmitter(config.onEvent, this.logger);
  }

  get state(): LoopState {
    return this.currentState;
  }

  /**
   * Run one user request to completion and return the final text: the last
   * assistant content, or the exhaustion message.
   */
  async run(userInput: string, options: RunOptions = {}): Promise<string> {
    const result = await this.execute(userInput, options);
    return result.response;
  }

  /**
   * Like run(), with rounds, tool calls and token usage.
   *
   * @throws ConcurrentRunError when a run is already in progress on this instance
   * @throws RunCancelledError when the signal aborts
   */
  async execute(userInput: string, options: RunOptions = {}): Promise<AgentRunResult> {
    if (this.running) throw new ConcurrentRunError();
    this.running = true;

    const startedAt = Date.now();
    const ctx: RunContext = {
      runId: randomUUID(),
      signal: options.signal,
      dispatcher: new ToolDispatcher(this.registry, {
        workingDirectory: this.workingDirectory,
        logger: this.logger,
        signal: options.signal,
      }),
      rounds: 0,
      toolCalls: [],
      usage: { inputTokens: 0, outputTokens: 0, totalTokens: 0 },
      lastContent: '',
      pending: [],
    };

    try {
      this.currentState = 'THINKING';
      this.conversation.appendUser(userInput);
      const result = await this.loop(ctx);
      await this.events.emitCompletion(ctx.runId, ctx.toolCalls.length, Date.now() - startedAt, result.outcome);
      return result;
    } catch (error) {
      const outcome = error instanceof RunCancelledError ? 'cancelled' : 'error';
      await this.events.emitCompletion(ctx.runId, ctx.toolCalls.length, Date.now() - startedAt, outcome);
      throw error;
    } finally {
      this.running = false;
    }
  }

  /**
   * Clear the conversation. Safe between runs, never during one.
   */
  reset(): void {
    if (this.running) throw new ConcurrentRunError();
    this.conversation.clear();
    this.currentState = 'THINKING';
  }

  // ---------------------------------------------------------------------------
  // Rounds
  // ---------------------------------------------------------------------------

  private async loop(ctx: RunContext): Promise<AgentRunResult> {
    for (;;) {
      switch (this.currentState) {
        case 'THINKING':
          await this.think(ctx);
          break;
        case 'ACTING':
          await this.act(ctx);
          this.currentState = nextState(this.currentState, { type: 'dispatched' });
          break;
        case 'DONE':
          this.logger.info(`Finished after ${ctx.rounds} round(s)`);
          return this.result('done', ctx.lastContent, ctx);
        case 'EXHAUSTED':
          this.logger.warn(`Round budget of ${this.maxRounds} exhausted`);
          return this.result('exhausted', EXHAUSTED_MESSAGE, ctx);
      }
    }
  }

  private async think(ctx: RunContext): Promise<void> {
    throwIfCancelled(ctx.signal);
    if (ctx.rounds >= this.maxRounds) {
      this.currentState = nextState(this.currentState, { type: 'budget_exhausted' });
      return;
    }

    ctx.rounds++;
    this.logger.info(`Round ${ctx.rounds}/${this.maxRounds}`);
    await this.events.emitThinking(ctx.runId, ctx.rounds);

    const response = await this.callModel(ctx);
    if (response.usage) {
      ctx.usage.inputTokens += response.usage.inputTokens;
      ctx.usage.outputTokens += response.usage.outputTokens;
      ctx.usage.totalTokens = ctx.usage.inputTokens + ctx.usage.outputTokens;
    }

    // The logged turn carries the parsed calls and turns are immutable, so the
    // parse (pure, total) runs first; the append happens before any branch.
    const invocations = this.parser.parse(response).invocations ?? [];
    this.conversation.appendAssistant(response.content, invocations);
    ctx.lastContent = response.content ?? '';
    ctx.pending = invocations;

    this.currentState = nextState(this.currentState, {
      type: 'response',
      invocations: invocations.length,
      finalAnswer: containsFinalAnswer(response.content, this.finalAnswerMarkers),
    });
  }

  private async callModel(ctx: RunContext): Promise<ModelResponse> {
    const messages: WireMessage[] = [
      { role: 'system', content: this.promptBuilder.buildSystemPrompt(this.registry.specs()) },
      ...this.conversation.toWireList(this.compatMode),
    ];

    try {
      return await this.provider.chat(messages, {
        model: this.model,
        maxTokens: this.maxTokens,
        temperature: this.temperature,
        signal: ctx.signal,
        ...(this.nativeToolCalling ? { tools: this.registry.functionSpecs() } : {}),
      });
    } catch (error) {
      this.logger.error(`Model call failed: ${errorMessageOf(error)}`);
      throw error;
    }
  }

  private async act(ctx: RunContext): Promise<void> {
    const invocations = ctx.pending;
    ctx.pending = [];

    if (ctx.signal?.aborted) {
      // Answer every requested call so the transcript stays consistent
      for (const invocation of invocations) {
        this.record(ctx, invocation, cancelledObservation(invocation));
      }
      throw new RunCancelledError();
    }

    if (this.parallelDispatch) {
      for (const invocation of invocations) {
        await this.events.emitToolStart(ctx.runId, ctx.rounds, invocation.name);
      }
      const observations = await ctx.dispatcher.dispatchAll(invocations, { parallel: true });
      for (const [index, invocation] of invocations.entries()) {
        this.record(ctx, invocation, observations[index]);
        await this.events.emitToolResult(ctx.runId, ctx.rounds, invocation.name, observations[index].errorKind);
      }
      return;
    }

    for (const invocation of invocations) {
      await this.events.emitToolStart(ctx.runId, ctx.rounds, invocation.name);
      const observation = await ctx.dispatcher.dispatch(invocation);
      this.record(ctx, invocation, observation);
      await this.events.emitToolResult(ctx.runId, ctx.rounds, invocation.name, observation.errorKind);
    }
  }

  private record(ctx: RunContext, invocation: Invocation, observation: Observation): void {
    this.conversation.appendToolResult(observation.toolName, observation.content, observation.toolCallId);
    ctx.toolCalls.push({ round: ctx.rounds, invocation, observation });
  }

  private result(outcome: AgentRunResult['outcome'], response: string, ctx: RunContext): AgentRunResult {
    return {
      outcome,
      response,
      rounds: ctx.rounds,
      toolCalls: ctx.toolCalls,
      usage: { ...ctx.usage },
    };
  }
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new RunCancelledError();
}
