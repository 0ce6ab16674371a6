/**
 * LangChainAgentEngine - agent engine on LangChain chat models
 *
 * Each handle keeps its own message history, so turns submitted to the
 * same handle continue one conversation. A turn streams the model, runs
 * any tool calls it makes, and feeds the results back until the model
 * answers without calling tools or the model-call budget is spent. A turn
 * that fails or is cancelled leaves no trace in the history.
 */

import type { BaseChatModel, BaseChatModelCallOptions } from "@langchain/core/language_models/chat_models";
import type { BaseLanguageModelInput } from "@langchain/core/language_models/base";
import {
  AIMessage,
  AIMessageChunk,
  HumanMessage,
  SystemMessage,
  ToolMessage,
  type BaseMessage,
  type MessageContent,
} from "@langchain/core/messages";
import type { Runnable } from "@langchain/core/runnables";
import type { StructuredToolInterface } from "@langchain/core/tools";
import { LLMRouter, getContextLogger } from "@ticketflow/core";
import type { EngineEvent } from "../schemas/index.js";
import { EngineRuntimeError, EngineStartError, OrchestratorError, errorMessage, toCancelledError } from "../errors.js";
import { throwIfCancelled } from "../utils/index.js";
import type { AgentEngine, EngineHandle, EngineStartOptions, SubmitOptions } from "./types.js";

type ChatRunnable = Runnable<BaseLanguageModelInput, AIMessageChunk, BaseChatModelCallOptions>;

/**
 * Builds the tools for one handle, e.g. file tools rooted at `options.workDir`
 */
export type ToolFactory = (options: EngineStartOptions) => StructuredToolInterface[];

export interface LangChainEngineOptions {
  /** Model factory; a default LLMRouter is built from the environment when omitted */
  router?: LLMRouter;

  /** Fixed model, takes precedence over `router` */
  model?: BaseChatModel;

  /** Tools bound to the model, or a factory called per handle; the model must support tool calling */
  tools?: StructuredToolInterface[] | ToolFactory;

  /** @default 100 */
  maxTurns?: number;
}

export const DEFAULT_MAX_TURNS = 100;

/**
 * Flatten message content to plain text, skipping non-text parts
 */
export function textOf(content: MessageContent): string {
  if (typeof content === "string") {
    return content;
  }
  return content
    .map((part) => ("text" in part && typeof part.text === "string" ? part.text : ""))
    .join("");
}

function stringifyToolOutput(output: unknown): string {
  if (typeof output === "string") {
    return output;
  }
  if (output instanceof ToolMessage) {
    return textOf(output.content);
  }
  return JSON.stringify(output) ?? "";
}

export class LangChainEngineHandle implements EngineHandle {
  private readonly messages: BaseMessage[] = [];
  private readonly toolsByName: Map<string, StructuredToolInterface>;
  private closed = false;

  constructor(
    private readonly runnable: ChatRunnable,
    tools: StructuredToolInterface[],
    private readonly maxTurns: number,
    instructions?: string
  ) {
    this.toolsByName = new Map(tools.map((tool) => [tool.name, tool]));
    if (instructions) {
      this.messages.push(new SystemMessage(instructions));
    }
  }

  async *submit(prompt: string, options: SubmitOptions = {}): AsyncIterable<EngineEvent> {
    if (this.closed) {
      throw new EngineRuntimeError("Engine handle is closed");
    }

    const { signal } = options;
    const logger = getContextLogger();
    const turnStart = this.messages.length;
    let finished = false;
    this.messages.push(new HumanMessage(prompt));

    try {
      for await (const event of this.runTurn(signal)) {
        if (event.type === "final-result") {
          finished = true;
        }
        yield event;
      }
    } finally {
      // A tool call without its result would be rejected on the next turn
      if (!finished) {
        this.messages.splice(turnStart);
        logger.debug({ kept: this.messages.length }, "Turn rolled back");
      }
    }
  }

  private async *runTurn(signal: AbortSignal | undefined): AsyncGenerator<EngineEvent> {
    let answer = "";
    for (let call = 1; call <= this.maxTurns; call++) {
      throwIfCancelled(signal);

      let aggregate: AIMessageChunk | undefined;
      try {
        const stream = await this.runnable.stream(this.messages, { signal });
        for await (const chunk of stream) {
          const text = textOf(chunk.content);
          if (text) {
            yield { type: "text-chunk", content: text };
          }
          aggregate = aggregate ? aggregate.concat(chunk) : chunk;
        }
      } catch (error) {
        throw this.toTurnError(error, signal);
      }

      const reply: BaseMessage = aggregate ?? new AIMessage("");
      this.messages.push(reply);
      answer = textOf(reply.content);

      const toolCalls = aggregate?.tool_calls ?? [];
      if (toolCalls.length === 0 || this.toolsByName.size === 0) {
        yield { type: "final-result", content: answer };
        return;
      }

      for (const toolCall of toolCalls) {
        throwIfCancelled(signal);
        yield { type: "tool-invocation", name: toolCall.name, input: toolCall.args };

        const content = await this.invokeTool(toolCall.name, toolCall.args, signal);
        this.messages.push(new ToolMessage({ content, tool_call_id: toolCall.id ?? toolCall.name }));
        yield { type: "tool-result", content };
      }
    }

    getContextLogger().warn({ maxTurns: this.maxTurns }, "Model call budget exhausted before a final answer");
    yield { type: "final-result", content: answer };
  }

  private async invokeTool(name: string, args: Record<string, unknown>, signal: AbortSignal | undefined): Promise<string> {
    const tool = this.toolsByName.get(name);
    if (!tool) {
      return `Tool not found: ${name}`;
    }

    try {
      const output: unknown = await tool.invoke(args, { signal });
      return stringifyToolOutput(output);
    } catch (error) {
      throw this.toTurnError(error, signal);
    }
  }

  private toTurnError(error: unknown, signal: AbortSignal | undefined): Error {
    if (signal?.aborted) {
      return toCancelledError(signal.reason);
    }
    if (error instanceof OrchestratorError) {
      return error;
    }
    return new EngineRuntimeError(errorMessage(error), { cause: error });
  }

  async close(): Promise<void> {
    this.closed = true;
    this.messages.length = 0;
  }

  /** Conversation so far, oldest first */
  get history(): readonly BaseMessage[] {
    return [...this.messages];
  }

  get isClosed(): boolean {
    return this.closed;
  }
}

export class LangChainAgentEngine implements AgentEngine {
  private readonly maxTurns: number;

  constructor(private readonly options: LangChainEngineOptions = {}) {
    this.maxTurns = options.maxTurns ?? DEFAULT_MAX_TURNS;
  }

  async start(options: EngineStartOptions): Promise<LangChainEngineHandle> {
    const { tools = [] } = this.options;
    const handleTools = typeof tools === "function" ? tools(options) : tools;
    const model = this.options.model ?? (this.options.router ?? new LLMRouter()).getModel();
    const runnable = this.bind(model, handleTools);

    getContextLogger().debug(
      { owner: options.owner, tools: handleTools.map((tool) => tool.name), workDir: options.workDir },
      "Engine handle started"
    );
    return new LangChainEngineHandle(runnable, handleTools, options.maxTurns ?? this.maxTurns, options.instructions);
  }

  private bind(model: BaseChatModel, tools: StructuredToolInterface[]): ChatRunnable {
    if (tools.length === 0) {
      return model;
    }
    if (!model.bindTools) {
      throw new EngineStartError(`Model ${model.getName()} does not support tool calling`);
    }
    return model.bindTools(tools);
  }
}
