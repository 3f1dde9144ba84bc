import OpenAI, { AzureOpenAI } from "openai";
import type {
  ChatCompletionMessageParam,
  ChatCompletionMessageToolCall,
  ChatCompletionTool,
} from "openai/resources/chat/completions";
import type {
  FunctionTool,
  LLMCallOptions,
  LLMProvider,
  LLMResponse,
  Message,
} from "../types.js";

export interface OpenAIProviderOptions {
  apiKey?: string;
  baseURL?: string;
  /** Azure OpenAI resource endpoint; switches to the Azure client when set */
  azureEndpoint?: string;
  azureApiVersion?: string;
  /** Model name, or the deployment name on Azure */
  model: string;
  maxTokens?: number;
}

/**
 * OpenAI-compatible LLM provider.
 * Works with OpenAI, Azure OpenAI and any compatible endpoint. The model
 * decides on its own whether to call a tool (tool_choice "auto").
 */
export class OpenAIProvider implements LLMProvider {
  private client: OpenAI;
  private model: string;
  private maxTokens: number;

  constructor(options: OpenAIProviderOptions) {
    const apiKey = options.apiKey ?? process.env.OPENAI_API_KEY;
    this.client = options.azureEndpoint
      ? new AzureOpenAI({
          apiKey,
          endpoint: options.azureEndpoint,
          apiVersion: options.azureApiVersion,
        })
      : new OpenAI({
          apiKey,
          baseURL: options.baseURL ?? process.env.OPENAI_BASE_URL,
        });
    this.model = options.model;
    this.maxTokens = options.maxTokens ?? 4096;
  }

  async chat(
    messages: Message[],
    tools: FunctionTool[],
    options: LLMCallOptions = {},
  ): Promise<LLMResponse> {
    const openaiTools = toChatTools(tools);

    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: toChatMessages(messages),
        tools: openaiTools,
        tool_choice: openaiTools ? "auto" : undefined,
        max_tokens: this.maxTokens,
      },
      { signal: options.signal },
    );

    const choice = response.choices[0];
    if (!choice) {
      throw new Error("Model response contained no choices");
    }

    const toolCalls = (choice.message.tool_calls ?? []).map((tc) => ({
      id: tc.id,
      name: tc.function.name,
      arguments: tc.function.arguments,
    }));

    const finishReason =
      choice.finish_reason === "tool_calls"
        ? "tool_calls"
        : choice.finish_reason === "length"
          ? "length"
          : choice.finish_reason === "content_filter"
            ? "content_filter"
            : "stop";

    return {
      content: choice.message.content,
      toolCalls,
      finishReason,
    };
  }
}

export function toChatMessages(messages: Message[]): ChatCompletionMessageParam[] {
  return messages.map((m): ChatCompletionMessageParam => {
    switch (m.role) {
      case "system":
        return { role: "system", content: m.content ?? "" };
      case "user":
        return { role: "user", content: m.content ?? "" };
      case "tool":
        if (m.tool_call_id === undefined) {
          throw new Error("Tool message is missing its tool_call_id");
        }
        return { role: "tool", content: m.content ?? "", tool_call_id: m.tool_call_id };
      case "assistant":
        if (m.tool_calls && m.tool_calls.length > 0) {
          return {
            role: "assistant",
            content: m.content,
            tool_calls: m.tool_calls.map((tc): ChatCompletionMessageToolCall => ({
              id: tc.id,
              type: "function",
              function: { name: tc.name, arguments: tc.arguments },
            })),
          };
        }
        return { role: "assistant", content: m.content ?? "" };
    }
  });
}

export function toChatTools(tools: FunctionTool[]): ChatCompletionTool[] | undefined {
  if (tools.length === 0) return undefined;
  return tools.map((t): ChatCompletionTool => ({
    type: "function",
    function: {
      name: t.function.name,
      description: t.function.description,
      parameters: t.function.parameters,
    },
  }));
}
