import type { Message, Role, ToolCall } from "./types.js";

/**
 * Ordered dialogue for one session.
 *
 * Append-only apart from clear(). Tool results must answer a pending call
 * of the assistant message right before them, and every call must be
 * answered before the next assistant turn.
 */
export class ConversationState {
  private messages: Message[] = [];
  private pending = new Set<string>();

  constructor(systemPrompt?: string) {
    if (systemPrompt !== undefined) {
      this.addSystemMessage(systemPrompt);
    }
  }

  /** Insert a system message at the front of the history */
  addSystemMessage(content: string): void {
    this.messages.unshift({ role: "system", content });
  }

  appendUser(content: string): void {
    this.assertNoPendingCalls("user");
    this.messages.push({ role: "user", content });
  }

  appendAssistant(content: string | null, toolCalls: ToolCall[] = []): void {
    this.assertNoPendingCalls("assistant");
    const message: Message = { role: "assistant", content };
    if (toolCalls.length > 0) {
      const ids = new Set(toolCalls.map((tc) => tc.id));
      if (ids.size !== toolCalls.length) {
        throw new Error("Duplicate tool call ids in one assistant turn");
      }
      message.tool_calls = toolCalls.map((tc) => ({ ...tc }));
      this.pending = ids;
    }
    this.messages.push(message);
  }

  appendToolResult(toolCallId: string, name: string, content: string): void {
    if (!this.pending.has(toolCallId)) {
      throw new Error(`Tool result "${toolCallId}" does not answer a pending tool call`);
    }
    this.pending.delete(toolCallId);
    this.messages.push({ role: "tool", tool_call_id: toolCallId, name, content });
  }

  /** Ids of tool calls from the last assistant turn still awaiting a result */
  pendingToolCalls(): string[] {
    return [...this.pending];
  }

  clear(): void {
    this.messages = [];
    this.pending.clear();
  }

  /** Read-only copy of the history */
  getMessages(): Message[] {
    return this.messages.map((m) =>
      m.tool_calls ? { ...m, tool_calls: m.tool_calls.map((tc) => ({ ...tc })) } : { ...m },
    );
  }

  roles(): Role[] {
    return this.messages.map((m) => m.role);
  }

  get length(): number {
    return this.messages.length;
  }

  private assertNoPendingCalls(next: Role): void {
    if (this.pending.size > 0) {
      throw new Error(
        `Cannot append a ${next} message while tool calls are unanswered: ${[...this.pending].join(", ")}`,
      );
    }
  }
}
