import { describe, it, expect } from "vitest";
import { toChatMessages, toChatTools } from "./openai-provider.js";
import type { FunctionTool } from "../types.js";

describe("toChatMessages", () => {
  it("maps a tool round to the chat completions shape", () => {
    const messages = toChatMessages([
      { role: "system", content: "sys" },
      { role: "user", content: "find customers" },
      {
        role: "assistant",
        content: null,
        tool_calls: [{ id: "c1", name: "SearchCustomers", arguments: '{"CustomerName":"stone"}' }],
      },
      { role: "tool", tool_call_id: "c1", name: "SearchCustomers", content: "[]" },
      { role: "assistant", content: "Nothing found." },
    ]);

    expect(messages).toEqual([
      { role: "system", content: "sys" },
      { role: "user", content: "find customers" },
      {
        role: "assistant",
        content: null,
        tool_calls: [
          {
            id: "c1",
            type: "function",
            function: { name: "SearchCustomers", arguments: '{"CustomerName":"stone"}' },
          },
        ],
      },
      { role: "tool", tool_call_id: "c1", content: "[]" },
      { role: "assistant", content: "Nothing found." },
    ]);
  });

  it("rejects a tool message without a call id", () => {
    expect(() => toChatMessages([{ role: "tool", content: "x" }])).toThrow(
      "Tool message is missing its tool_call_id",
    );
  });
});

describe("toChatTools", () => {
  it("returns undefined when there are no tools", () => {
    expect(toChatTools([])).toBeUndefined();
  });

  it("passes function schemas through", () => {
    const tool: FunctionTool = {
      type: "function",
      function: {
        name: "SearchCustomers",
        description: "Search",
        parameters: { type: "object", properties: {}, required: [] },
      },
    };
    expect(toChatTools([tool])).toEqual([tool]);
  });
});
