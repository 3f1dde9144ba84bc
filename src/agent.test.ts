import { describe, it, expect, vi } from "vitest";
import {
  Agent,
  CANCELLED_TOOL_RESULT,
  ITERATION_LIMIT_MESSAGE,
  NO_PROGRESS_MESSAGE,
  computeIterationBudget,
} from "./agent.js";
import { ConversationState } from "./conversation.js";
import { ResultCache } from "./results/cache.js";
import { ToolRegistry, defineTool } from "./tools/registry.js";
import { EXPORT_TOOL_NAME } from "./tools/export.js";
import { MockLLMProvider, textReply, toolReply } from "./llm/mock-provider.js";
import { ChatAbortedError, ModelCallError } from "./errors.js";
import { makeNoopLogger } from "./logger.js";
import type { LoopState, TabularResult, ToolArguments } from "./types.js";

function customerRows(n: number): TabularResult {
  return {
    columns: ["CustomerID", "Name"],
    rows: Array.from({ length: n }, (_, i) => [i + 1, `Customer ${i + 1}`]),
  };
}

/** Four tools: a query, a lookup with a required parameter, the export tool and one that always fails */
function makeSetup(searchRows = 12) {
  const exported: unknown[][] = [];
  const search = vi.fn(async () => customerRows(searchRows));
  const profile = vi.fn(async (args: ToolArguments) => ({
    CustomerID: args.CustomerID,
    Balance: 10,
  }));
  const exportData = vi.fn(async (args: ToolArguments) => {
    const data = Array.isArray(args.data) ? args.data : [];
    exported.push(data);
    return { success: true, rows_exported: data.length };
  });

  const registry = new ToolRegistry();
  registry.register(
    defineTool(
      {
        name: "SearchCustomers",
        description: "Search customers",
        parameters: [{ name: "CustomerName", type: "string", description: "Name filter" }],
      },
      search,
    ),
  );
  registry.register(
    defineTool(
      {
        name: "CustomerProfile",
        description: "Customer profile",
        parameters: [
          { name: "CustomerID", type: "integer", description: "Customer", required: true },
        ],
      },
      profile,
    ),
  );
  registry.register(
    defineTool(
      {
        name: EXPORT_TOOL_NAME,
        description: "Export rows",
        parameters: [
          {
            name: "data",
            type: "array",
            description: "Rows",
            items: { type: "object" },
            required: true,
          },
        ],
      },
      exportData,
    ),
  );
  registry.register(
    defineTool({ name: "Flaky", description: "Always fails", parameters: [] }, async () => {
      throw new Error("database unavailable");
    }),
  );

  const cache = new ResultCache();
  const conversation = new ConversationState();
  return { registry, cache, conversation, search, profile, exportData, exported };
}

function makeAgent(llm: MockLLMProvider, setup = makeSetup()) {
  const states: LoopState[] = [];
  const agent = new Agent({
    llm,
    registry: setup.registry,
    cache: setup.cache,
    conversation: setup.conversation,
    logger: makeNoopLogger(),
    onStateChange: (s) => states.push(s),
  });
  return { agent, states, ...setup };
}

describe("computeIterationBudget", () => {
  it("gives one round per four tools within [5, 10]", () => {
    expect(computeIterationBudget(0)).toBe(5);
    expect(computeIterationBudget(4)).toBe(5);
    expect(computeIterationBudget(23)).toBe(5);
    expect(computeIterationBudget(24)).toBe(6);
    expect(computeIterationBudget(40)).toBe(10);
    expect(computeIterationBudget(500)).toBe(10);
  });

  it("stays within bounds for any positive tool count", () => {
    for (let n = 1; n <= 200; n++) {
      const budget = computeIterationBudget(n);
      expect(budget).toBeGreaterThanOrEqual(5);
      expect(budget).toBeLessThanOrEqual(10);
    }
  });
});

describe("Agent: tool-calling loop", () => {
  it("answers directly when the model requests no tools", async () => {
    const llm = new MockLLMProvider([textReply("I'm doing well, thanks!")]);
    const { agent, states, conversation } = makeAgent(llm);

    const result = await agent.run("Hello, how are you?");

    expect(result).toMatchObject({
      response: "I'm doing well, thanks!",
      state: "done",
      iterations: 1,
      budget: 5,
    });
    expect(conversation.roles()).toEqual(["user", "assistant"]);
    expect(states).toEqual(["await_model", "model_final", "done"]);
    expect(agent.getState()).toBe("done");
    expect(llm.calls).toHaveLength(1);
  });

  it("stores an empty answer when the model returns no content", async () => {
    const llm = new MockLLMProvider([{ content: null, toolCalls: [], finishReason: "stop" }]);
    const { agent } = makeAgent(llm);

    const result = await agent.run("anything");
    expect(result.response).toBe("");
    expect(result.messages[1]).toEqual({ role: "assistant", content: "" });
  });

  it("executes tool calls and loops back for the final answer", async () => {
    const llm = new MockLLMProvider([
      toolReply([{ id: "call_1", name: "CustomerProfile", args: { CustomerID: 7 } }], "Looking it up."),
      textReply("Customer 7 owes 10."),
    ]);
    const { agent, states } = makeAgent(llm);

    const result = await agent.run("What does customer 7 owe?");

    expect(result.response).toBe("Customer 7 owes 10.");
    expect(result.iterations).toBe(2);
    expect(states).toEqual([
      "await_model",
      "model_requests_tools",
      "executing",
      "await_model",
      "model_final",
      "done",
    ]);

    const history = result.messages;
    expect(history[0]).toEqual({ role: "user", content: "What does customer 7 owe?" });
    expect(history[1].role).toBe("assistant");
    expect(history[1].content).toBe("Looking it up.");
    expect(history[1].tool_calls).toHaveLength(1);
    expect(history[2]).toEqual({
      role: "tool",
      tool_call_id: "call_1",
      name: "CustomerProfile",
      content: JSON.stringify({ CustomerID: 7, Balance: 10 }, null, 2),
    });
    expect(history[3]).toEqual({ role: "assistant", content: "Customer 7 owes 10." });
  });

  it("passes the full history and every tool schema to the model", async () => {
    const llm = new MockLLMProvider([
      toolReply([{ id: "c1", name: "SearchCustomers" }]),
      textReply("done"),
    ]);
    const { agent } = makeAgent(llm);

    await agent.run("list customers");

    expect(llm.calls[0].tools.map((t) => t.function.name)).toEqual([
      "SearchCustomers",
      "CustomerProfile",
      EXPORT_TOOL_NAME,
      "Flaky",
    ]);
    expect(llm.calls[1].messages.map((m) => m.role)).toEqual(["user", "assistant", "tool"]);
  });

  it("dispatches calls of one round sequentially in request order", async () => {
    const order: string[] = [];
    const setup = makeSetup();
    setup.registry.register(
      defineTool({ name: "Slow", description: "slow", parameters: [] }, async () => {
        order.push("slow:start");
        await new Promise((r) => setTimeout(r, 20));
        order.push("slow:end");
        return "slow";
      }),
    );
    setup.registry.register(
      defineTool({ name: "Fast", description: "fast", parameters: [] }, async () => {
        order.push("fast");
        return "fast";
      }),
    );
    const llm = new MockLLMProvider([
      toolReply([
        { id: "a", name: "Slow" },
        { id: "b", name: "Fast" },
      ]),
      textReply("ok"),
    ]);
    const { agent } = makeAgent(llm, setup);

    const result = await agent.run("go");

    expect(order).toEqual(["slow:start", "slow:end", "fast"]);
    expect(result.messages.filter((m) => m.role === "tool").map((m) => m.tool_call_id)).toEqual([
      "a",
      "b",
    ]);
  });

  it("reports a missing required parameter without calling the executor", async () => {
    const llm = new MockLLMProvider([
      toolReply([{ id: "c1", name: "CustomerProfile", args: {} }]),
      textReply("Which customer?"),
    ]);
    const { agent, profile } = makeAgent(llm);

    const result = await agent.run("show a profile");

    expect(profile).not.toHaveBeenCalled();
    expect(result.messages[2].content).toBe(
      "Error executing CustomerProfile: Missing required parameter: CustomerID",
    );
    expect(result.response).toBe("Which customer?");
  });

  it("reports unknown tools and bad arguments as tool results", async () => {
    const llm = new MockLLMProvider([
      toolReply([
        { id: "c1", name: "nonexistent_tool" },
        { id: "c2", name: "CustomerProfile", args: "{not json" },
      ]),
      textReply("Sorry."),
    ]);
    const { agent } = makeAgent(llm);

    const result = await agent.run("do something odd");

    const toolMessages = result.messages.filter((m) => m.role === "tool");
    expect(toolMessages.map((m) => m.content)).toEqual([
      "Error executing nonexistent_tool: Tool not found: nonexistent_tool",
      "Error executing CustomerProfile: Tool arguments are not valid JSON",
    ]);
  });

  it("keeps going after a partial failure in a round", async () => {
    const llm = new MockLLMProvider([
      toolReply([
        { id: "c1", name: "Flaky" },
        { id: "c2", name: "CustomerProfile", args: { CustomerID: 1 } },
      ]),
      textReply("Got the profile."),
    ]);
    const onStep = vi.fn();
    const setup = makeSetup();
    const agent = new Agent({
      llm,
      registry: setup.registry,
      logger: makeNoopLogger(),
      onStep,
    });

    const result = await agent.run("profile please");

    expect(result.state).toBe("done");
    expect(result.messages[2].content).toBe("Error executing Flaky: database unavailable");
    expect(onStep).toHaveBeenCalledTimes(1);
    expect(onStep.mock.calls[0][0]).toMatchObject({
      iteration: 1,
      toolResults: [
        { name: "Flaky", ok: false },
        { name: "CustomerProfile", ok: true },
      ],
    });
  });

  it("stops after three rounds without a successful tool call", async () => {
    const failing = toolReply([{ id: "bad", name: "Flaky" }]);
    const llm = new MockLLMProvider(Array.from({ length: 10 }, () => failing));
    const { agent, states, conversation } = makeAgent(llm);

    const result = await agent.run("keep failing");

    expect(result.response).toBe(NO_PROGRESS_MESSAGE);
    expect(result.state).toBe("abort_no_progress");
    expect(result.iterations).toBe(3);
    expect(llm.calls).toHaveLength(3);
    expect(states.at(-1)).toBe("abort_no_progress");
    expect(agent.getState()).toBe("abort_no_progress");
    // user + 3 × (assistant + tool); the fixed message is not stored
    expect(conversation.length).toBe(7);
  });

  it("resets the no-progress count after a successful round", async () => {
    const fail = toolReply([{ id: "bad", name: "Flaky" }]);
    const ok = toolReply([{ id: "good", name: "SearchCustomers" }]);
    const llm = new MockLLMProvider([fail, fail, ok, fail, textReply("finally")]);
    const { agent } = makeAgent(llm);

    const result = await agent.run("mixed");

    expect(result.state).toBe("done");
    expect(result.response).toBe("finally");
    expect(llm.calls).toHaveLength(5);
  });

  it("stops at the iteration budget when the model never finishes", async () => {
    const endless = toolReply([{ id: "loop", name: "SearchCustomers" }], "thinking...");
    const llm = new MockLLMProvider(Array.from({ length: 20 }, () => endless));
    const { agent } = makeAgent(llm);

    const result = await agent.run("loop forever");

    expect(result.state).toBe("abort_iteration_limit");
    expect(result.response).toBe(ITERATION_LIMIT_MESSAGE);
    expect(result.iterations).toBe(5);
    expect(llm.calls).toHaveLength(5);
  });

  it("gives larger tool sets a larger budget", async () => {
    const setup = makeSetup();
    for (let i = 0; i < 20; i++) {
      setup.registry.register(
        defineTool({ name: `Extra${i}`, description: "extra", parameters: [] }, async () => "ok"),
      );
    }
    const endless = toolReply([{ id: "loop", name: "Extra0" }]);
    const llm = new MockLLMProvider(Array.from({ length: 20 }, () => endless));
    const { agent } = makeAgent(llm, setup);

    const result = await agent.run("loop");

    // 24 tools → 6 rounds
    expect(result.budget).toBe(6);
    expect(llm.calls).toHaveLength(6);
  });
});

describe("Agent: result cache and export fallback", () => {
  it("caches the records of a non-export collection result", async () => {
    const llm = new MockLLMProvider([
      toolReply([{ id: "c1", name: "SearchCustomers" }]),
      textReply("Found 12."),
    ]);
    const { agent, cache } = makeAgent(llm);

    await agent.run("find customers");

    expect(cache.size).toBe(12);
    expect(cache.sourceTool).toBe("SearchCustomers");
    expect(cache.get()[0]).toEqual({ CustomerID: 1, Name: "Customer 1" });
  });

  it("does not cache structured results or empty collections", async () => {
    const setup = makeSetup(0);
    const llm = new MockLLMProvider([
      toolReply([
        { id: "c1", name: "SearchCustomers" },
        { id: "c2", name: "CustomerProfile", args: { CustomerID: 1 } },
      ]),
      textReply("nothing"),
    ]);
    const { agent, cache } = makeAgent(llm, setup);

    const result = await agent.run("search");

    expect(cache.size).toBe(0);
    expect(result.messages[2].content).toBe("No results found.");
  });

  it("exports every cached record when the export call carries no data", async () => {
    const llm = new MockLLMProvider([
      toolReply([{ id: "c1", name: "SearchCustomers" }]),
      textReply("Found 12 customers."),
      toolReply([{ id: "c2", name: EXPORT_TOOL_NAME, args: { data: [] } }]),
      textReply("Exported."),
    ]);
    const { agent, exported } = makeAgent(llm);

    await agent.run("find customers");
    const result = await agent.run("export them");

    expect(exported).toHaveLength(1);
    expect(exported[0]).toHaveLength(12);
    expect(exported[0][11]).toEqual({ CustomerID: 12, Name: "Customer 12" });
    const toolMessage = result.messages.filter((m) => m.role === "tool").at(-1);
    expect(toolMessage?.content).toBe(
      JSON.stringify({ success: true, rows_exported: 12 }, null, 2),
    );
  });

  it("replaces truncated export data with the cached records", async () => {
    const truncated = [
      { CustomerID: 1, Name: "Customer 1" },
      { CustomerID: 2, Name: "Customer 2" },
      { CustomerID: 3, Name: "Customer 3" },
    ];
    const llm = new MockLLMProvider([
      toolReply([{ id: "c1", name: "SearchCustomers" }]),
      toolReply([{ id: "c2", name: EXPORT_TOOL_NAME, args: { data: truncated } }]),
      textReply("Exported."),
    ]);
    const { agent, exported } = makeAgent(llm);

    await agent.run("find and export customers");

    expect(exported).toEqual([customerRows(12).rows.map(([id, name]) => ({ CustomerID: id, Name: name }))]);
  });

  it("passes complete export data through unchanged", async () => {
    const own = Array.from({ length: 15 }, (_, i) => ({ Ref: `R${i}` }));
    const llm = new MockLLMProvider([
      toolReply([{ id: "c1", name: "SearchCustomers" }]),
      toolReply([{ id: "c2", name: EXPORT_TOOL_NAME, args: { data: own } }]),
      textReply("Exported."),
    ]);
    const { agent, exported } = makeAgent(llm);

    await agent.run("export my rows");

    expect(exported).toEqual([own]);
  });

  it("leaves export data alone when nothing is cached", async () => {
    const llm = new MockLLMProvider([
      toolReply([{ id: "c1", name: EXPORT_TOOL_NAME, args: { data: [] } }]),
      textReply("Nothing to export."),
    ]);
    const { agent, exported } = makeAgent(llm);

    await agent.run("export");

    expect(exported).toEqual([[]]);
  });

  it("fills in a missing data argument from the cache", async () => {
    const llm = new MockLLMProvider([
      toolReply([{ id: "c1", name: "SearchCustomers" }]),
      toolReply([{ id: "c2", name: EXPORT_TOOL_NAME, args: {} }]),
      textReply("Exported."),
    ]);
    const { agent, exported } = makeAgent(llm);

    await agent.run("search and export");

    expect(exported[0]).toHaveLength(12);
  });

  it("does not let export results replace the cache", async () => {
    const llm = new MockLLMProvider([
      toolReply([{ id: "c1", name: "SearchCustomers" }]),
      toolReply([{ id: "c2", name: EXPORT_TOOL_NAME, args: { data: [] } }]),
      textReply("Exported."),
    ]);
    const { agent, cache } = makeAgent(llm);

    await agent.run("search and export");

    expect(cache.size).toBe(12);
    expect(cache.sourceTool).toBe("SearchCustomers");
  });

  it("keeps the cache across a conversation reset", async () => {
    const llm = new MockLLMProvider([
      toolReply([{ id: "c1", name: "SearchCustomers" }]),
      textReply("Found them."),
      toolReply([{ id: "c2", name: EXPORT_TOOL_NAME, args: { data: [] } }]),
      textReply("Exported."),
    ]);
    const { agent, exported } = makeAgent(llm);

    await agent.run("find customers");
    agent.reset();
    expect(agent.getHistory()).toHaveLength(0);

    await agent.run("export the last results");
    expect(exported[0]).toHaveLength(12);
  });
});

describe("Agent: failures and cancellation", () => {
  it("treats tool calls without ids as a failed model call", async () => {
    const llm = new MockLLMProvider([
      toolReply([
        { id: "", name: "SearchCustomers" },
        { id: "", name: "SearchCustomers" },
      ]),
    ]);
    const { agent, conversation, search } = makeAgent(llm);

    const err = await agent.run("search").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ModelCallError);
    expect(err).toMatchObject({
      code: "MODEL_CALL_FAILED",
      message: "Model call failed: Model response has a tool call without an id",
    });
    expect(conversation.roles()).toEqual(["user"]);
    expect(search).not.toHaveBeenCalled();
  });

  it("treats repeated tool call ids as a failed model call", async () => {
    const llm = new MockLLMProvider([
      toolReply([
        { id: "c1", name: "SearchCustomers" },
        { id: "c1", name: "CustomerProfile", args: { CustomerID: 1 } },
      ]),
    ]);
    const { agent, conversation } = makeAgent(llm);

    await expect(agent.run("search")).rejects.toThrow(
      'Model call failed: Model response repeats tool call id "c1"',
    );
    expect(conversation.pendingToolCalls()).toEqual([]);
    expect(conversation.roles()).toEqual(["user"]);
  });

  it("fails the call when the model fails, appending nothing for that round", async () => {
    const llm = new MockLLMProvider([new Error("401 Unauthorized")]);
    const { agent, conversation } = makeAgent(llm);

    const err = await agent.run("hello").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ModelCallError);
    expect(err).toMatchObject({ message: "Model call failed: 401 Unauthorized" });
    expect(conversation.roles()).toEqual(["user"]);
  });

  it("keeps completed rounds when a later model call fails", async () => {
    const llm = new MockLLMProvider([
      toolReply([{ id: "c1", name: "SearchCustomers" }]),
      new Error("503 Service Unavailable"),
    ]);
    const { agent, conversation } = makeAgent(llm);

    await expect(agent.run("search")).rejects.toThrow(ModelCallError);
    expect(conversation.roles()).toEqual(["user", "assistant", "tool"]);
  });

  it("refuses to start when already cancelled", async () => {
    const llm = new MockLLMProvider([textReply("never")]);
    const { agent, conversation } = makeAgent(llm);
    const controller = new AbortController();
    controller.abort();

    await expect(agent.run("hi", { signal: controller.signal })).rejects.toThrow(ChatAbortedError);
    expect(conversation.length).toBe(0);
    expect(llm.calls).toHaveLength(0);
  });

  it("answers the remaining calls as cancelled when aborted mid-round", async () => {
    const controller = new AbortController();
    const setup = makeSetup();
    setup.registry.register(
      defineTool({ name: "Stopper", description: "aborts", parameters: [] }, async () => {
        controller.abort();
        return "stopped";
      }),
    );
    const llm = new MockLLMProvider([
      toolReply([
        { id: "c1", name: "Stopper" },
        { id: "c2", name: "SearchCustomers" },
      ]),
      textReply("unreachable"),
    ]);
    const { agent, conversation, search } = makeAgent(llm, setup);

    await expect(agent.run("go", { signal: controller.signal })).rejects.toThrow(ChatAbortedError);

    expect(search).not.toHaveBeenCalled();
    expect(llm.calls).toHaveLength(1);
    expect(conversation.pendingToolCalls()).toEqual([]);
    const messages = conversation.getMessages();
    expect(messages.map((m) => m.role)).toEqual(["user", "assistant", "tool", "tool"]);
    expect(messages[3]).toEqual({
      role: "tool",
      tool_call_id: "c2",
      name: "SearchCustomers",
      content: CANCELLED_TOOL_RESULT,
    });
  });

  it("reproduces the same role sequence after a reset", async () => {
    const script = [
      toolReply([{ id: "c1", name: "SearchCustomers" }]),
      textReply("Found them."),
      textReply("You're welcome."),
    ];
    const llm = new MockLLMProvider(script);
    const { agent, conversation } = makeAgent(llm);

    await agent.run("find customers");
    await agent.run("thanks");
    const first = conversation.roles();

    agent.reset();
    llm.reset();
    await agent.run("find customers");
    await agent.run("thanks");

    expect(conversation.roles()).toEqual(first);
  });
});
