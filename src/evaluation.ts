import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { Logger } from "pino";
import { ChatService } from "./service.js";
import { SessionTable, type SessionFactory } from "./session/session-table.js";
import { ConfigError, describeError } from "./errors.js";
import type { LLMProvider, TerminalState } from "./types.js";

/**
 * Evaluation runner.
 *
 * Sends each case's question through a fresh session and checks that the
 * expected tools were called and the expected fields appear in the answer
 * (case-insensitive). Extra tools are noted but do not fail a case.
 */

const EvaluationCaseSchema = z.object({
  id: z.string().min(1),
  question: z.string().min(1),
  expectedTools: z.array(z.string()).default([]),
  expectedFields: z.array(z.string()).default([]),
  description: z.string().optional(),
});

const EvaluationSuiteSchema = z
  .object({ cases: z.array(EvaluationCaseSchema) })
  .refine((s) => new Set(s.cases.map((c) => c.id)).size === s.cases.length, {
    message: "case ids must be unique",
  });

export interface EvaluationCase {
  id: string;
  question: string;
  expectedTools?: string[];
  expectedFields?: string[];
  description?: string;
}

export interface CaseResult {
  id: string;
  passed: boolean;
  response: string;
  state?: TerminalState;
  toolsCalled: string[];
  missingTools: string[];
  unexpectedTools: string[];
  missingFields: string[];
  durationMs: number;
  error?: string;
  notes: string;
}

export interface EvaluationSummary {
  total: number;
  passed: number;
  failed: number;
  /** 0..1 */
  passRate: number;
  averageDurationMs: number;
  results: CaseResult[];
}

export interface EvaluatorOptions {
  factory: SessionFactory;
  llm: LLMProvider;
  logger: Logger;
  /** Tenant every case runs under */
  routingKey: string;
  /** Milliseconds; defaults to performance.now */
  clock?: () => number;
}

export class Evaluator {
  private table: SessionTable;
  private service: ChatService;
  private routingKey: string;
  private clock: () => number;
  private logger: Logger;
  private toolsBySession = new Map<string, string[]>();

  constructor(options: EvaluatorOptions) {
    this.routingKey = options.routingKey;
    this.clock = options.clock ?? (() => performance.now());
    this.logger = options.logger.child({ component: "evaluator" });
    this.table = new SessionTable({
      factory: options.factory,
      llm: options.llm,
      logger: options.logger,
      onStep: (sessionKey, step) => {
        const called = this.toolsBySession.get(sessionKey);
        called?.push(...step.toolCalls.map((tc) => tc.name));
      },
    });
    this.service = new ChatService({
      table: this.table,
      factory: options.factory,
      logger: options.logger,
    });
  }

  async run(
    cases: EvaluationCase[],
    onResult?: (result: CaseResult, index: number, total: number) => void,
  ): Promise<EvaluationSummary> {
    const results: CaseResult[] = [];
    for (const [index, testCase] of cases.entries()) {
      const result = await this.evaluate(testCase);
      results.push(result);
      onResult?.(result, index, cases.length);
    }
    return summarize(results);
  }

  /** Run one case in its own session, deleted afterwards */
  async evaluate(testCase: EvaluationCase): Promise<CaseResult> {
    const sessionKey = `eval_${testCase.id}`;
    const toolsCalled: string[] = [];
    this.toolsBySession.set(sessionKey, toolsCalled);
    const start = this.clock();

    try {
      const reply = await this.service.chat({
        message: testCase.question,
        routingKey: this.routingKey,
        sessionKey,
      });
      const durationMs = this.clock() - start;
      return grade(testCase, reply.response, reply.state, toolsCalled, durationMs);
    } catch (err) {
      const durationMs = this.clock() - start;
      const error = describeError(err);
      this.logger.warn({ caseId: testCase.id, err }, "evaluation case failed");
      return {
        id: testCase.id,
        passed: false,
        response: "",
        toolsCalled,
        missingTools: testCase.expectedTools ?? [],
        unexpectedTools: [],
        missingFields: testCase.expectedFields ?? [],
        durationMs,
        error,
        notes: `Exception occurred: ${error}`,
      };
    } finally {
      this.toolsBySession.delete(sessionKey);
      if (this.table.get(sessionKey)) {
        await this.table.delete(sessionKey);
      }
    }
  }
}

function grade(
  testCase: EvaluationCase,
  response: string,
  state: TerminalState,
  toolsCalled: string[],
  durationMs: number,
): CaseResult {
  const expectedTools = testCase.expectedTools ?? [];
  const expectedFields = testCase.expectedFields ?? [];
  const lower = response.toLowerCase();

  const missingTools = expectedTools.filter((t) => !toolsCalled.includes(t));
  const unexpectedTools =
    expectedTools.length > 0 ? unique(toolsCalled.filter((t) => !expectedTools.includes(t))) : [];
  const missingFields = expectedFields.filter((f) => !lower.includes(f.toLowerCase()));

  const notes: string[] = [];
  if (missingTools.length > 0) notes.push(`Missing tools: ${missingTools.join(", ")}`);
  if (unexpectedTools.length > 0) notes.push(`Unexpected tools: ${unexpectedTools.join(", ")}`);
  if (missingFields.length > 0) notes.push(`Missing data: ${missingFields.join(", ")}`);

  return {
    id: testCase.id,
    passed: missingTools.length === 0 && missingFields.length === 0,
    response,
    state,
    toolsCalled,
    missingTools,
    unexpectedTools,
    missingFields,
    durationMs,
    notes: notes.length > 0 ? notes.join("; ") : "All checks passed",
  };
}

export function summarize(results: CaseResult[]): EvaluationSummary {
  const total = results.length;
  const passed = results.filter((r) => r.passed).length;
  const totalMs = results.reduce((sum, r) => sum + r.durationMs, 0);
  return {
    total,
    passed,
    failed: total - passed,
    passRate: total > 0 ? passed / total : 0,
    averageDurationMs: total > 0 ? totalMs / total : 0,
    results,
  };
}

export function formatSummary(summary: EvaluationSummary): string {
  return [
    "EVALUATION SUMMARY",
    `Total: ${summary.total}`,
    `Passed: ${summary.passed}`,
    `Failed: ${summary.failed}`,
    `Pass rate: ${(summary.passRate * 100).toFixed(1)}%`,
    `Average response time: ${(summary.averageDurationMs / 1000).toFixed(2)}s`,
  ].join("\n");
}

export function parseEvaluationSuite(raw: unknown): EvaluationCase[] {
  const parsed = EvaluationSuiteSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid evaluation suite: ${issues}`);
  }
  return parsed.data.cases;
}

export async function loadEvaluationSuite(path: string): Promise<EvaluationCase[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Cannot load evaluation suite ${path}: ${describeError(err)}`);
  }
  return parseEvaluationSuite(raw);
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}
