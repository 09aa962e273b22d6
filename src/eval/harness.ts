import type { AgentRegistry } from "../agents/registry.js";
import type { ExecutionEngine } from "../engine/executor.js";
import type { StructuredLogger } from "../logger.js";

export interface EvaluationCase {
  readonly input: string;
  readonly expectedOutput: string;
}

export interface EvaluationCaseResult {
  index: number;
  input: string;
  expected: string;
  actual: string;
  pass: boolean;
  duration_ms: number;
  error?: string;
}

export interface EvaluationReport {
  agent_name: string;
  total: number;
  passed: number;
  failed: number;
  pass_rate: number;
  cases: EvaluationCaseResult[];
}

/** Case-insensitive substring match between the expected and actual outputs. */
export function matchesExpected(expected: string, actual: string): boolean {
  return actual.toLowerCase().includes(expected.toLowerCase());
}

/**
 * Runs a batch of test cases against an agent. Each case gets a fresh
 * ephemeral session; a failing run counts as a failed case and never aborts
 * the batch.
 */
export class EvaluationHarness {
  constructor(
    private readonly registry: AgentRegistry,
    private readonly engine: ExecutionEngine,
    private readonly logger: StructuredLogger,
  ) {}

  async evaluate(agentName: string, cases: readonly EvaluationCase[]): Promise<EvaluationReport> {
    this.registry.require(agentName);

    const results: EvaluationCaseResult[] = [];
    for (const [index, testCase] of cases.entries()) {
      const startedAt = Date.now();
      try {
        const { reply } = await this.engine.run(agentName, testCase.input, { ephemeral: true, userId: "evaluator" });
        results.push({
          index,
          input: testCase.input,
          expected: testCase.expectedOutput,
          actual: reply,
          pass: matchesExpected(testCase.expectedOutput, reply),
          duration_ms: Date.now() - startedAt,
        });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn("evaluation_case_failed", { agent_name: agentName, index, message });
        results.push({
          index,
          input: testCase.input,
          expected: testCase.expectedOutput,
          actual: `Error: ${message}`,
          pass: false,
          duration_ms: Date.now() - startedAt,
          error: message,
        });
      }
    }

    const passed = results.filter((result) => result.pass).length;
    const report: EvaluationReport = {
      agent_name: agentName,
      total: results.length,
      passed,
      failed: results.length - passed,
      pass_rate: results.length === 0 ? 0 : passed / results.length,
      cases: results,
    };
    this.logger.info("evaluation_completed", {
      agent_name: agentName,
      total: report.total,
      passed: report.passed,
      pass_rate: report.pass_rate,
    });
    return report;
  }
}
