import type { ToolCatalogue } from "../mcp/catalogue.js";
import { EvaluateAgentInputSchema } from "../rpc/schemas.js";
import type { ToolContext } from "./context.js";

export function registerEvaluationTools(catalogue: ToolCatalogue, context: ToolContext): void {
  catalogue.register(
    {
      name: "evaluate_adk_agent",
      title: "Evaluate agent",
      description:
        "Run test cases against an agent. A case passes when expected_output appears in the reply (case-insensitive).",
      category: "evaluation",
    },
    EvaluateAgentInputSchema,
    async (input) => {
      const report = await context.harness.evaluate(
        input.agent_name,
        input.test_cases.map((testCase) => ({ input: testCase.input, expectedOutput: testCase.expected_output })),
      );
      return { report };
    },
  );
}
