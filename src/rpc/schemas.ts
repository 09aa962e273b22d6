import { z } from "zod";

/** Agent names double as model-facing tool names, hence the identifier shape. */
export const AgentNameSchema = z
  .string()
  .trim()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z_][A-Za-z0-9_-]*$/, "must start with a letter or underscore and contain only letters, digits, '_' or '-'");

const SessionIdSchema = z.string().trim().min(1).max(200);

const NonEmptyText = z.string().min(1);

export const CreateAgentInputSchema = z
  .object({
    name: AgentNameSchema,
    instruction: NonEmptyText,
    description: z.string().max(2_000).optional(),
    model: z.string().trim().min(1).optional(),
    tools: z.array(z.string().trim().min(1)).max(64).default([]),
    overwrite: z.boolean().default(false),
  })
  .strict();
export type CreateAgentInput = z.infer<typeof CreateAgentInputSchema>;

export const EmptyInputSchema = z.object({}).strict();

export const AgentNameInputSchema = z.object({ agent_name: AgentNameSchema }).strict();

export const RunAgentInputSchema = z
  .object({
    agent_name: AgentNameSchema,
    message: NonEmptyText,
    session_id: SessionIdSchema.optional(),
    user_id: z.string().trim().min(1).max(200).optional(),
  })
  .strict();
export type RunAgentInput = z.infer<typeof RunAgentInputSchema>;

export const CreateMultiAgentSystemInputSchema = z
  .object({
    coordinator_name: AgentNameSchema,
    coordinator_instruction: NonEmptyText,
    sub_agents: z.array(AgentNameSchema).min(1).max(32),
    model: z.string().trim().min(1).optional(),
    description: z.string().max(2_000).optional(),
    overwrite: z.boolean().default(false),
  })
  .strict();
export type CreateMultiAgentSystemInput = z.infer<typeof CreateMultiAgentSystemInputSchema>;

export const AddMcpToolsInputSchema = z
  .object({
    agent_name: AgentNameSchema,
    mcp_server_command: z.string().trim().min(1),
    mcp_server_args: z.array(z.string()).max(64),
    tool_filter: z.array(z.string().trim().min(1)).max(128).optional(),
  })
  .strict();
export type AddMcpToolsInput = z.infer<typeof AddMcpToolsInputSchema>;

export const EvaluateAgentInputSchema = z
  .object({
    agent_name: AgentNameSchema,
    test_cases: z
      .array(z.object({ input: NonEmptyText, expected_output: z.string() }).strict())
      .max(200),
  })
  .strict();
export type EvaluateAgentInput = z.infer<typeof EvaluateAgentInputSchema>;

export const SearchWebInputSchema = z
  .object({
    query: NonEmptyText,
    num_results: z.number().int().min(1).max(20).default(5),
  })
  .strict();

export const LoadWebpageInputSchema = z.object({ url: z.string().url() }).strict();

export const DocumentationInputSchema = z.object({ topic: z.string().trim().min(1) }).strict();

export const SessionIdInputSchema = z.object({ session_id: SessionIdSchema }).strict();

export const ListProxiesInputSchema = z.object({ agent_name: AgentNameSchema.optional() }).strict();

export const ProxyIdInputSchema = z.object({ proxy_id: z.string().trim().min(1) }).strict();
