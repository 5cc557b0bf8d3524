import type { z } from 'zod';

export interface ToolContext {
  /** Delivery channel of the conversation invoking the tool. */
  channel?: string;
  chatId?: string;
}

export interface AgentTool<TParams extends z.ZodTypeAny = z.ZodTypeAny> {
  name: string;
  description: string;
  parameters: TParams;
  execute: (params: z.infer<TParams>, context: ToolContext) => Promise<string>;
}

/** Validates raw model-provided arguments against the tool schema before running it. */
export async function invokeTool<TParams extends z.ZodTypeAny>(
  tool: AgentTool<TParams>,
  rawParams: unknown,
  context: ToolContext = {},
): Promise<string> {
  const parsed = tool.parameters.safeParse(rawParams);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'params'}: ${issue.message}`)
      .join('; ');
    return `Error: invalid parameters for ${tool.name}: ${issues}`;
  }
  return tool.execute(parsed.data, context);
}
