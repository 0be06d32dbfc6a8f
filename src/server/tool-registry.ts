import type { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import type { ToolResult } from "../domain/analysis/tools.js";
import type { ServerContext } from "./context.js";

export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError: boolean;
}

export type ToolInputSchema = ReturnType<typeof zodToJsonSchema>;

/**
 * An analysis tool as written in analysis-tools.ts: the zod schema is both
 * the advertised input schema and the parser for incoming arguments.
 */
export interface AnalysisTool<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  args: S;
  handler: (args: z.output<S>, ctx: ServerContext) => Promise<ToolResult<unknown>>;
}

/** A tool with its schema compiled and its argument parsing bound. */
export interface RegisteredTool {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  call: (args: unknown, ctx: ServerContext) => Promise<ToolResponse>;
}

export function formatToolResponse(result: ToolResult<unknown>): ToolResponse {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
    isError: !result.success,
  };
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export function defineTool<S extends z.ZodTypeAny>(tool: AnalysisTool<S>): RegisteredTool {
  return {
    name: tool.name,
    description: tool.description,
    inputSchema: zodToJsonSchema(tool.args, { $refStrategy: "none" }),
    call: async (args, ctx) => {
      const parsed = tool.args.safeParse(args ?? {});
      if (!parsed.success) {
        return formatToolResponse({
          success: false,
          error: `Invalid arguments for ${tool.name}: ${describeIssues(parsed.error)}`,
        });
      }
      return formatToolResponse(await tool.handler(parsed.data, ctx));
    },
  };
}

/**
 * Name-keyed dispatch over the registered analysis tools.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  register(tools: RegisteredTool[]): void {
    for (const tool of tools) {
      if (this.tools.has(tool.name)) {
        throw new Error(`Duplicate tool name: ${tool.name}`);
      }
      this.tools.set(tool.name, tool);
    }
  }

  listTools(): Array<Omit<RegisteredTool, "call">> {
    return [...this.tools.values()].map(({ name, description, inputSchema }) => ({
      name,
      description,
      inputSchema,
    }));
  }

  async callTool(name: string, args: unknown, ctx: ServerContext): Promise<ToolResponse> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new Error(`Unknown tool: ${name}`);
    }
    return tool.call(args, ctx);
  }
}
