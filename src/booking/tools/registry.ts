import type { z } from "zod";
import type { BookingContext } from "@/booking";
import { BookingError, parseInput, type BookingErrorCode } from "@/booking/store/errors";
import { createChildLogger } from "@/booking/logger";

const log = createChildLogger("tools");

export interface ToolOutput {
  message: string;
  data: unknown;
}

export type ToolResult =
  | { success: true; message: string; data: unknown }
  | { success: false; error: string; code: BookingErrorCode | "INTERNAL" };

export interface ToolDefinition<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  schema: S;
  handler: (ctx: BookingContext, args: z.output<S>) => ToolOutput;
}

/** A tool with its argument type erased; arguments are validated on every call. */
export interface BookingTool {
  name: string;
  description: string;
  schema: z.ZodTypeAny;
  run: (ctx: BookingContext, rawArgs: unknown) => ToolOutput;
}

export function defineTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): BookingTool {
  return {
    name: definition.name,
    description: definition.description,
    schema: definition.schema,
    run: (ctx, rawArgs) => definition.handler(ctx, parseInput(definition.schema, rawArgs ?? {})),
  };
}

export class ToolRegistry {
  private tools = new Map<string, BookingTool>();

  constructor(tools: BookingTool[] = []) {
    for (const tool of tools) this.register(tool);
  }

  register(tool: BookingTool): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool already registered: ${tool.name}`);
    }
    this.tools.set(tool.name, tool);
  }

  list(): Array<{ name: string; description: string }> {
    return [...this.tools.values()].map(({ name, description }) => ({ name, description }));
  }

  /** Run a tool by name. Failures come back as `{ success: false }`, never as exceptions. */
  invoke(ctx: BookingContext, name: string, rawArgs: unknown): ToolResult {
    const tool = this.tools.get(name);
    if (!tool) {
      return { success: false, error: `Unknown tool: ${name}`, code: "NOT_FOUND" };
    }

    try {
      const output = tool.run(ctx, rawArgs);
      return { success: true, message: output.message, data: output.data };
    } catch (error) {
      if (error instanceof BookingError) {
        log.warn("Tool call rejected", { tool: name, code: error.code, error: error.message });
        return { success: false, error: error.message, code: error.code };
      }
      const message = error instanceof Error ? error.message : String(error);
      log.error("Tool call failed", { tool: name, error: message });
      return { success: false, error: message, code: "INTERNAL" };
    }
  }
}
