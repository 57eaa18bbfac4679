import { z, type ZodRawShape } from "zod";
import { formatErrorResponse } from "./error";
import { createLogger } from "./logger";

const logger = createLogger("tools");

export type ToolResult = {
    content: Array<{ type: "text"; text: string }>;
    isError?: boolean;
};

type ToolSpec = {
    name: string;
    description: string;
    inputSchema: ZodRawShape;
    handler: (input: Record<string, unknown>) => Promise<unknown>;
};

export type ToolDefinition = {
    name: string;
    description: string;
    inputSchema: ZodRawShape;
    handler: (input: Record<string, unknown>) => Promise<ToolResult>;
};

const toText = (payload: unknown): string => JSON.stringify(payload, null, 2);

/**
 * Wraps a tool spec so its handler always resolves to an MCP text envelope.
 * Thrown errors become `isError` results carrying the error code and details.
 */
export function defineTool(build: (zod: typeof z) => ToolSpec): ToolDefinition {
    const spec = build(z);
    return {
        name: spec.name,
        description: spec.description,
        inputSchema: spec.inputSchema,
        handler: async (input) => {
            try {
                const payload = await spec.handler(input);
                return { content: [{ type: "text", text: toText(payload) }] };
            } catch (error) {
                const formatted = formatErrorResponse(error);
                if (formatted.code === "INTERNAL_ERROR") {
                    logger.error(`${spec.name} failed`, {
                        error: formatted.message,
                        stack: error instanceof Error ? error.stack : undefined
                    });
                }
                return {
                    isError: true,
                    content: [
                        {
                            type: "text",
                            text: toText({ error: formatted })
                        }
                    ]
                };
            }
        }
    };
}
