import { z } from "zod";

import { LimitSchema, QuerySchema } from "@interfaces/http/search/schema";

/**
 * JSON-RPC 2.0 envelope and method parameter schemas.
 */
export const JsonRpcIdSchema = z.union([z.string(), z.number(), z.null()]);

export const JsonRpcRequestSchema = z.object({
  jsonrpc: z.literal("2.0"),
  method: z.string().min(1),
  params: z.union([z.record(z.unknown()), z.array(z.unknown())]).optional(),
  id: JsonRpcIdSchema.optional(),
});

export type JsonRpcId = z.infer<typeof JsonRpcIdSchema>;
export type JsonRpcRequest = z.infer<typeof JsonRpcRequestSchema>;

export const SearchParamsSchema = z.preprocess(
  (params) =>
    Array.isArray(params) ? { query: params[0], limit: params[1] } : params,
  z.object({
    query: QuerySchema,
    limit: LimitSchema,
  })
);

export const ToolCallParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).default({}),
});

export const JSON_RPC_ERRORS = {
  parseError: -32700,
  invalidRequest: -32600,
  methodNotFound: -32601,
  invalidParams: -32602,
  internalError: -32603,
  searchUnavailable: -32000,
} as const;

export interface JsonRpcErrorBody {
  code: number;
  message: string;
  data?: unknown;
}

export type JsonRpcResponse =
  | { jsonrpc: "2.0"; result: unknown; id: JsonRpcId }
  | { jsonrpc: "2.0"; error: JsonRpcErrorBody; id: JsonRpcId };

export const SEARCH_TOOL = {
  name: "search_legal_forms",
  description: "Search California legal forms using semantic similarity",
  inputSchema: {
    type: "object",
    properties: {
      query: {
        type: "string",
        description: "Search query for legal forms",
      },
      limit: {
        type: "integer",
        description: "Maximum number of results to return",
        default: 5,
      },
    },
    required: ["query"],
  },
} as const;
