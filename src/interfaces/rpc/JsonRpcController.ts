/**
 * JSON-RPC 2.0 endpoint exposing form search to tool-calling clients.
 *
 * Methods:
 * - search_legal_forms { query, limit? }  -> search envelope
 * - tools/list                            -> tool descriptors
 * - tools/call { name, arguments }        -> text content listing the forms
 *
 * Notifications (no id) are executed without a reply; batches are answered
 * with an array of the non-notification replies.
 */
import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { z } from "zod";

import type { SearchUseCase } from "@app/search/SearchUseCase";
import { logger } from "@infrastructure/logging/Logger";
import { toSearchResponseDto } from "@interfaces/http/search/dto";
import type { SearchResponseDto } from "@interfaces/http/search/schema";
import { formatIssues } from "@interfaces/http/validation";
import {
  describeError,
  InvalidArgumentError,
  SearchUnavailableError,
} from "@typesLocal/AppError";

import {
  JSON_RPC_ERRORS,
  JsonRpcRequestSchema,
  SEARCH_TOOL,
  SearchParamsSchema,
  ToolCallParamsSchema,
  type JsonRpcErrorBody,
  type JsonRpcId,
  type JsonRpcResponse,
} from "./schema";

export class JsonRpcError extends Error {
  constructor(
    readonly code: number,
    message: string,
    readonly data?: unknown
  ) {
    super(message);
    this.name = "JsonRpcError";
  }
}

function parseParams<S extends z.ZodTypeAny>(schema: S, params: unknown): z.output<S> {
  const parsed = schema.safeParse(params ?? {});

  if (!parsed.success) {
    throw new JsonRpcError(
      JSON_RPC_ERRORS.invalidParams,
      formatIssues(parsed.error.issues),
      { issues: parsed.error.issues }
    );
  }

  return parsed.data;
}

export function errorResponse(
  id: JsonRpcId,
  code: number,
  message: string,
  data?: unknown
): JsonRpcResponse {
  return {
    jsonrpc: "2.0",
    error: { code, message, ...(data !== undefined ? { data } : {}) },
    id,
  };
}

export function toRpcError(error: unknown): JsonRpcErrorBody {
  if (error instanceof JsonRpcError) {
    return {
      code: error.code,
      message: error.message,
      ...(error.data !== undefined ? { data: error.data } : {}),
    };
  }

  if (error instanceof InvalidArgumentError) {
    return { code: JSON_RPC_ERRORS.invalidParams, message: error.message };
  }

  if (error instanceof SearchUnavailableError) {
    return { code: JSON_RPC_ERRORS.searchUnavailable, message: error.message };
  }

  logger.log("error", "JSON-RPC internal error", describeError(error));
  return { code: JSON_RPC_ERRORS.internalError, message: "Internal error" };
}

function requestId(raw: unknown): JsonRpcId {
  if (raw && typeof raw === "object" && "id" in raw) {
    const { id } = raw;
    if (typeof id === "string" || typeof id === "number") {
      return id;
    }
  }

  return null;
}

export function formatSearchText(result: SearchResponseDto): string {
  if (result.total_found === 0) {
    return `No forms found matching your query: '${result.query}'`;
  }

  let text = `Found ${result.total_found} legal forms for query: '${result.query}'\n\n`;

  result.forms.forEach((form, i) => {
    text += `${i + 1}. **${form.code}** - ${form.title}\n`;
    text += `   Topic: ${form.topic}\n`;
    text += `   Similarity: ${form.similarity.toFixed(3)}\n`;
    text += `   URL: ${form.url}\n`;
    if (form.effective_date) {
      text += `   Effective: ${form.effective_date}\n`;
    }
    if (form.languages.length > 0) {
      text += `   Languages: ${form.languages.join(", ")}\n`;
    }
    text += "\n";
  });

  return text;
}

export function createJsonRpcHandler(search: SearchUseCase): RequestHandler {
  async function runSearch(params: unknown): Promise<SearchResponseDto> {
    const { query, limit } = parseParams(SearchParamsSchema, params);
    return toSearchResponseDto(await search.search({ query, limit }));
  }

  async function callTool(params: unknown) {
    const call = parseParams(ToolCallParamsSchema, params);

    if (call.name !== SEARCH_TOOL.name) {
      throw new JsonRpcError(
        JSON_RPC_ERRORS.methodNotFound,
        `Unknown tool: ${call.name}`
      );
    }

    try {
      const result = await runSearch(call.arguments);
      return {
        content: [{ type: "text", text: formatSearchText(result) }],
        isError: false,
      };
    } catch (error: unknown) {
      if (error instanceof SearchUnavailableError) {
        return {
          content: [
            { type: "text", text: `Error searching forms: ${error.message}` },
          ],
          isError: true,
        };
      }
      throw error;
    }
  }

  async function dispatch(method: string, params: unknown): Promise<unknown> {
    switch (method) {
      case SEARCH_TOOL.name:
        return runSearch(params);
      case "tools/list":
        return { tools: [SEARCH_TOOL] };
      case "tools/call":
        return callTool(params);
      default:
        throw new JsonRpcError(
          JSON_RPC_ERRORS.methodNotFound,
          `Method not found: ${method}`
        );
    }
  }

  async function handleMessage(raw: unknown): Promise<JsonRpcResponse | null> {
    const parsed = JsonRpcRequestSchema.safeParse(raw);

    if (!parsed.success) {
      return errorResponse(
        requestId(raw),
        JSON_RPC_ERRORS.invalidRequest,
        "Invalid Request"
      );
    }

    const { id, method, params } = parsed.data;

    try {
      const result = await dispatch(method, params);
      return id === undefined ? null : { jsonrpc: "2.0", result, id };
    } catch (error: unknown) {
      return id === undefined
        ? null
        : { jsonrpc: "2.0", error: toRpcError(error), id };
    }
  }

  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body: unknown = req.body;

      if (Array.isArray(body)) {
        if (body.length === 0) {
          res.json(
            errorResponse(null, JSON_RPC_ERRORS.invalidRequest, "Invalid Request")
          );
          return;
        }

        const replies = await Promise.all(body.map(handleMessage));
        const answered = replies.filter(
          (reply): reply is JsonRpcResponse => reply !== null
        );

        if (answered.length === 0) {
          res.status(204).end();
          return;
        }

        res.json(answered);
        return;
      }

      const reply = await handleMessage(body);

      if (reply === null) {
        res.status(204).end();
        return;
      }

      res.json(reply);
    } catch (err: unknown) {
      next(err);
    }
  };
}
