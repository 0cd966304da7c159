import cors from "cors";
import express, {
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from "express";

import type { SearchUseCase } from "@app/search/SearchUseCase";
import {
  bodyParserFailure,
  errorHandler,
  notFoundHandler,
} from "@middleware/errorHandler";

import { createJsonRpcHandler, errorResponse } from "./JsonRpcController";
import { JSON_RPC_ERRORS } from "./schema";

/**
 * Unreadable request bodies are answered in the JSON-RPC envelope rather than
 * as HTTP failures: malformed JSON is a parse error, a body the parser refuses
 * (too large, unsupported charset or encoding) an invalid request.
 */
function rpcParseErrorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  next: NextFunction
): void {
  const failure = bodyParserFailure(err);

  if (failure?.type === "entity.parse.failed") {
    res.json(errorResponse(null, JSON_RPC_ERRORS.parseError, "Parse error"));
    return;
  }

  if (failure) {
    res.json(
      errorResponse(null, JSON_RPC_ERRORS.invalidRequest, failure.error.message)
    );
    return;
  }

  next(err);
}

export function createRpcApp(search: SearchUseCase): Express {
  const app = express();

  app.disable("x-powered-by");
  app.use(cors());
  app.use(express.json({ limit: "100kb" }));

  app.post("/", createJsonRpcHandler(search));

  app.use(notFoundHandler);
  app.use(rpcParseErrorHandler);
  app.use(errorHandler);

  return app;
}
