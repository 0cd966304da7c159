/**
 * Question-answering HTTP controller for POST /api/ask.
 *
 * Returns the matched guidance entry (or the general fallback) together with
 * the forms the vector search found for the same question.
 */
import type { NextFunction, Request, RequestHandler, Response } from "express";

import type { AskResponse, AskUseCase } from "@app/guidance/AskUseCase";
import type { GuidanceEntry } from "@domain/guidance/types";
import { AskRequestSchema } from "@interfaces/http/ask/schema";

import { toFormResultDto } from "./search/dto";
import { parseRequest } from "./validation";

export function toGuidanceDto(entry: GuidanceEntry) {
  return {
    topic: entry.topic,
    description: entry.description,
    forms: entry.forms.map((f) => ({ ...f })),
    steps: [...entry.steps],
    requirements: [...entry.requirements],
    links: entry.links.map((l) => ({ ...l })),
  };
}

export function toAskResponseDto(response: AskResponse) {
  return {
    question: response.question,
    guidance: toGuidanceDto(response.guidance),
    matched_topic: response.matchedTopic,
    relevant_forms: response.relevantForms.map(toFormResultDto),
    search_status: response.searchStatus,
  };
}

export function createAskController(useCase: AskUseCase): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { question } = parseRequest(AskRequestSchema, req.body);
      const response = await useCase.ask(question);

      res.json(toAskResponseDto(response));
    } catch (err: unknown) {
      next(err);
    }
  };
}
