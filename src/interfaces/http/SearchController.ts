/**
 * HTTP handler for POST /api/search.
 *
 * `{ embedding }` searches with the given vector; `{ query }` embeds the text
 * first. The response always carries `results`, best match first.
 */
import type { AppServices } from "@app/services";
import { SearchRequestSchema } from "@interfaces/http/search/schema";
import { parseRequest } from "@interfaces/http/validation";
import type { NextFunction, Request, Response } from "express";

export function createSearchController(services: AppServices) {
  return async function searchController(
    req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> {
    try {
      const { embedding, query, ...options } = parseRequest(
        SearchRequestSchema,
        req.body
      );

      if (embedding !== undefined) {
        const results = await services.search.searchByEmbedding({
          ...options,
          embedding,
        });
        res.json({ results });
        return;
      }

      const response = await services.search.searchByText({
        ...options,
        query: query ?? "",
      });
      res.json(response);
    } catch (err: unknown) {
      next(err);
    }
  };
}
