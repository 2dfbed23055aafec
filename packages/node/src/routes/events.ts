/**
 * Audit log routes.
 *
 * GET /api/v1/events              All events (?type=, ?correlationId=, cursor pagination)
 * GET /api/v1/events/:streamId    One stream, e.g. plan:<owner> or custody
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { paginate } from "../types/pagination.js";
import { ListEventsQuerySchema, ListStreamEventsQuerySchema } from "../types/dto.js";
import { validateQuery } from "../middleware/validate.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", validateQuery(ListEventsQuerySchema), (c) => {
    const service = c.get("service");
    const query = c.get("validatedQuery");
    const events = service
      .readAllEvents(
        query.afterPosition !== undefined
          ? { fromPosition: query.afterPosition + 1 }
          : undefined,
      )
      .filter(
        (e) =>
          (query.type === undefined || e.event.type === query.type) &&
          (query.correlationId === undefined ||
            e.event.metadata.correlationId === query.correlationId),
      );

    return c.json(
      paginate(
        events,
        { cursor: query.cursor, limit: query.limit },
        (e) => e.globalPosition,
        "globalPosition",
      ),
    );
  });

  routes.get("/:streamId", validateQuery(ListStreamEventsQuerySchema), (c) => {
    const service = c.get("service");
    const streamId = c.req.param("streamId");

    const query = c.get("validatedQuery");
    const events = service.readStreamEvents(
      streamId,
      query.afterVersion !== undefined
        ? { fromVersion: query.afterVersion + 1 }
        : undefined,
    );

    return c.json(
      paginate(
        events,
        { cursor: query.cursor, limit: query.limit },
        (e) => e.version,
        "version",
      ),
    );
  });

  return routes;
}
