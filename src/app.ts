/**
 * Application factory: wires middleware, the error boundary and routes
 * around a set of services. The entry point builds the services from
 * config; tests pass in-memory ones.
 */
import { Hono } from "hono";
import { errorHandler } from "./api/errorHandler.js";
import { requestIdMiddleware } from "./api/middleware/requestId.js";
import { type RouteServices, createRoutes } from "./api/routes.js";

export type AppServices = RouteServices;

export function createApp(services: AppServices): Hono {
  const app = new Hono();

  app.use("*", requestIdMiddleware);
  app.onError(errorHandler);
  app.route("/", createRoutes(services));

  return app;
}
