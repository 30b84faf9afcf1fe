import { Hono } from "hono";
import { renderDashboard } from "./html.js";

export function createDashboardRouter(): Hono {
  const app = new Hono();

  app.get("/", (c) => c.html(renderDashboard()));

  return app;
}
