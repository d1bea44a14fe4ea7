import express from "express";
import { errorHandler, notFound } from "./middleware/errorHandler";
import matchRoutes from "./routes/match.routes";

export function buildApp(): express.Express {
  const app = express();
  app.disable("x-powered-by");
  app.use(express.json({ limit: "100kb" }));
  app.use(matchRoutes);
  app.use(notFound);
  app.use(errorHandler);
  return app;
}
