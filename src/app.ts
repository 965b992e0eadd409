import express from "express";
import type { NextFunction, Request, Response } from "express";
import cors from "cors";
import { CORS_ORIGIN } from "./config/env.js";
import chatRoutes from "./routes/chatRoutes.js";
import logger from "./utils/logger.js";
import { errorMessage } from "./utils/errors.js";
import type { Agent } from "./services/agentService.js";

export function createApp(agent: Agent) {
  const app = express();
  app.use(cors({ origin: CORS_ORIGIN }));
  app.use(express.json());

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok" });
  });

  app.use(chatRoutes(agent));

  // Express recognises error middleware by its four parameters.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    // body-parser reports unparsable JSON as a SyntaxError carrying the raw body
    if (err instanceof SyntaxError && "body" in err) {
      logger.warn(`Rejected request with malformed JSON: ${err.message}`);
      res.status(400).json({ error: "request body must be valid JSON" });
      return;
    }
    logger.error(`Unhandled request error: ${errorMessage(err)}`);
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
