import type { NextFunction, Request, Response } from "express";
import { z } from "zod";
import logger from "../utils/logger.js";
import { TurnFailedError } from "../utils/errors.js";
import { DEFAULT_USER_ID } from "../services/agentService.js";
import type { Agent } from "../services/agentService.js";

const searchFlag = z
  .union([z.boolean(), z.enum(["true", "false"])])
  .transform((value) => value === true || value === "true");

const chatRequestSchema = z.object({
  prompt: z.string().trim().min(1, "prompt must be a non-empty string"),
  search: searchFlag.default(false),
  user_id: z
    .string()
    .trim()
    .optional()
    .transform((value) => value || DEFAULT_USER_ID),
});

function userIdFrom(req: Request): string {
  const raw = req.query.user_id;
  return typeof raw === "string" && raw.trim() ? raw.trim() : DEFAULT_USER_ID;
}

export function createChatController(agent: Agent) {
  async function chatHandler(req: Request, res: Response, next: NextFunction) {
    const parsed = chatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.issues.map((i) => i.message).join("; ") });
    }
    const { prompt, search, user_id } = parsed.data;

    try {
      const reply = await agent.handle(prompt, { search, userId: user_id });
      return res.json(reply);
    } catch (err) {
      if (err instanceof TurnFailedError) {
        logger.error(`Turn failed for ${user_id}: ${err.message}`);
        return res.status(502).json({ error: err.message });
      }
      return next(err);
    }
  }

  async function historyHandler(req: Request, res: Response, next: NextFunction) {
    try {
      return res.json(await agent.getHistory(userIdFrom(req)));
    } catch (err) {
      return next(err);
    }
  }

  async function clearHistoryHandler(req: Request, res: Response, next: NextFunction) {
    try {
      await agent.clearHistory(userIdFrom(req));
      return res.status(204).end();
    } catch (err) {
      return next(err);
    }
  }

  return { chatHandler, historyHandler, clearHistoryHandler };
}
