import { Router } from "express";
import { createChatController } from "../controller/chatController.js";
import type { Agent } from "../services/agentService.js";

export default function chatRoutes(agent: Agent): Router {
  const { chatHandler, historyHandler, clearHistoryHandler } = createChatController(agent);

  const router = Router();
  router.post("/chat", chatHandler);
  router.get("/history", historyHandler);
  router.delete("/history", clearHistoryHandler);

  return router;
}
