import { createApp } from "./app.js";
import { MAX_TOOL_ITERATIONS, PORT, REDIS_URL } from "./config/env.js";
import logger from "./utils/logger.js";
import { createGenerationBackend } from "./services/aiServices.js";
import { createHistoryStore, InMemoryHistoryStore } from "./services/historyStore.js";
import { createToolRegistry } from "./services/toolRegistry.js";
import { TurnStateMachine } from "./services/turnMachine.js";
import { Agent } from "./services/agentService.js";

const SWEEP_INTERVAL = 5 * 60 * 1000; // 5 min

const store = await createHistoryStore(REDIS_URL);
if (store instanceof InMemoryHistoryStore) {
  setInterval(() => {
    const removed = store.sweep();
    if (removed) logger.info(`🗑️ ${removed} expired conversation(s) dropped`);
  }, SWEEP_INTERVAL);
}

const machine = new TurnStateMachine({
  generate: createGenerationBackend(),
  tools: createToolRegistry(),
  maxToolIterations: MAX_TOOL_ITERATIONS,
});
const app = createApp(new Agent(store, machine));

app.listen(PORT, () => {
  logger.info(`🚀 Agent backend listening on http://localhost:${PORT}`);
});
