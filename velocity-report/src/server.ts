import { createApp } from "./app";
import { cfg } from "./config";
import { startScheduler } from "./scheduler";

createApp(cfg).listen(cfg.port, () => {
  console.log(`[api] up on :${cfg.port}`);
  startScheduler();
});
