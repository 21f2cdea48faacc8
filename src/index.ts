import { loadServerConfig, loadTemporalEnv } from "./config.js";
import { createApp } from "./app.js";

const env = loadTemporalEnv();
const config = loadServerConfig();

createApp(env, { apiKey: config.apiKey }).listen(config.port, () => {
  console.log(`Temporal service listening on http://localhost:${config.port}`);
  console.log(`[temporal] data dir ${env.dataDir}, zone ${env.timeZone}`);
});
