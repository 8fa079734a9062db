import {
  createClock,
  createLogger,
  createRuntime,
  type Effect,
  type Logger,
} from "@embedded-uw/shared";
import { startApiServer } from "./api/server.js";
import { createUnderwriter, type Underwriter } from "./app.js";
import { CONFIG } from "./config.js";
import { ConfigRegistry, loadConfigSnapshot } from "./snapshot/configSnapshot.js";

type MainEnv = {
  log: Logger;
  underwriter: Underwriter;
};

const runServer: Effect<MainEnv, void> = (env, signal) =>
  new Promise((resolve) => {
    env.log.info(`Embedded underwriting starting… audit=${CONFIG.auditPath} rules=${CONFIG.complianceRulesPath}`);
    const server = startApiServer(env.underwriter, CONFIG.apiPort);
    signal.addEventListener("abort", () => {
      env.underwriter.detach();
      server.close(() => resolve());
    }, { once: true });
  });

const clock = createClock();
const log = createLogger(CONFIG.logLevel);
const config = new ConfigRegistry(
  () => loadConfigSnapshot(CONFIG, clock.nowIso()),
  log
);

const underwriter = createUnderwriter({
  config,
  auditPath: CONFIG.auditPath,
  clock,
  log,
  quoteTtlMinutes: CONFIG.quoteTtlMinutes,
  simMaxScenarios: CONFIG.simMaxScenarios,
  simPartitionSize: CONFIG.simPartitionSize,
});

const runtime = createRuntime<MainEnv>({ log, underwriter });
const run = runtime.run(runServer);
run.promise.catch((e) => log.error("fatal", e));

process.on("SIGINT", () => run.cancel());
process.on("SIGTERM", () => run.cancel());
process.on("SIGHUP", () => {
  try {
    underwriter.reloadConfig();
  } catch (e) {
    underwriter.audit.error(e);
    log.error("[config] reload failed, keeping previous snapshot", e);
  }
});
