import { AlertDispatcher, TerminalAlertChannel } from "../alerts/index.js";
import { runCommand } from "../commands/index.js";
import { configFiles, resolveConfigDir } from "../config/paths.js";
import { startConfigWatcher, stopConfigWatcher } from "../config/watcher.js";
import { ScheduleEngine, ScheduleRunner } from "../engine/index.js";
import { WsServer, parseClientMessage } from "../server/index.js";
import { createScopedLogger, errorMessage } from "../shared/index.js";
import { alertTimings, loadConfiguration } from "./bootstrap.js";

const log = createScopedLogger("main");

function readPositiveIntEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) return undefined;
  return parsed;
}

export async function main(): Promise<void> {
  const configDir = resolveConfigDir();
  const files = configFiles(configDir);
  const initial = await loadConfiguration(files, configDir);
  let services = initial.services;

  const wsServer = new WsServer({
    port: initial.config.serverPort,
    onMessage: (clientId, data) => handleMessage(clientId, data),
  });
  const channel = new TerminalAlertChannel(wsServer, alertTimings(initial.config));
  const dispatcher = new AlertDispatcher(channel);
  const engine = new ScheduleEngine({ ...initial, dispatcher });
  const runner = new ScheduleRunner({
    engine,
    pollIntervalMs: readPositiveIntEnv("CADENCE_POLL_INTERVAL_MS"),
  });

  function handleMessage(clientId: string, data: unknown): void {
    const message = parseClientMessage(data);
    if (!message) {
      wsServer.send(clientId, { type: "error", content: "Unrecognized message" });
      return;
    }
    if (channel.handleClientMessage(message)) return;
    if (message.type !== "command") return;

    runCommand(message.name, message.args, {
      engine,
      tasks: services.tasks,
      deadlines: services.deadlines,
      now: () => engine.currentConfig.now(),
    })
      .then((result) => {
        wsServer.send(clientId, result.ok ? { type: "reply", content: result.output } : { type: "error", content: result.error });
      })
      .catch((err: unknown) => {
        log.error(`command ${message.name} failed:`, errorMessage(err));
      });
  }

  const reload = async (changed: string): Promise<void> => {
    log.info(`config changed: ${changed}`);
    await runner.reload(async () => {
      const next = await loadConfiguration(files, configDir);
      if (next.config.serverPort !== engine.currentConfig.serverPort) {
        log.warn("server.port changes take effect after a restart");
      }
      services = next.services;
      channel.configure(alertTimings(next.config));
      return next;
    });
  };

  await wsServer.start();
  runner.start();
  startConfigWatcher(files, (changed) => {
    void reload(changed);
  });

  log.info(
    `cadence ready: config ${configDir}, timezone ${initial.config.timezone}, ` +
      `${initial.tasks.length} periodic task(s), polling every ${runner.intervalMs}ms`,
  );

  const shutdown = async (): Promise<void> => {
    stopConfigWatcher();
    runner.stop();
    await wsServer.stop();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}
