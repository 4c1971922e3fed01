import type { AlertTimings } from "../alerts/index.js";
import { ScheduleConfig } from "../config/settings.js";
import type { ConfigFiles } from "../config/paths.js";
import { DeadlineStore, HabitStore, TaskLog, TaskStore } from "../data/index.js";
import { buildPeriodicTasks } from "../engine/index.js";
import type { EngineConfiguration, PeriodicTaskServices } from "../engine/index.js";
import { ReportGenerator } from "../reports/index.js";
import { WeeklySchedule } from "../schedule/index.js";

export interface LoadedConfiguration extends EngineConfiguration {
  services: PeriodicTaskServices;
}

export function createServices(config: ScheduleConfig): PeriodicTaskServices {
  const taskLog = new TaskLog(config.paths.taskLog);
  const habits = new HabitStore({ habitsPath: config.paths.habits, recordsPath: config.paths.habitRecords });
  return {
    tasks: new TaskStore({ filePath: config.paths.tasks, log: taskLog, now: () => config.now() }),
    taskLog,
    deadlines: new DeadlineStore(config.paths.deadlines),
    habits,
    reports: new ReportGenerator({
      reportsDir: config.paths.reports,
      timeZone: config.timezone,
      taskLog,
      habits,
    }),
  };
}

export function alertTimings(config: ScheduleConfig): AlertTimings {
  return {
    intervalSeconds: config.alertIntervalSeconds,
    maxDurationSeconds: config.maxAlertDurationSeconds,
    promptTimeoutSeconds: config.promptTimeoutSeconds,
    soundFile: config.soundFile,
  };
}

/** Throws `ConfigLoadError` when any of the three config files is unusable. */
export async function loadConfiguration(files: ConfigFiles, configDir: string): Promise<LoadedConfiguration> {
  const config = await ScheduleConfig.load(files.settings, { configDir });
  const weekly = await WeeklySchedule.load(files.oddWeeks, files.evenWeeks, config);
  const services = createServices(config);
  const { tasks, rejected } = buildPeriodicTasks(config, services);
  return { config, weekly, tasks, rejected, services };
}
