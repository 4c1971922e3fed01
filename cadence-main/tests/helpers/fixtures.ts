import type { AlertChannel, AlertOutcome, MultiSelectResult, YesNoAnswer } from "../../src/alerts/index.js";
import { ScheduleConfig } from "../../src/config/settings.js";
import { WeeklySchedule } from "../../src/schedule/weekly-schedule.js";

export const TEST_CONFIG_DIR = "/tmp/cadence-test-config";

export function makeConfig(raw: Record<string, unknown> = {}, now?: () => Date): ScheduleConfig {
  return new ScheduleConfig({ timezone: "UTC", ...raw }, { configDir: TEST_CONFIG_DIR, ...(now ? { now } : {}) });
}

/** Same schedule for odd and even weeks unless `even` is given. */
export function makeWeekly(config: ScheduleConfig, odd: Record<string, unknown>, even: Record<string, unknown> = odd): WeeklySchedule {
  return WeeklySchedule.fromRaw(odd, even, config);
}

export interface RecordedAlert {
  title: string;
  message: string;
}

/** Channel that acknowledges everything immediately and remembers what it showed. */
export class RecordingChannel implements AlertChannel {
  readonly alerts: RecordedAlert[] = [];
  readonly prompts: string[][] = [];
  multiSelectResult: MultiSelectResult = { status: "selected", selected: [] };

  async alert(title: string, message: string): Promise<AlertOutcome> {
    this.alerts.push({ title, message });
    return "acknowledged";
  }

  async promptYesNo(): Promise<YesNoAnswer> {
    return "yes";
  }

  async promptMultiSelect(options: readonly string[]): Promise<MultiSelectResult> {
    this.prompts.push([...options]);
    return this.multiSelectResult;
  }
}
