import type { DeadlineStore } from "../data/deadline-store.js";
import type { TaskStore } from "../data/task-store.js";
import { sortByPriority } from "../data/task-store.js";
import type { ScheduleEngine } from "../engine/engine.js";
import { describeDaysLeft } from "../engine/periodic-tasks.js";
import { formatStatus } from "../engine/status.js";
import { daysBetween, parseDateLabel, toMoment } from "../schedule/time.js";
import { errorMessage } from "../shared/index.js";

export type CommandResult = { ok: true; output: string } | { ok: false; error: string };

export interface CommandContext {
  engine: ScheduleEngine;
  tasks: TaskStore;
  deadlines: DeadlineStore;
  now: () => Date;
}

type CommandHandler = (args: string[], context: CommandContext) => Promise<CommandResult>;

interface CommandDefinition {
  usage: string;
  summary: string;
  run: CommandHandler;
}

const ok = (output: string): CommandResult => ({ ok: true, output });
const fail = (error: string): CommandResult => ({ ok: false, error });

const COMMANDS = new Map<string, CommandDefinition>([
  [
    "status",
    {
      usage: "status",
      summary: "what is happening now and what comes next",
      run: async (_args, { engine, now }) => ok(formatStatus(engine.status(now()))),
    },
  ],
  [
    "tasks",
    {
      usage: "tasks",
      summary: "list open tasks by priority",
      run: async (_args, { tasks }) => {
        const open = sortByPriority(await tasks.list());
        if (open.length === 0) return ok("No open tasks.");
        return ok(open.map((task, index) => `${index + 1}. ${task.description} (priority: ${task.priority})`).join("\n"));
      },
    },
  ],
  [
    "add",
    {
      usage: "add <priority> <description>",
      summary: "add a task, or change the priority of an existing one",
      run: async (args, { tasks }) => {
        const [priorityToken, ...rest] = args;
        const description = rest.join(" ").trim();
        if (!priorityToken || !/^\d+$/.test(priorityToken) || !description) {
          return fail("Usage: add <priority> <description>");
        }
        const result = await tasks.add(description, Number(priorityToken));
        if (result.previousPriority !== undefined) {
          return ok(`Updated '${result.task.description}': priority ${result.previousPriority} -> ${result.task.priority}`);
        }
        return ok(`Added '${result.task.description}' (priority ${result.task.priority})`);
      },
    },
  ],
  [
    "rm",
    {
      usage: "rm <id|description>...",
      summary: "complete tasks by list number or description",
      run: async (args, { tasks }) => {
        if (args.length === 0) return fail("Usage: rm <id|description>...");
        const { removed, errors } = await tasks.remove(args);
        const lines = [
          ...removed.map((task) => `Completed '${task.description}'`),
          ...errors,
        ];
        return removed.length > 0 ? ok(lines.join("\n")) : fail(lines.join("\n"));
      },
    },
  ],
  [
    "deadlines",
    {
      usage: "deadlines",
      summary: "list deadlines by date",
      run: async (_args, { deadlines, engine, now }) => {
        const items = await deadlines.list();
        if (items.length === 0) return ok("No deadlines.");
        const today = toMoment(now(), engine.currentConfig.timezone);
        const lines = items.map((item, index) => {
          const date = parseDateLabel(item.deadline);
          const suffix = date ? ` (${describeDaysLeft(daysBetween(today, date))})` : "";
          return `${index + 1}. ${item.event} - ${item.deadline}${suffix}`;
        });
        return ok(lines.join("\n"));
      },
    },
  ],
  [
    "ddl",
    {
      usage: "ddl <M.D|YYYY-MM-DD> <event>",
      summary: "add or move a deadline",
      run: async (args, { deadlines, engine, now }) => {
        const [dateToken, ...rest] = args;
        const event = rest.join(" ").trim();
        if (!dateToken || !event) return fail("Usage: ddl <M.D|YYYY-MM-DD> <event>");
        const at = now();
        const item = await deadlines.add(event, dateToken, toMoment(at, engine.currentConfig.timezone), at);
        return ok(`Deadline '${item.event}' set for ${item.deadline}`);
      },
    },
  ],
  [
    "ddl-rm",
    {
      usage: "ddl-rm <event>",
      summary: "remove a deadline",
      run: async (args, { deadlines }) => {
        const event = args.join(" ").trim();
        if (!event) return fail("Usage: ddl-rm <event>");
        return (await deadlines.remove(event)) ? ok(`Removed deadline '${event}'`) : fail(`Deadline '${event}' not found.`);
      },
    },
  ],
]);

export function helpText(): string {
  const lines = [...COMMANDS.values()].map((command) => `/${command.usage}  ${command.summary}`);
  return ["Commands:", ...lines, "/help  show this list"].join("\n");
}

export async function runCommand(name: string, args: readonly string[], context: CommandContext): Promise<CommandResult> {
  const key = name.toLowerCase();
  if (key === "help") return ok(helpText());

  const command = COMMANDS.get(key);
  if (!command) return fail(`Unknown command '${name}'. Try /help.`);

  try {
    return await command.run([...args], context);
  } catch (err) {
    return fail(errorMessage(err));
  }
}
