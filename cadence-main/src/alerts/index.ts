export type * from "./types.js";
export { AlertDispatcher } from "./dispatcher.js";
export type { AlertJob } from "./dispatcher.js";
export { TerminalAlertChannel } from "./terminal-channel.js";
export type { AlertTimings } from "./terminal-channel.js";
