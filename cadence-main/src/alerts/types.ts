export type AlertOutcome = "acknowledged" | "timedOut";

export type YesNoAnswer = "yes" | "no" | "cancelled";

export type MultiSelectResult =
  | { status: "selected"; selected: string[] }
  | { status: "cancelled" };

/**
 * Where alerts and prompts go. Implementations throw `AlertDeliveryError`
 * when nothing can receive them.
 */
export interface AlertChannel {
  alert(title: string, message: string): Promise<AlertOutcome>;
  promptYesNo(question: string, title: string): Promise<YesNoAnswer>;
  promptMultiSelect(options: readonly string[], title: string, prompt: string): Promise<MultiSelectResult>;
}
