import React from "react";
import { Box, Text } from "ink";
import Spinner from "ink-spinner";

type Mode = "input" | "alert" | "habits" | "yes_no";

type Props = {
  readonly connected: boolean;
  readonly mode: Mode;
  readonly pendingAlerts: number;
};

const HINTS: Record<Mode, string> = {
  input: "Enter: send | /help for commands | Up/Down/PgUp/PgDn: scroll | Ctrl+C: exit",
  alert: "Enter: dismiss alert",
  habits: "Up/Down: move | Space: toggle | Enter: submit | Esc: cancel",
  yes_no: "y: yes | n: no | Esc: cancel",
};

export function StatusBar({ connected, mode, pendingAlerts }: Props): React.JSX.Element {
  const queued = pendingAlerts > 1 ? ` | ${pendingAlerts} alerts waiting` : "";

  return (
    <Box paddingX={1} height={1}>
      {connected ? (
        <Text dimColor>
          {HINTS[mode]}
          {queued}
        </Text>
      ) : (
        <Text color="yellow">
          <Spinner type="dots" /> Waiting for the cadence daemon...
        </Text>
      )}
    </Box>
  );
}

export type { Mode as StatusMode };
