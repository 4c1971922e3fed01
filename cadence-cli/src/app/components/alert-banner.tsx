import React from "react";
import { Box, Text, useInput } from "ink";
import type { AlertMessage } from "../types.js";

type Props = {
  readonly alert: AlertMessage;
  readonly onDismiss: (alertId: string) => void;
  readonly isActive: boolean;
};

export function AlertBanner({ alert, onDismiss, isActive }: Props): React.JSX.Element {
  useInput(
    (_, key) => {
      if (key.return) onDismiss(alert.alertId);
    },
    { isActive },
  );

  return (
    <Box flexDirection="column" borderStyle="double" borderColor="magenta" paddingX={1}>
      <Text bold color="magenta">
        {alert.title}
        {alert.attempt > 1 ? <Text dimColor> (ring {alert.attempt})</Text> : null}
      </Text>
      {alert.message.split(/\r?\n/).map((line, index) => (
        <Text key={index}>{line.length > 0 ? line : " "}</Text>
      ))}
      <Text dimColor>Press Enter to dismiss</Text>
    </Box>
  );
}
