import React from "react";
import { Box, Text } from "ink";

type Props = {
  readonly target: string;
  readonly connected: boolean;
};

export function Header({ target, connected }: Props): React.JSX.Element {
  return (
    <Box borderStyle="single" borderColor="cyan" paddingX={1} justifyContent="space-between">
      <Text bold color="cyan">
        Cadence
      </Text>
      <Box>
        <Text color={connected ? "green" : "red"}>{"● "}</Text>
        <Text dimColor>{target}</Text>
      </Box>
    </Box>
  );
}
