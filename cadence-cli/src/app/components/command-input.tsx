import React from "react";
import { Box, Text } from "ink";
import TextInput from "ink-text-input";

const ONLINE_HINT = "/status, /tasks, /add <priority> <task>, /help";
const OFFLINE_HINT = "daemon offline, reconnecting...";

type Props = {
  readonly value: string;
  readonly onChange: (value: string) => void;
  readonly onSubmit: (value: string) => void;
  readonly focus: boolean;
  readonly connected: boolean;
};

export function CommandInput({ value, onChange, onSubmit, focus, connected }: Props): React.JSX.Element {
  return (
    <Box borderStyle="round" borderColor={connected ? "gray" : "red"} paddingX={1}>
      <Text color={connected ? "green" : "red"} bold>
        {"cadence> "}
      </Text>
      <TextInput
        value={value}
        onChange={onChange}
        onSubmit={onSubmit}
        placeholder={connected ? ONLINE_HINT : OFFLINE_HINT}
        focus={focus}
        showCursor
      />
    </Box>
  );
}
