import React from "react";
import { Box, Text, useInput } from "ink";
import type { PromptMessage } from "../types.js";

type Props = {
  readonly prompt: PromptMessage;
  readonly onAnswer: (answer: "yes" | "no") => void;
  readonly onCancel: () => void;
};

export function YesNoPrompt({ prompt, onAnswer, onCancel }: Props): React.JSX.Element {
  useInput((input, key) => {
    if (key.escape) {
      onCancel();
      return;
    }
    const lower = input.toLowerCase();
    if (lower === "y") onAnswer("yes");
    if (lower === "n") onAnswer("no");
  });

  return (
    <Box flexDirection="column" borderStyle="round" borderColor="yellow" paddingX={1}>
      <Text bold color="yellow">
        {prompt.title}
      </Text>
      <Text>
        {prompt.prompt} <Text dimColor>[y/n]</Text>
      </Text>
    </Box>
  );
}
