import React, { useState } from "react";
import { Box, Text, useInput } from "ink";
import { initialSelection, reduceSelection, selectedOptions } from "../selection.js";
import type { PromptMessage } from "../types.js";

type Props = {
  readonly prompt: PromptMessage;
  readonly onSubmit: (selected: string[]) => void;
  readonly onCancel: () => void;
};

export function HabitPicker({ prompt, onSubmit, onCancel }: Props): React.JSX.Element {
  const [state, setState] = useState(initialSelection);
  const count = prompt.options.length;

  useInput((input, key) => {
    if (key.escape) {
      onCancel();
      return;
    }
    if (key.return) {
      onSubmit(selectedOptions(state, prompt.options));
      return;
    }
    if (key.upArrow) {
      setState((value) => reduceSelection(value, "up", count));
      return;
    }
    if (key.downArrow) {
      setState((value) => reduceSelection(value, "down", count));
      return;
    }
    if (input === " ") {
      setState((value) => reduceSelection(value, "toggle", count));
    }
  });

  return (
    <Box flexDirection="column" borderStyle="round" borderColor="green" paddingX={1}>
      <Text bold color="green">
        {prompt.title}
      </Text>
      <Text>{prompt.prompt}</Text>
      {prompt.options.map((option, index) => {
        const checked = state.selected.has(index);
        const focused = state.cursor === index;
        return (
          <Text key={option} color={focused ? "cyan" : undefined}>
            {focused ? "›" : " "} [{checked ? "x" : " "}] {option}
          </Text>
        );
      })}
    </Box>
  );
}
