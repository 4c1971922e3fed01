export interface SelectionState {
  cursor: number;
  selected: ReadonlySet<number>;
}

export type SelectionAction = "up" | "down" | "toggle";

export function initialSelection(): SelectionState {
  return { cursor: 0, selected: new Set() };
}

/** Cursor wraps at both ends; toggling flips the option under the cursor. */
export function reduceSelection(state: SelectionState, action: SelectionAction, optionCount: number): SelectionState {
  if (optionCount <= 0) return state;

  switch (action) {
    case "up":
      return { ...state, cursor: (state.cursor - 1 + optionCount) % optionCount };
    case "down":
      return { ...state, cursor: (state.cursor + 1) % optionCount };
    case "toggle": {
      const selected = new Set(state.selected);
      if (selected.has(state.cursor)) {
        selected.delete(state.cursor);
      } else {
        selected.add(state.cursor);
      }
      return { ...state, selected };
    }
  }
}

export function selectedOptions(state: SelectionState, options: readonly string[]): string[] {
  return options.filter((_, index) => state.selected.has(index));
}
