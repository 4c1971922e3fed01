import React, { useEffect, useMemo, useRef, useState } from "react";
import { Box, Text, useInput } from "ink";
import { wrapText } from "../wrap.js";
import type { FeedItem } from "../types.js";

type Props = {
  readonly items: FeedItem[];
  readonly height: number;
  readonly width: number;
  readonly scrollEnabled: boolean;
};

type DisplayLine = {
  readonly text: string;
  readonly color?: "green" | "cyan" | "magenta" | "red" | "gray";
  readonly bold?: boolean;
};

const HEADINGS: Record<FeedItem["kind"], { label: string; color: DisplayLine["color"] }> = {
  alert: { label: "Alert", color: "magenta" },
  reply: { label: "Cadence", color: "cyan" },
  error: { label: "Error", color: "red" },
  you: { label: "You", color: "green" },
  info: { label: "Info", color: "gray" },
};

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function stamp(timestamp: number): string {
  const date = new Date(timestamp);
  return `${String(date.getHours()).padStart(2, "0")}:${String(date.getMinutes()).padStart(2, "0")}`;
}

function toDisplayLines(items: FeedItem[], width: number): DisplayLine[] {
  const contentWidth = Math.max(1, width - 2);
  const lines: DisplayLine[] = [];

  for (const item of items) {
    const heading = HEADINGS[item.kind];
    const title = item.title ? `${heading.label}: ${item.title}` : heading.label;
    lines.push({ text: `${title}  ${stamp(item.timestamp)}`, bold: true, color: heading.color });
    for (const line of wrapText(item.content, contentWidth)) {
      lines.push({ text: `  ${line}` });
    }
    lines.push({ text: "" });
  }

  return lines;
}

export function Feed({ items, height, width, scrollEnabled }: Props): React.JSX.Element {
  const [scrollTop, setScrollTop] = useState(0);
  const lines = useMemo(() => toDisplayLines(items, width), [items, width]);

  const viewportHeight = Math.max(1, height);
  const maxScrollTop = Math.max(0, lines.length - viewportHeight);
  const previousMaxRef = useRef(0);

  useEffect(() => {
    const wasAtBottom = scrollTop >= previousMaxRef.current;
    if (wasAtBottom ? scrollTop !== maxScrollTop : scrollTop > maxScrollTop) {
      setScrollTop(maxScrollTop);
    }
    previousMaxRef.current = maxScrollTop;
  }, [maxScrollTop, scrollTop]);

  useInput(
    (_, key) => {
      if (key.upArrow) setScrollTop((value) => clamp(value - 1, 0, maxScrollTop));
      else if (key.downArrow) setScrollTop((value) => clamp(value + 1, 0, maxScrollTop));
      else if (key.pageUp) setScrollTop((value) => clamp(value - viewportHeight, 0, maxScrollTop));
      else if (key.pageDown) setScrollTop((value) => clamp(value + viewportHeight, 0, maxScrollTop));
    },
    { isActive: scrollEnabled && lines.length > 0 },
  );

  if (items.length === 0) {
    return (
      <Box justifyContent="center" alignItems="center" height={viewportHeight}>
        <Text dimColor>No alerts yet. Type /status to see today's schedule.</Text>
      </Box>
    );
  }

  const start = clamp(scrollTop, 0, maxScrollTop);
  const visibleLines = lines.slice(start, start + viewportHeight);

  return (
    <Box flexDirection="column" paddingX={1} height={viewportHeight}>
      {visibleLines.map((line, index) => (
        <Text key={`${start}-${index}`} color={line.color} bold={line.bold}>
          {line.text.length > 0 ? line.text : " "}
        </Text>
      ))}
    </Box>
  );
}
