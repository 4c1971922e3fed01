function splitLongWord(word: string, width: number): string[] {
  const pieces: string[] = [];
  for (let index = 0; index < word.length; index += width) {
    pieces.push(word.slice(index, index + width));
  }
  return pieces;
}

/** Word-wraps one line; words longer than `width` are cut into pieces. */
export function wrapLine(line: string, width: number): string[] {
  const safeWidth = Math.max(1, width);
  const words = line.split(/\s+/).filter((word) => word.length > 0);
  if (words.length === 0) return [""];

  const lines: string[] = [];
  let current = "";
  for (const word of words) {
    const candidate = current ? `${current} ${word}` : word;
    if (candidate.length <= safeWidth) {
      current = candidate;
      continue;
    }
    if (current) lines.push(current);
    if (word.length <= safeWidth) {
      current = word;
    } else {
      const pieces = splitLongWord(word, safeWidth);
      current = pieces.pop() ?? "";
      lines.push(...pieces);
    }
  }
  if (current) lines.push(current);
  return lines;
}

export function wrapText(content: string, width: number): string[] {
  return content.split(/\r?\n/).flatMap((line) => wrapLine(line, width));
}
