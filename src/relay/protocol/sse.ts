/**
 * Incremental decoder for `text/event-stream` bodies.
 *
 * Feed it decoded text as it arrives; it returns the `data` payload of every event
 * completed so far. Multi-line `data:` fields are joined with "\n"; comments,
 * `event:`, `id:` and `retry:` fields are ignored.
 */
export class SseDecoder {
  private buffer = "";

  push(text: string): string[] {
    this.buffer += text.replace(/\r\n?/g, "\n");
    const blocks = this.buffer.split("\n\n");
    this.buffer = blocks.pop() ?? "";
    return blocks.flatMap((block) => {
      const data = dataOf(block);
      return data === undefined ? [] : [data];
    });
  }

  /**
   * Emit a trailing event that was not terminated by a blank line.
   */
  flush(): string[] {
    const rest = this.buffer;
    this.buffer = "";
    const data = dataOf(rest);
    return data === undefined ? [] : [data];
  }
}

function dataOf(block: string): string | undefined {
  const lines: string[] = [];
  for (const line of block.split("\n")) {
    if (!line.startsWith("data:")) continue;
    const value = line.slice(5);
    lines.push(value.startsWith(" ") ? value.slice(1) : value);
  }
  return lines.length > 0 ? lines.join("\n") : undefined;
}
