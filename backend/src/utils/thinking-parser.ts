/**
 * Scanner for reasoning blocks that open source models (DeepSeek, Qwen, ...)
 * emit inline as <think>...</think>. Nothing inside a block may reach the
 * transcript, the store or the UI.
 */

export interface ReasoningMarkers {
  start: string;
  end: string;
}

export const THINK_MARKERS: ReasoningMarkers = {
  start: '<think>',
  end: '</think>'
};

export interface ReasoningScan {
  /** Content with every closed reasoning block removed, trimmed */
  text: string;
  /** Inner text of each removed block, in order */
  reasoning: string[];
}

// Case-insensitive search that keeps indexes aligned with the original string
function indexOfMarker(content: string, marker: string, from: number): number {
  const needle = marker.toLowerCase();
  for (let i = from; i + needle.length <= content.length; i++) {
    if (content.slice(i, i + needle.length).toLowerCase() === needle) {
      return i;
    }
  }
  return -1;
}

/**
 * Each start marker is paired with the first end marker after it and the whole
 * span, markers included, is dropped. A start marker with no end after it is
 * left in place together with the rest of the text, and so is an end marker
 * with no start before it.
 */
export function scanReasoning(content: string, markers: ReasoningMarkers = THINK_MARKERS): ReasoningScan {
  const reasoning: string[] = [];
  let text = '';
  let cursor = 0;

  while (cursor < content.length) {
    const open = indexOfMarker(content, markers.start, cursor);
    if (open === -1) break;

    const close = indexOfMarker(content, markers.end, open + markers.start.length);
    if (close === -1) break;

    text += content.slice(cursor, open);
    reasoning.push(content.slice(open + markers.start.length, close).trim());
    cursor = close + markers.end.length;
  }

  text += content.slice(cursor);

  return { text: text.trim(), reasoning };
}

export function stripReasoning(content: string, markers: ReasoningMarkers = THINK_MARKERS): string {
  return scanReasoning(content, markers).text;
}
