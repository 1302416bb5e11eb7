const VERIFICATION_PATTERN = /<verification>([\s\S]*?)<\/verification>/g;

/** What the last verification marker in a transcript asks for. */
export type MarkerReading =
  | { kind: "complete"; marker: string }
  | { kind: "retry"; marker: string; reason: string }
  | { kind: "unknown"; marker: string }
  | { kind: "none" };

/** Content of the last `<verification>` element in `text`, trimmed. */
export function lastMarker(text: string): string | undefined {
  let last: string | undefined;
  for (const match of text.matchAll(VERIFICATION_PATTERN)) {
    last = match[1].trim();
  }
  return last;
}

/**
 * Classify a marker against the completion token expected at this point.
 * Any other token, including a later stage's, is unknown.
 */
export function classifyMarker(marker: string | undefined, expected: string, retryPrefix: string): MarkerReading {
  if (marker === undefined) return { kind: "none" };
  if (marker === expected) return { kind: "complete", marker };
  if (marker.startsWith(retryPrefix)) {
    return { kind: "retry", marker, reason: marker.slice(retryPrefix.length).trim() };
  }
  return { kind: "unknown", marker };
}

export function readMarker(text: string, expected: string, retryPrefix: string): MarkerReading {
  return classifyMarker(lastMarker(text), expected, retryPrefix);
}

export function buildRetryPrompt(originalPrompt: string, transcript: string, reason: string): string {
  return `${originalPrompt}

--- Previous Attempt ---
${transcript}

--- Retry Reason ---
${reason}

Please address the issue and try again.
`;
}

/** Prompt for the next gate after `passed` succeeded. */
export function buildStagePrompt(
  originalPrompt: string,
  transcript: string,
  passed: string,
  next: { name: string; marker: string },
  retryPrefix: string,
): string {
  return `${originalPrompt}

--- Previous Attempt ---
${transcript}

--- Verification ---
The ${passed} check passed. Now verify ${next.name}.
Finish with <verification>${next.marker}</verification> when it holds, or <verification>${retryPrefix} <reason></verification> if more work is needed.
`;
}

const NEXT_STEPS_HEADER =
  /^\s*(?:next\s+steps?:|suggested\s+(?:next\s+)?steps?:|todo:|remaining\s+(?:work|tasks?):)\s*(.*)$/i;
const LIST_ITEM = /^\s*(?:\d+[.)]|[-*•])\s*(.+)$/;

/**
 * Pull suggested follow-ups out of a transcript: text after a "Next steps:",
 * "TODO:" or similar header, then the bulleted or numbered items under it.
 * A blank line or an unindented non-item line ends a section.
 */
export function extractNextSteps(text: string, limit: number): string[] {
  const steps: string[] = [];
  let inSection = false;

  for (const line of text.split("\n")) {
    const header = NEXT_STEPS_HEADER.exec(line);
    if (header) {
      inSection = true;
      const inline = header[1].trim();
      if (inline) steps.push(inline);
      continue;
    }
    if (!inSection) continue;

    const item = LIST_ITEM.exec(line);
    if (item) {
      steps.push(item[1].trim());
    } else if (line.trim() === "") {
      inSection = false;
    } else if (!line.startsWith(" ") && !line.startsWith("\t")) {
      inSection = false;
    }
  }

  return steps.slice(0, limit);
}
