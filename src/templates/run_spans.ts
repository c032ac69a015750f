import type { StyledRun } from "../document/types.js";

export interface RunSpan<R extends StyledRun = StyledRun> {
  run: R;
  /** Position of the run within the container. */
  index: number;
  /** Half-open interval [start, end) in the container's full text. */
  start: number;
  end: number;
}

export interface RunSpanMap<R extends StyledRun = StyledRun> {
  fullText: string;
  spans: RunSpan<R>[];
}

/**
 * Concatenate a container's run texts and record where each run sits.
 * Empty runs keep a zero-width span so indexes line up with `runs`.
 */
export function mapRunSpans<R extends StyledRun>(container: { readonly runs: readonly R[] }): RunSpanMap<R> {
  let fullText = "";
  const spans: RunSpan<R>[] = [];
  container.runs.forEach((run, index) => {
    const start = fullText.length;
    fullText += run.text;
    spans.push({ run, index, start, end: fullText.length });
  });
  return { fullText, spans };
}

/** Spans sharing at least one character with [start, end). */
export function overlappingSpans<R extends StyledRun>(
  spans: readonly RunSpan<R>[],
  start: number,
  end: number,
): RunSpan<R>[] {
  return spans.filter((s) => !(s.end <= start || s.start >= end));
}
