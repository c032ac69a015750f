/**
 * Placeholder substitution inside one text container.
 *
 * Tokens are found against the container's full text, which may split a
 * single `{{KEY}}` across any number of runs. For each token whose key is
 * mapped:
 *   - every run the token overlaps is cleared,
 *   - the first of them receives prefix + value + suffix, where prefix is
 *     its own text before the token and suffix is the last run's text after
 *     the token,
 *   - the first run's font attributes are written back onto it.
 *
 * Offsets are taken once, before any run is written. Run texts are built
 * from those offsets and written at the end, so several tokens sharing a
 * run compose: text after a token in its last run (including any later
 * token there) moves into the token's first run.
 */

import { STYLE_ATTRIBUTES, type StyleAttribute, type TextContainer } from "../document/types.js";
import { copyRunStyle } from "../document/run_style.js";
import { findPlaceholders } from "./placeholders.js";
import { mapRunSpans, overlappingSpans, type RunSpan } from "./run_spans.js";

export interface StyleFailure {
  key: string;
  attribute: StyleAttribute;
  reason: string;
}

export interface ContainerReport {
  /** Keys substituted, one entry per token, left to right. */
  replaced: string[];
  /** Keys of tokens left verbatim because the mapping lacks them. */
  unresolved: string[];
  styleFailures: StyleFailure[];
}

export function replacePlaceholdersInContainer(
  container: TextContainer,
  replacements: ReadonlyMap<string, string>,
): ContainerReport {
  const report: ContainerReport = { replaced: [], unresolved: [], styleFailures: [] };

  const { fullText, spans } = mapRunSpans(container);
  if (spans.length === 0) return report;

  const matches = findPlaceholders(fullText);
  if (matches.length === 0) return report;

  const buffers = spans.map(() => "");
  const touched = new Set<number>();
  const merged: Array<{ key: string; owner: number }> = [];

  // Tail of a token's last run that now belongs to the token's first run.
  let redirect: { to: number; until: number } | null = null;
  let cursor = 0;

  const emit = (from: number, to: number) => {
    for (const span of spans) {
      const a = Math.max(from, span.start);
      const b = Math.min(to, span.end);
      if (a >= b) continue;
      const owner = redirect && a < redirect.until ? redirect.to : span.index;
      buffers[owner] += fullText.slice(a, b);
    }
  };

  for (const match of matches) {
    const value = replacements.get(match.key);
    if (value === undefined) {
      report.unresolved.push(match.key);
      continue;
    }

    const overlapping: RunSpan[] = overlappingSpans(spans, match.start, match.end);
    if (overlapping.length === 0) continue;
    const first = overlapping[0];
    const last = overlapping[overlapping.length - 1];

    emit(cursor, match.start);

    const owner: number = redirect && match.start < redirect.until ? redirect.to : first.index;
    buffers[owner] += value;
    for (const span of overlapping) touched.add(span.index);
    touched.add(owner);

    redirect = { to: owner, until: last.end };
    cursor = match.end;
    merged.push({ key: match.key, owner });
    report.replaced.push(match.key);
  }

  if (merged.length === 0) return report;
  emit(cursor, fullText.length);

  for (const index of touched) {
    spans[index].run.text = buffers[index];
  }

  for (const { key, owner } of merged) {
    const run = spans[owner].run;
    for (const outcome of copyRunStyle(run, run, STYLE_ATTRIBUTES)) {
      if (outcome.status === "failed") {
        report.styleFailures.push({ key, attribute: outcome.attribute, reason: outcome.reason ?? "" });
      }
    }
  }

  return report;
}
