/**
 * Document-wide placeholder fill.
 *
 * Order: delimiter repair over the whole document, then substitution over
 * body paragraphs, table cell paragraphs, header paragraphs and footer
 * paragraphs. Documents without headers or footers simply contribute no
 * containers for those regions.
 */

import type { ContainerRegion, DocxDocument } from "../document/docx_document.js";
import { normalizeBrokenPlaceholders } from "./normalizer.js";
import { toReplacementMap, type ReplacementInput } from "./placeholders.js";
import { replacePlaceholdersInContainer, type StyleFailure } from "./substitute.js";

export interface FillReport {
  /** Runs whose `((` / `))` were repaired. */
  normalizedRuns: number;
  /** Paragraphs visited, per region. */
  containers: Record<ContainerRegion, number>;
  /** Number of tokens substituted. */
  replacements: number;
  /** Distinct keys substituted, sorted. */
  replacedKeys: string[];
  /** Distinct keys left in the document because the mapping lacks them, sorted. */
  unresolvedKeys: string[];
  styleFailures: StyleFailure[];
}

export function fillPlaceholders(doc: DocxDocument, input: ReplacementInput): FillReport {
  const replacements = toReplacementMap(input);
  const normalizedRuns = normalizeBrokenPlaceholders(doc);

  const containers: Record<ContainerRegion, number> = { body: 0, table: 0, header: 0, footer: 0 };
  const replacedKeys = new Set<string>();
  const unresolvedKeys = new Set<string>();
  const styleFailures: StyleFailure[] = [];
  let count = 0;

  for (const { region, paragraph } of doc.textContainers()) {
    containers[region]++;
    const result = replacePlaceholdersInContainer(paragraph, replacements);
    count += result.replaced.length;
    for (const key of result.replaced) replacedKeys.add(key);
    for (const key of result.unresolved) unresolvedKeys.add(key);
    styleFailures.push(...result.styleFailures);
  }

  return {
    normalizedRuns,
    containers,
    replacements: count,
    replacedKeys: [...replacedKeys].sort(),
    unresolvedKeys: [...unresolvedKeys].sort(),
    styleFailures,
  };
}
