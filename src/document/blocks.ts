/**
 * Block-level structure: paragraphs, tables, and the containers that hold
 * them (document body, table cells, header and footer parts).
 */

import type { TextContainer } from "./types.js";
import { Run } from "./run.js";
import { childElements } from "./ooxml.js";

export class Paragraph implements TextContainer {
  constructor(readonly element: Element) {}

  /** Direct `w:r` children, in document order. */
  get runs(): Run[] {
    return childElements(this.element, "r").map((r) => new Run(r));
  }

  get text(): string {
    return this.runs.map((r) => r.text).join("");
  }
}

/** Anything that holds paragraphs and tables as direct children. */
export class BlockContainer {
  constructor(readonly element: Element) {}

  get paragraphs(): Paragraph[] {
    return childElements(this.element, "p").map((p) => new Paragraph(p));
  }

  get tables(): Table[] {
    return childElements(this.element, "tbl").map((t) => new Table(t));
  }
}

export type TableCell = BlockContainer;

export class Table {
  constructor(readonly element: Element) {}

  /** Cells grouped by row, row-major. */
  get rows(): TableCell[][] {
    return childElements(this.element, "tr").map((tr) =>
      childElements(tr, "tc").map((tc) => new BlockContainer(tc)),
    );
  }
}

/**
 * Every paragraph of a block container: its own paragraphs first, then the
 * paragraphs of each table cell (row-major), descending into nested tables.
 */
export function* paragraphsOf(block: BlockContainer): Generator<Paragraph> {
  yield* block.paragraphs;
  for (const table of block.tables) {
    for (const row of table.rows) {
      for (const cell of row) yield* paragraphsOf(cell);
    }
  }
}
