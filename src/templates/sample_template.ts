/**
 * Sample COA templates, built with the `docx` library.
 *
 * Used by `npm run coa:samples` to seed the templates directory and by the
 * tests as realistic Word output. The date sits in the header and footer,
 * batch labels head the results table, and every measurement cell holds
 * one `{{KEY}}` placeholder.
 */

import {
  BorderStyle,
  Document,
  Footer,
  Header,
  HeadingLevel,
  Packer,
  Paragraph,
  Table,
  TableCell,
  TableRow,
  TextRun,
  WidthType,
} from "docx";
import { DATE_KEY, DATE_KEY_DASHED, batchFieldsFor } from "../coa/fields.js";
import { MAX_BATCHES, type CoaType } from "../coa/form.js";

const tableBorders = {
  top: { style: BorderStyle.SINGLE, size: 1 },
  bottom: { style: BorderStyle.SINGLE, size: 1 },
  left: { style: BorderStyle.SINGLE, size: 1 },
  right: { style: BorderStyle.SINGLE, size: 1 },
};

function headerCell(text: string): TableCell {
  return new TableCell({
    borders: tableBorders,
    children: [
      new Paragraph({
        children: [new TextRun({ text, bold: true, size: 20, font: "Arial" })],
      }),
    ],
  });
}

function cell(text: string): TableCell {
  return new TableCell({
    borders: tableBorders,
    children: [
      new Paragraph({
        children: [new TextRun({ text, size: 20, font: "Arial" })],
      }),
    ],
  });
}

function placeholder(key: string): string {
  return `{{${key}}}`;
}

function batchNumbers(): number[] {
  return Array.from({ length: MAX_BATCHES }, (_, i) => i + 1);
}

function resultsTable(coaType: CoaType): Table {
  const fields = batchFieldsFor(coaType);
  const labelField = fields.find((f) => f.field === "label");
  const measurements = fields.filter((f) => f.field !== "label");

  return new Table({
    width: { size: 100, type: WidthType.PERCENTAGE },
    rows: [
      new TableRow({
        children: [
          headerCell("Parameter"),
          ...batchNumbers().map((i) => headerCell(labelField ? placeholder(labelField.key(i)) : `Batch ${i}`)),
        ],
      }),
      ...measurements.map(
        (def) =>
          new TableRow({
            children: [cell(def.label[coaType]), ...batchNumbers().map((i) => cell(placeholder(def.key(i))))],
          }),
      ),
    ],
  });
}

export async function buildSampleTemplate(coaType: CoaType): Promise<Buffer> {
  const doc = new Document({
    sections: [
      {
        headers: {
          default: new Header({
            children: [
              new Paragraph({
                children: [
                  new TextRun({ text: `${coaType} Certificate of Analysis`, bold: true, size: 24, font: "Arial" }),
                ],
              }),
            ],
          }),
        },
        footers: {
          default: new Footer({
            children: [
              new Paragraph({
                children: [
                  new TextRun({ text: "Issued ", size: 16, font: "Arial", color: "595959" }),
                  new TextRun({ text: placeholder(DATE_KEY_DASHED), size: 16, font: "Arial", color: "595959" }),
                ],
              }),
            ],
          }),
        },
        children: [
          new Paragraph({
            heading: HeadingLevel.HEADING_1,
            children: [new TextRun({ text: "CERTIFICATE OF ANALYSIS", bold: true, size: 32, font: "Arial" })],
          }),
          new Paragraph({
            children: [
              new TextRun({ text: "Date: ", size: 22, font: "Arial" }),
              new TextRun({ text: placeholder(DATE_KEY), bold: true, size: 22, font: "Arial" }),
            ],
          }),
          new Paragraph({ children: [] }),
          resultsTable(coaType),
        ],
      },
    ],
  });

  return Packer.toBuffer(doc);
}
