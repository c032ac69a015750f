import { describe, it, expect } from "vitest";
import { renderPreviewHtml } from "../../src/exports/preview.js";
import { buildSampleTemplate } from "../../src/templates/sample_template.js";
import { buildDocx, p, r } from "../helpers/wordml.js";

describe("renderPreviewHtml", () => {
  it("wraps mammoth's HTML in a padded container", async () => {
    const result = await renderPreviewHtml(buildDocx({ body: p(r("Moisture 2.5")) }));
    expect(result.html).toBe('<div style="padding:12px"><p>Moisture 2.5</p></div>');
  });

  it("renders the results table of a sample template", async () => {
    const result = await renderPreviewHtml(await buildSampleTemplate("FAR"));
    expect(result.html).toContain("<table>");
    expect(result.html).toContain("{{MESH1}}");
    expect(Array.isArray(result.messages)).toBe(true);
  });
});
