import { describe, expect, it } from "vitest";
import {
  findSection,
  parseDocumentStructure,
  parseGoogleDocument,
} from "../document/parse.js";

function paragraph(startIndex: number, text: string, namedStyleType = "NORMAL_TEXT") {
  return {
    startIndex,
    endIndex: startIndex + text.length,
    paragraph: {
      elements: [{ startIndex, endIndex: startIndex + text.length, textRun: { content: text } }],
      paragraphStyle: { namedStyleType },
    },
  };
}

const SAMPLE = {
  documentId: "doc-42",
  title: "Handbook",
  revisionId: "rev-9",
  body: {
    content: [
      { endIndex: 1, sectionBreak: { sectionStyle: {} } },
      paragraph(1, "Intro\n", "TITLE"),
      paragraph(7, "Setup\n", "HEADING_1"),
      paragraph(13, "Install deps\n"),
      { startIndex: 26, endIndex: 40, table: { rows: 1, columns: 1 } },
      paragraph(40, "Usage\n", "HEADING_2"),
      paragraph(46, "Run it.\n"),
    ],
  },
};

describe("parseDocumentStructure", () => {
  const document = parseDocumentStructure(parseGoogleDocument(SAMPLE));

  it("keeps document metadata", () => {
    expect(document.documentId).toBe("doc-42");
    expect(document.title).toBe("Handbook");
    expect(document.revisionId).toBe("rev-9");
    expect(document.totalLength).toBe(54);
  });

  it("flattens structural elements into indexed blocks", () => {
    expect(document.content).toEqual([
      { kind: "section_break", text: "", startIndex: 0, endIndex: 1 },
      { kind: "paragraph", style: "title", text: "Intro\n", startIndex: 1, endIndex: 7 },
      { kind: "paragraph", style: "heading1", text: "Setup\n", startIndex: 7, endIndex: 13 },
      { kind: "paragraph", style: "paragraph", text: "Install deps\n", startIndex: 13, endIndex: 26 },
      { kind: "table", text: "[TABLE]", startIndex: 26, endIndex: 40 },
      { kind: "paragraph", style: "heading2", text: "Usage\n", startIndex: 40, endIndex: 46 },
      { kind: "paragraph", style: "paragraph", text: "Run it.\n", startIndex: 46, endIndex: 54 },
    ]);
  });

  it("joins paragraph text with a table placeholder line", () => {
    expect(document.fullText).toBe("Intro\nSetup\nInstall deps\n[TABLE]\nUsage\nRun it.\n");
  });

  it("skips the leading empty paragraph but keeps later blank lines", () => {
    const parsed = parseDocumentStructure(
      parseGoogleDocument({
        body: { content: [paragraph(1, "\n"), paragraph(2, "Body\n"), paragraph(7, "\n")] },
      })
    );

    expect(parsed.content.map((block) => block.startIndex)).toEqual([2, 7]);
    expect(parsed.fullText).toBe("Body\n\n");
  });

  it("treats unknown named styles as plain paragraphs", () => {
    const parsed = parseDocumentStructure(
      parseGoogleDocument({ body: { content: [paragraph(1, "x\n", "SOMETHING_NEW")] } })
    );
    expect(parsed.content[0]?.style).toBe("paragraph");
  });

  it("handles a document without a body", () => {
    const parsed = parseDocumentStructure(parseGoogleDocument({ documentId: "empty" }));
    expect(parsed).toEqual({
      documentId: "empty",
      title: "",
      revisionId: "",
      content: [],
      fullText: "",
      totalLength: 0,
    });
  });
});

describe("parseGoogleDocument", () => {
  it("rejects payloads of the wrong shape", () => {
    expect(() => parseGoogleDocument({ body: { content: "nope" } })).toThrow(
      "Unexpected document payload from the Docs API"
    );
  });
});

describe("findSection", () => {
  const document = parseDocumentStructure(parseGoogleDocument(SAMPLE));

  it("runs a section to the next heading of any level", () => {
    expect(findSection(document, "setup")).toEqual({
      heading: "Setup",
      headingStartIndex: 7,
      headingEndIndex: 13,
      contentStartIndex: 13,
      contentEndIndex: 40,
    });
  });

  it("runs the last section to the end of the document", () => {
    expect(findSection(document, "SAG")).toEqual({
      heading: "Usage",
      headingStartIndex: 40,
      headingEndIndex: 46,
      contentStartIndex: 46,
      contentEndIndex: 54,
    });
  });

  it("ignores titles and body paragraphs", () => {
    expect(findSection(document, "Intro")).toBeNull();
    expect(findSection(document, "Install")).toBeNull();
  });
});
