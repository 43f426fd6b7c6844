import { describe, expect, test } from "vitest";
import {
  EMPTY_PREVIEW,
  IMAGE_PREVIEW,
  UNKNOWN_DESCRIPTION,
  describeContent,
  labelFor,
  previewContent,
} from "../src/core/describe";
import { createContentItem } from "../src/core/item";

describe("labelFor", () => {
  test("looks up the fixed label table", () => {
    expect(labelFor("image", "png")).toBe("PNG Image");
    expect(labelFor("image", "webp")).toBe("WebP Image");
    expect(labelFor("code", "css")).toBe("CSS Stylesheet");
    expect(labelFor("binary", "unknown")).toBe("Binary File");
  });

  test("falls back for pairs outside the table", () => {
    expect(labelFor("text", "csv")).toBe(UNKNOWN_DESCRIPTION);
    expect(labelFor("image", "bmp")).toBe("Unknown Document");
  });
});

describe("describeContent", () => {
  test("markdown uses the first level-one heading", () => {
    expect(describeContent({ type: "markdown", subtype: "markdown" }, "# Hello World\nbody")).toBe(
      "Article: Hello World"
    );
  });

  test("markdown without a level-one heading keeps the label", () => {
    expect(describeContent({ type: "markdown", subtype: "markdown" }, "## Sub\n**bold**")).toBe("Markdown Article");
  });

  test("markdown heading is cut at 60 characters", () => {
    const heading = "H".repeat(75);
    expect(describeContent({ type: "markdown", subtype: "markdown" }, `# ${heading}`)).toBe(
      `Article: ${"H".repeat(60)}`
    );
  });

  test("heading cut counts an emoji as one character", () => {
    expect(describeContent({ type: "markdown", subtype: "markdown" }, `# ${"a".repeat(59)}😀😀`)).toBe(
      `Article: ${"a".repeat(59)}😀`
    );
  });

  test("html prefers the <title>", () => {
    expect(describeContent({ type: "html", subtype: "html" }, "<title>My Page</title>")).toBe("HTML Page: My Page");
    expect(describeContent({ type: "html", subtype: "html" }, '<TITLE lang="en">Caps</TITLE>')).toBe(
      "HTML Page: Caps"
    );
  });

  test("html without a title looks for forms, then canvases", () => {
    expect(describeContent({ type: "html", subtype: "html" }, "<html><FORM></FORM></html>")).toBe("HTML Form/Widget");
    expect(describeContent({ type: "html", subtype: "html" }, "<html><canvas></canvas></html>")).toBe(
      "HTML Canvas Visualization"
    );
    expect(describeContent({ type: "html", subtype: "html" }, "<html><p>hi</p></html>")).toBe("HTML Document");
  });

  test("react component names come from the first const", () => {
    expect(describeContent({ type: "code", subtype: "react" }, "const Button = () => <button/>;")).toBe(
      "React: Button Component"
    );
    expect(describeContent({ type: "code", subtype: "react" }, "function App() { return React.createElement('div') }")).toBe(
      "React Component"
    );
  });

  test("python names come from the first def", () => {
    expect(describeContent({ type: "code", subtype: "python" }, "def greet(name):\n    print(name)")).toBe(
      "Python: greet() function"
    );
    expect(describeContent({ type: "code", subtype: "python" }, "class A:\n    print(1)")).toBe("Python Script");
  });

  test("other code subtypes use the table", () => {
    expect(describeContent({ type: "code", subtype: "javascript" }, "const x = 1")).toBe("JavaScript Code");
    expect(describeContent({ type: "code", subtype: "ruby" }, "puts 1")).toBe(UNKNOWN_DESCRIPTION);
  });

  test("undecodable content is a Binary File", () => {
    const item = createContentItem("blob", Uint8Array.from([0x80, 0x81, 0xfe, 0xff]));
    expect(item.type).toBe("binary");
    expect(item.subtype).toBe("unknown");
    expect(item.description).toBe("Binary File");
  });
});

describe("previewContent", () => {
  test("images get a placeholder", () => {
    expect(previewContent("image", "ignored")).toBe(IMAGE_PREVIEW);
  });

  test("long text is cut to 150 characters plus an ellipsis", () => {
    const preview = previewContent("text", "a".repeat(500));
    expect(preview).toHaveLength(153);
    expect(preview).toBe("a".repeat(150) + "...");
  });

  test("short text is returned unchanged", () => {
    expect(previewContent("text", "0123456789")).toBe("0123456789");
  });

  test("exactly 150 characters is not truncated", () => {
    expect(previewContent("text", "b".repeat(150))).toBe("b".repeat(150));
  });

  test("an emoji straddling the limit is kept whole", () => {
    expect(previewContent("text", "a".repeat(149) + "😀" + "b".repeat(10))).toBe("a".repeat(149) + "😀...");
    expect(previewContent("text", "a".repeat(150) + "😀")).toBe("a".repeat(150) + "...");
  });

  test("150 characters including an emoji is not truncated", () => {
    const text = "a".repeat(149) + "😀";
    expect(previewContent("text", text)).toBe(text);
  });

  test("whitespace runs collapse to single spaces", () => {
    expect(previewContent("markdown", "  line one\n\n\tline   two  ")).toBe("line one line two");
  });

  test("empty text gets the placeholder", () => {
    expect(previewContent("text", "")).toBe(EMPTY_PREVIEW);
    expect(previewContent("code", " \n\t ")).toBe("[No text preview available]");
  });
});
