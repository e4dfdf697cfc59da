import { describe, test, expect } from "vitest";
import { renderHtml, renderNode } from "../../src/renderer/html.js";
import { escapeAttribute, escapeText } from "../../src/renderer/escape.js";
import { parseDocument } from "../../src/parser/document.js";
import { NotImplementedError } from "../../src/utils/errors.js";

/**
 * Helper to parse and render in one go.
 */
function render(source: string, filename = "test.org"): string {
  return renderHtml(parseDocument(source, filename));
}

describe("renderHtml", () => {
  test("renders a heading", () => {
    expect(render("* Hello, World!")).toBe('<div class="article"><h1>Hello, World!</h1></div>');
  });

  test("renders nested heading levels", () => {
    expect(render("** Two\n*** Three")).toBe('<div class="article"><h2>Two</h2><h3>Three</h3></div>');
  });

  test("renders paragraphs with soft breaks", () => {
    expect(render("Hello,\n  world!\nHewwo!\n\nHai!")).toBe(
      '<div class="article"><p>Hello, world!<br />Hewwo!</p><p>Hai!</p></div>'
    );
  });

  test("renders a source block with its language", () => {
    expect(render("#+BEGIN_SRC python\nprint('Hello, world!')\n#+END_SRC")).toBe(
      '<div class="article"><pre><code class="language-python">print(\'Hello, world!\')</code></pre></div>'
    );
  });

  test("renders a source block without a language", () => {
    expect(render("#+BEGIN_SRC\na < b\n#+END_SRC")).toBe(
      '<div class="article"><pre><code>a &lt; b</code></pre></div>'
    );
  });

  test("renders tables with the edge cells", () => {
    expect(render("\n| a | b | c |\n| 1 | 2 | 3 |\n")).toBe(
      '<div class="article"><table><thead></thead><tbody>' +
        "<tr><td></td><td>a</td><td>b</td><td>c</td><td></td></tr>" +
        "<tr><td></td><td>1</td><td>2</td><td>3</td><td></td></tr>" +
        "</tbody></table></div>"
    );
  });

  test("skips commented sections entirely", () => {
    expect(render("* TODO COMMENT something\n\nsome text")).toBe('<div class="article"></div>');
  });

  test("renders the sections after a commented one", () => {
    expect(render("* COMMENT hidden\nsecret\n* Shown")).toBe(
      '<div class="article"><h1>Shown</h1></div>'
    );
  });

  test("escapes heading text", () => {
    expect(render("* a <b> & c")).toBe('<div class="article"><h1>a &lt;b&gt; &amp; c</h1></div>');
  });

  test("injects html export blocks verbatim", () => {
    expect(render("#+BEGIN_EXPORT html\n<em>raw</em>\n#+END_EXPORT")).toBe(
      '<div class="article"><em>raw</em></div>'
    );
  });

  test("metadata produces no output", () => {
    expect(render("#+TITLE: hello")).toBe('<div class="article"></div>');
  });

  describe("unimplemented content", () => {
    test("export to another backend", () => {
      expect(() => render("#+BEGIN_EXPORT latex\n\\relax\n#+END_EXPORT")).toThrow(
        NotImplementedError
      );
    });

    test("verse blocks", () => {
      expect(() => render("#+BEGIN_VERSE\nroses\n#+END_VERSE")).toThrow(NotImplementedError);
    });

    test("greater blocks", () => {
      expect(() => render("#+BEGIN_QUOTE\nsaid\n#+END_QUOTE")).toThrow(
        "Not implemented: rendering of quote blocks"
      );
    });

    test("unless the section is commented", () => {
      expect(render("* COMMENT later\n#+BEGIN_QUOTE\nsaid\n#+END_QUOTE")).toBe(
        '<div class="article"></div>'
      );
    });
  });
});

describe("renderNode", () => {
  test("escapes paragraph text before adding breaks", () => {
    expect(renderNode({ type: "paragraph", content: "<x>\ny" })).toBe("<p>&lt;x&gt;<br />y</p>");
  });

  test("escapes table cells", () => {
    expect(renderNode({ type: "table", rows: [["a&b"]] })).toBe(
      "<table><thead></thead><tbody><tr><td>a&amp;b</td></tr></tbody></table>"
    );
  });
});

describe("escaping", () => {
  test("text keeps quotes", () => {
    expect(escapeText(`<"it's">&`)).toBe(`&lt;"it's"&gt;&amp;`);
  });

  test("attributes escape quotes", () => {
    expect(escapeAttribute(`"it's"`)).toBe("&quot;it&#39;s&quot;");
  });
});
