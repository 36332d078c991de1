import { describe, it, expect } from "vitest";
import { Raw } from "../src/element.js";
import { HtmlAttributeEncodingError, HtmlStructuralError } from "../src/errors.js";
import { camelizeAttributeName, htmlToElement, htmlToElements } from "../src/fromHtml.js";
import { tag } from "../src/tags.js";

describe("htmlToElement", () => {
  it("rebuilds nested markup as elements", () => {
    const card = htmlToElement('<div class="card"><h1>Title</h1><p>Body</p></div>');
    expect(card.render()).toBe("<div class='card'>\n  <h1>\n    Title\n  </h1>\n  <p>\n    Body\n  </p>\n</div>");
  });

  it("drops layout whitespace between elements", () => {
    const list = htmlToElement("<ul>\n  <li>a</li>\n  <li>b</li>\n</ul>");
    expect(list.render()).toBe(tag("ul", {}, tag("li", {}, "a"), tag("li", {}, "b")).render());
  });

  it("trims text content", () => {
    expect(htmlToElement("<p>  hello  </p>").render()).toBe("<p>\n  hello\n</p>");
  });

  it("splits data attributes from the others", () => {
    const button = htmlToElement('<button data-user-id="7" aria-label="Close" disabled>x</button>');
    expect(button.data).toEqual({ userId: "7" });
    expect(button.attrs).toEqual({ ariaLabel: "Close", disabled: true });
    expect(button.render()).toBe("<button aria-label='Close' disabled data-user-id='7'>\n  x\n</button>");
  });

  it("keeps whitespace-sensitive text verbatim", () => {
    expect(htmlToElement("<pre>  a\n b</pre>").render()).toBe("<pre>  a\n b</pre>");
    expect(htmlToElement("<script>if (a < b) {}</script>").render()).toBe("<script>if (a < b) {}</script>");
  });

  it("keeps escaped text inert", () => {
    expect(htmlToElement("<p>&lt;script&gt;alert(1)&lt;/script&gt;</p>").render()).toBe(
      "<p>\n  &lt;script&gt;alert(1)&lt;/script&gt;\n</p>"
    );
    expect(htmlToElement("<p>Tom &amp; Jerry</p>").render()).toBe("<p>\n  Tom &amp; Jerry\n</p>");
  });

  it("re-escapes decoded text in textarea and title", () => {
    expect(htmlToElement("<textarea>a &lt;b&gt;</textarea>").render()).toBe("<textarea>a &lt;b&gt;</textarea>");
    expect(htmlToElement("<title>Q&amp;A</title>").render()).toBe("<title>\n  Q&amp;A\n</title>");
  });

  it("imports void elements as self-closing", () => {
    const img = htmlToElement('<img src="a.png">');
    expect(img.selfClosing).toBe(true);
    expect(img.render()).toBe("<img src='a.png'/>");
  });

  it("wants exactly one root element", () => {
    expect(() => htmlToElement("<p>a</p><p>b</p>")).toThrow("Expected exactly one root element, got 2 node(s)");
    expect(() => htmlToElement("just text")).toThrow(HtmlStructuralError);
  });
});

describe("htmlToElements", () => {
  it("drops comments unless asked to keep them", () => {
    expect(htmlToElements("<!-- note --><p>x</p>")).toHaveLength(1);
    const [comment] = htmlToElements("<!-- note --><p>x</p>", { keepComments: true });
    expect(comment).toBeInstanceOf(Raw);
    expect(comment instanceof Raw && comment.render()).toBe("<!-- note -->");
  });

  it("returns top-level text as strings", () => {
    expect(htmlToElements("hello <b>world</b>")).toHaveLength(2);
    expect(htmlToElements("hello <b>world</b>")[0]).toBe("hello");
  });

  it("rejects attribute names that cannot round-trip", () => {
    expect(() => htmlToElement('<div aria-1="x"></div>')).toThrow(HtmlAttributeEncodingError);
  });
});

describe("camelizeAttributeName", () => {
  it("camel-cases hyphenated names", () => {
    expect(camelizeAttributeName("aria-labelledby")).toBe("ariaLabelledby");
    expect(camelizeAttributeName("hx-swap-oob")).toBe("hxSwapOob");
  });
});
