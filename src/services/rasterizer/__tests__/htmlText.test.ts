import { htmlToText } from "../htmlText";

describe("htmlToText", () => {
  it("should remove tags and trim", () => {
    expect(htmlToText("  <h1>Hi</h1>\n")).toBe("Hi");
  });

  it("should keep text between sibling tags", () => {
    expect(htmlToText("<p>One</p>\n<p>Two <b>bold</b></p>")).toBe("One\nTwo bold");
  });

  it("should not understand nesting inside attributes", () => {
    expect(htmlToText('<a title="x>y">link</a>')).toBe('y">link');
  });

  it("should drop everything after a stray opening bracket", () => {
    expect(htmlToText("Price < 5 and more")).toBe("Price");
  });

  it("should leave plain text alone", () => {
    expect(htmlToText("no markup")).toBe("no markup");
  });
});
