import { describe, it, expect } from "vitest";
import { createFixtureFactory } from "../src/index.js";

interface Book {
  title: string;
  tags: string[];
  pages: number;
}

const book = createFixtureFactory<Book>((index) => ({
  title: `book-${index}`,
  tags: ["fiction"],
  pages: 100 + index,
}));

describe("createFixtureFactory", () => {
  it("builds defaults at index 0", () => {
    expect(book()).toEqual({ title: "book-0", tags: ["fiction"], pages: 100 });
  });

  it("applies overrides", () => {
    expect(book({ pages: 7 })).toEqual({
      title: "book-0",
      tags: ["fiction"],
      pages: 7,
    });
  });

  it("accepts plain object defaults", () => {
    const plain = createFixtureFactory<Book>({
      title: "static",
      tags: [],
      pages: 1,
    });
    expect(plain({ title: "changed" }).title).toBe("changed");
  });

  it("does not share arrays between fixtures", () => {
    const shared = createFixtureFactory<Book>({
      title: "static",
      tags: ["a"],
      pages: 1,
    });
    const first = shared();
    first.tags.push("b");
    expect(shared().tags).toEqual(["a"]);
  });

  it("builds lists with the index threaded through", () => {
    expect(book.list(2).map((b) => b.title)).toEqual(["book-0", "book-1"]);
    expect(
      book.list(2, (index) => ({ tags: [`tag-${index}`] })).map((b) => b.tags),
    ).toEqual([["tag-0"], ["tag-1"]]);
  });

  it("extends defaults", () => {
    const thick = book.extend({ pages: 900 });
    expect(thick()).toEqual({ title: "book-0", tags: ["fiction"], pages: 900 });
    expect(thick.list(2).map((b) => b.title)).toEqual(["book-0", "book-1"]);
  });
});
