import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { buildCandidateList } from "./crawler.js";
import { locateElements } from "./element-selector.js";
import { extractLinks } from "./link-extractor.js";

describe("extractLinks", () => {
  it("resolves container links and strips fragments", () => {
    const html =
      '<ul class="nav"><li><a href="/a">A</a></li><li><a href="https://ex.com/b#frag">B</a></li></ul>';
    const located = locateElements(html, { type: "class", value: "nav" });
    const links = extractLinks(located, "https://ex.com/tut/");

    assert.deepEqual(links, ["https://ex.com/a", "https://ex.com/b"]);
    assert.deepEqual(buildCandidateList("https://ex.com/tut/", links), [
      "https://ex.com/tut/",
      "https://ex.com/a",
      "https://ex.com/b",
    ]);
  });

  it("deduplicates across elements by first occurrence", () => {
    const html =
      '<div class="nav"><a href="/a">A</a><a href="/b">B</a><a href="/a">A again</a></div>' +
      '<div class="nav"><a href="/c">C</a><a href="/b#x">B</a></div>';
    const located = locateElements(html, { type: "class", value: "nav" });

    assert.deepEqual(extractLinks(located, "https://ex.com/"), [
      "https://ex.com/a",
      "https://ex.com/b",
      "https://ex.com/c",
    ]);
  });

  it("skips anchors, javascript links and anchors without href", () => {
    const html =
      '<nav><a href="#top">Top</a><a href="javascript:;">JS</a><a name="x">No href</a><a href="guide.html">Guide</a></nav>';
    const located = locateElements(html, { type: "tag", value: "nav" });

    assert.deepEqual(extractLinks(located, "https://ex.com/tut/"), ["https://ex.com/tut/guide.html"]);
  });

  it("returns an empty list when the container has no links", () => {
    const located = locateElements('<div id="toc"><p>Nothing here</p></div>', { type: "id", value: "toc" });
    assert.deepEqual(extractLinks(located, "https://ex.com/"), []);
  });
});

describe("buildCandidateList", () => {
  it("drops links that coincide with the entry page", () => {
    assert.deepEqual(buildCandidateList("https://ex.com/tut/#intro", ["https://ex.com/tut/", "https://ex.com/a"]), [
      "https://ex.com/tut/",
      "https://ex.com/a",
    ]);
  });
});
