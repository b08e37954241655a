import test from "node:test";
import assert from "node:assert/strict";
import {
  cleanLongText,
  cleanShortText,
  subcategoryText,
  tokenize,
  wordCount,
} from "../src/features/text.js";

test("cleanShortText flattens line breaks and drops escapes", () => {
  assert.equal(cleanShortText("Fast\\, light\r\nand \\\"smart\\\""), 'Fast, light  and "smart"');
  assert.equal(cleanShortText("It\\'s here\\!"), "It's here!");
  assert.equal(cleanShortText("keep \\n literal"), "keep \\n literal");
  assert.equal(cleanShortText(undefined), "");
  assert.equal(cleanShortText(12), "");
});

test("cleanLongText keeps the last copy of a repeated lead sentence", () => {
  const scraped = "Meet Orbit. A tiny fan. Meet Orbit. A tiny fan that fits a pocket.";
  assert.equal(cleanLongText(scraped), "Meet Orbit. A tiny fan that fits a pocket.");
  assert.equal(cleanLongText("No repeats here. Second sentence."), "No repeats here. Second sentence.");
  assert.equal(cleanLongText("  no period at all  "), "no period at all");
  assert.equal(cleanLongText(""), "");
});

test("word counting and tokenization", () => {
  assert.equal(wordCount("  one two\tthree\nfour "), 4);
  assert.equal(wordCount("   "), 0);
  assert.deepEqual(tokenize(" United  Kingdom "), ["united", "kingdom"]);
  assert.deepEqual(tokenize(""), []);
});

test("subcategoryText uses the leaf of the slug", () => {
  assert.equal(subcategoryText("technology/3d-printing"), "3d printing");
  assert.equal(subcategoryText("games"), "games");
  assert.equal(subcategoryText(""), "");
});
