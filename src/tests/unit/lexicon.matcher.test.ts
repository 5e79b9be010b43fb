import assert from "node:assert/strict";
import { test } from "node:test";
import { compileLexicon, lookupTerm, matchLexicon } from "../../analysis/lexicon.matcher";
import type { WordListEntry } from "../../shared/types/reference.types";
import { loadTestReferenceData } from "../helpers/reference.fixture";

const entries: WordListEntry[] = [
  { term: "lead", category: "masculine", weight: 1 },
  { term: "compete", category: "masculine", weight: 1 },
  { term: "war", category: "masculine", weight: 1 },
  { term: "develop", category: "masculine", weight: 1 },
  { term: "look after", category: "feminine", weight: 1.5 },
  { term: "professional", category: "neutral", weight: 1 },
];

const lexicon = compileLexicon(entries);

test("matches inflected forms of single-word terms", () => {
  const flagged = matchLexicon("She leads teams and enjoys competing.", lexicon);
  assert.deepEqual(
    flagged.map((term) => [term.term, term.matched, term.position, term.category]),
    [
      ["lead", "leads", 1, "masculine"],
      ["compete", "competing", 5, "masculine"],
    ],
  );
});

test("does not read short or agent-noun forms as variants", () => {
  assert.equal(lookupTerm("ward", lexicon.single), null);
  assert.equal(lookupTerm("developer", lexicon.single), null);
  assert.equal(lookupTerm("war", lexicon.single)?.term, "war");
  assert.equal(lookupTerm("developed", lexicon.single)?.term, "develop");
});

test("matches multi-word terms inside one sentence only", () => {
  const flagged = matchLexicon("We look after clients. Look. After that, relax.", lexicon);
  assert.equal(flagged.length, 1);
  const [hit] = flagged;
  assert.equal(hit?.term, "look after");
  assert.equal(hit?.matched, "look after");
  assert.equal(hit?.position, 1);
  assert.equal(hit?.tokenCount, 2);
  assert.equal(hit?.weight, 1.5);
  assert.equal(hit?.offset, 3);
});

test("flags every occurrence, neutral terms included", () => {
  const flagged = matchLexicon("Professional and PROFESSIONAL.", lexicon);
  assert.deepEqual(
    flagged.map((term) => [term.term, term.category, term.sentence]),
    [
      ["professional", "neutral", 0],
      ["professional", "neutral", 0],
    ],
  );
});

test("empty text yields no hits", () => {
  assert.deepEqual(matchLexicon("   ", lexicon), []);
});

test("reference lexicon flags dominant, competitive and aggressive as masculine", async () => {
  const data = await loadTestReferenceData();
  const flagged = matchLexicon("Dominant, competitive and aggressive.", compileLexicon(data.lexicon.entries));
  assert.deepEqual(
    flagged.map((term) => [term.term, term.category]),
    [
      ["dominant", "masculine"],
      ["competitive", "masculine"],
      ["aggressive", "masculine"],
    ],
  );
});
