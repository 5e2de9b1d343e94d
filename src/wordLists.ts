// wordLists.ts
// Word lists shipped as JSON beside the sources.

import { readFileSync } from "node:fs";
import { z } from "zod";

const WordListSchema = z.array(z.string().min(1));

function loadWordList(file: string): ReadonlySet<string> {
  const text = readFileSync(new URL(`./data/${file}`, import.meta.url), "utf8");
  return new Set(WordListSchema.parse(JSON.parse(text)));
}

/** Upper-case SQL words that are never column references. */
export const SQL_KEYWORDS = loadWordList("sqlKeywords.json");

/** Lower-case filler words ignored by lexical matching. */
export const STOP_WORDS = loadWordList("stopwords.json");
