// identifiers.ts
// Quoting and case-folding rules for object and column names.
//
// Every name that is compared or emitted goes through normalize():
// - bare tokens are unquoted: case-insensitive, canonical form is upper case
// - "delimited" tokens are quoted: byte-exact, "" inside means one quote
// A quoted name whose text is already upper case is the same object as the
// bare name ("ORDERS" == orders), matching warehouse resolution rules.

import { InvalidIdentifierError } from "./errors";
import { SQL_KEYWORDS } from "./wordLists";

export type NormalizedIdentifier =
  | { kind: "unquoted"; raw: string; key: string }
  | { kind: "quoted"; raw: string; key: string };

const BARE_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_$]*$/;

export function normalize(raw: string): NormalizedIdentifier {
  const text = raw.trim();
  if (text.length === 0) {
    throw new InvalidIdentifierError(raw, "identifier is empty");
  }

  if (text.startsWith('"')) {
    if (text.length < 2 || !text.endsWith('"')) {
      throw new InvalidIdentifierError(raw, "unterminated quoted identifier");
    }
    const inner = text.slice(1, -1);
    if (inner.replace(/""/g, "").includes('"')) {
      throw new InvalidIdentifierError(raw, 'embedded quotes must be doubled ("")');
    }
    const key = inner.replace(/""/g, '"');
    if (key.length === 0) {
      throw new InvalidIdentifierError(raw, "quoted identifier is empty");
    }
    return { kind: "quoted", raw: text, key };
  }

  if (text.includes('"')) {
    throw new InvalidIdentifierError(raw, "stray quote in unquoted identifier");
  }
  return { kind: "unquoted", raw: text, key: text.toUpperCase() };
}

export function equalIdentifiers(
  a: string | NormalizedIdentifier,
  b: string | NormalizedIdentifier
): boolean {
  const left = typeof a === "string" ? normalize(a) : a;
  const right = typeof b === "string" ? normalize(b) : b;
  return left.key === right.key;
}

export function quoteIdentifier(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

/**
 * Text form used in emitted SQL. Unquoted names come out upper case, and are
 * delimited only when they are not valid bare words.
 */
export function emitIdentifier(id: NormalizedIdentifier): string {
  if (id.kind === "quoted") return quoteIdentifier(id.key);
  if (BARE_IDENTIFIER.test(id.key) && !SQL_KEYWORDS.has(id.key)) return id.key;
  return quoteIdentifier(id.key);
}

/**
 * Split a dotted name (db.schema.table) respecting quoted parts.
 */
export function parseQualifiedName(raw: string): NormalizedIdentifier[] {
  const parts: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < raw.length; i++) {
    const ch = raw[i];
    if (ch === '"') {
      if (inQuotes && raw[i + 1] === '"') {
        current += '""';
        i++;
        continue;
      }
      inQuotes = !inQuotes;
      current += ch;
    } else if (ch === "." && !inQuotes) {
      parts.push(current);
      current = "";
    } else {
      current += ch;
    }
  }

  if (inQuotes) {
    throw new InvalidIdentifierError(raw, "unterminated quoted identifier");
  }
  parts.push(current);
  return parts.map((part) => normalize(part));
}

export function emitQualifiedName(parts: NormalizedIdentifier[]): string {
  return parts.map(emitIdentifier).join(".");
}
