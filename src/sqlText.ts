// sqlText.ts
// Small SQL lexer shared by template scanning and expression rendering.
// It only needs to tell literals, delimited names, words, {{placeholders}}
// and :bindings apart; it does not parse statements.

export type SqlTokenKind =
  | "string"
  | "quoted"
  | "word"
  | "number"
  | "placeholder"
  | "binding"
  | "comment"
  | "space"
  | "symbol";

export interface SqlToken {
  kind: SqlTokenKind;
  text: string;
  /** Placeholder or binding name, without its delimiters. */
  name?: string;
}

const WORD_START = /[A-Za-z_]/;
const WORD_PART = /[A-Za-z0-9_$]/;
const DIGIT = /[0-9]/;
const SPACE = /\s/;

function readDelimited(sql: string, start: number, delimiter: string): number {
  let i = start + 1;
  while (i < sql.length) {
    if (sql[i] === delimiter) {
      if (sql[i + 1] === delimiter) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i++;
  }
  return sql.length;
}

function readWhile(sql: string, start: number, pattern: RegExp): number {
  let i = start;
  while (i < sql.length && pattern.test(sql[i])) i++;
  return i;
}

export function tokenizeSql(sql: string): SqlToken[] {
  const tokens: SqlToken[] = [];
  let i = 0;

  while (i < sql.length) {
    const ch = sql[i];
    const rest = sql.slice(i);
    let end: number;
    let kind: SqlTokenKind;
    let name: string | undefined;

    if (ch === "'") {
      end = readDelimited(sql, i, "'");
      kind = "string";
    } else if (ch === '"') {
      end = readDelimited(sql, i, '"');
      kind = "quoted";
    } else if (rest.startsWith("{{")) {
      const close = sql.indexOf("}}", i + 2);
      if (close === -1) {
        end = i + 2;
        kind = "symbol";
      } else {
        end = close + 2;
        kind = "placeholder";
        name = sql.slice(i + 2, close).trim();
      }
    } else if (rest.startsWith("--")) {
      const newline = sql.indexOf("\n", i);
      end = newline === -1 ? sql.length : newline;
      kind = "comment";
    } else if (rest.startsWith("/*")) {
      const close = sql.indexOf("*/", i + 2);
      end = close === -1 ? sql.length : close + 2;
      kind = "comment";
    } else if (rest.startsWith("::")) {
      end = i + 2;
      kind = "symbol";
    } else if (ch === ":" && i + 1 < sql.length && WORD_START.test(sql[i + 1])) {
      end = readWhile(sql, i + 1, WORD_PART);
      kind = "binding";
      name = sql.slice(i + 1, end);
    } else if (WORD_START.test(ch)) {
      end = readWhile(sql, i, WORD_PART);
      kind = "word";
    } else if (DIGIT.test(ch)) {
      end = readWhile(sql, i, /[0-9.]/);
      kind = "number";
    } else if (SPACE.test(ch)) {
      end = readWhile(sql, i, SPACE);
      kind = "space";
    } else {
      end = i + 1;
      kind = "symbol";
    }

    tokens.push({ kind, text: sql.slice(i, end), ...(name !== undefined && { name }) });
    i = end;
  }

  return tokens;
}

/** Next token that is not whitespace or a comment. */
export function nextSignificant(tokens: SqlToken[], index: number): SqlToken | undefined {
  for (let i = index + 1; i < tokens.length; i++) {
    if (tokens[i].kind !== "space" && tokens[i].kind !== "comment") return tokens[i];
  }
  return undefined;
}

export function previousSignificant(tokens: SqlToken[], index: number): SqlToken | undefined {
  for (let i = index - 1; i >= 0; i--) {
    if (tokens[i].kind !== "space" && tokens[i].kind !== "comment") return tokens[i];
  }
  return undefined;
}
