/**
 * GML (Graph Modelling Language) parser.
 *
 * GML is a nested list of key/value pairs:
 *
 *   graph [
 *     directed 1
 *     node [ id 0 label "S" ]
 *     edge [ source 0 target 1 a 1.5 b 0 ]
 *   ]
 *
 * Keys are identifiers, values are integers, reals, double-quoted strings
 * (with HTML character entities) or bracketed lists. Lines starting with `#`
 * are comments. Keys may repeat within a list, so a list is kept as an
 * ordered array of entries rather than an object.
 */

import { GraphLoadError } from "../../domain/errors.js";

export type GmlValue = number | string | GmlList;

export interface GmlEntry {
  key: string;
  value: GmlValue;
  /** 1-based line the key appeared on */
  line: number;
}

export type GmlList = GmlEntry[];

type Token =
  | { kind: "key"; text: string; line: number }
  | { kind: "number"; value: number; line: number }
  | { kind: "string"; value: string; line: number }
  | { kind: "open"; line: number }
  | { kind: "close"; line: number };

const KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*/;
const NUMBER_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;
const SPECIAL_REALS: Record<string, number> = {
  INF: Infinity,
  "+INF": Infinity,
  "-INF": -Infinity,
  NAN: NaN,
};

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  quot: '"',
  lt: "<",
  gt: ">",
  apos: "'",
};

/** Parse GML text into its top-level list of entries */
export function parseGml(text: string): GmlList {
  const tokens = tokenize(text);
  let pos = 0;

  function parseList(closing: boolean, openLine: number): GmlList {
    const entries: GmlList = [];
    while (pos < tokens.length) {
      const token = tokens[pos++];
      if (!token) break;

      if (token.kind === "close") {
        if (closing) return entries;
        throw new GraphLoadError("Unexpected ']'", token.line);
      }
      if (token.kind !== "key") {
        throw new GraphLoadError("Expected a key", token.line);
      }

      const valueToken = tokens[pos++];
      if (!valueToken) {
        throw new GraphLoadError(`Missing value for key "${token.text}"`, token.line);
      }

      switch (valueToken.kind) {
        case "open":
          entries.push({ key: token.text, value: parseList(true, valueToken.line), line: token.line });
          break;
        case "number":
        case "string":
          entries.push({ key: token.text, value: valueToken.value, line: token.line });
          break;
        default:
          throw new GraphLoadError(`Invalid value for key "${token.text}"`, valueToken.line);
      }
    }

    if (closing) {
      throw new GraphLoadError("Unclosed '['", openLine);
    }
    return entries;
  }

  return parseList(false, 1);
}

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let line = 1;
  let i = 0;

  while (i < text.length) {
    const ch = text.charAt(i);

    if (ch === "\n") {
      line++;
      i++;
      continue;
    }
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    if (ch === "#") {
      while (i < text.length && text.charAt(i) !== "\n") i++;
      continue;
    }
    if (ch === "[") {
      tokens.push({ kind: "open", line });
      i++;
      continue;
    }
    if (ch === "]") {
      tokens.push({ kind: "close", line });
      i++;
      continue;
    }
    if (ch === '"') {
      const startLine = line;
      const close = text.indexOf('"', i + 1);
      if (close === -1) {
        throw new GraphLoadError("Unterminated string", startLine);
      }
      const raw = text.slice(i + 1, close);
      for (const c of raw) if (c === "\n") line++;
      tokens.push({ kind: "string", value: decodeEntities(raw, startLine), line: startLine });
      i = close + 1;
      continue;
    }

    const rest = text.slice(i, i + 64);
    const special = /^[+-]?(?:INF|NAN)\b/.exec(rest);
    if (special) {
      tokens.push({ kind: "number", value: SPECIAL_REALS[special[0]] ?? NaN, line });
      i += special[0].length;
      continue;
    }
    const numberMatch = NUMBER_PATTERN.exec(text.slice(i));
    if (numberMatch) {
      tokens.push({ kind: "number", value: Number(numberMatch[0]), line });
      i += numberMatch[0].length;
      continue;
    }
    const keyMatch = KEY_PATTERN.exec(text.slice(i));
    if (keyMatch) {
      tokens.push({ kind: "key", text: keyMatch[0], line });
      i += keyMatch[0].length;
      continue;
    }

    throw new GraphLoadError(`Unexpected character '${ch}'`, line);
  }

  return tokens;
}

const MAX_CODE_POINT = 0x10ffff;

function decodeEntities(raw: string, line: number): string {
  return raw.replace(/&(#x[0-9a-fA-F]+|#\d+|[A-Za-z]+);/g, (match, body: string) => {
    if (body.startsWith("#")) {
      const code = body.startsWith("#x") ? parseInt(body.slice(2), 16) : parseInt(body.slice(1), 10);
      if (!(code <= MAX_CODE_POINT)) {
        throw new GraphLoadError(`Character entity ${match} is outside the Unicode range`, line);
      }
      return String.fromCodePoint(code);
    }
    const named = NAMED_ENTITIES[body];
    if (named === undefined) {
      throw new GraphLoadError(`Unknown character entity ${match}`, line);
    }
    return named;
  });
}

/** First value stored under `key`, if any */
export function gmlGet(list: GmlList, key: string): GmlValue | undefined {
  return list.find((entry) => entry.key === key)?.value;
}

/** All list values stored under `key` */
export function gmlLists(list: GmlList, key: string): { value: GmlList; line: number }[] {
  const lists: { value: GmlList; line: number }[] = [];
  for (const entry of list) {
    if (entry.key === key && Array.isArray(entry.value)) {
      lists.push({ value: entry.value, line: entry.line });
    }
  }
  return lists;
}
