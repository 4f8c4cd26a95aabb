import { describe, it, expect } from "vitest";
import { parseGml, gmlGet, gmlLists } from "./parser.js";
import { GraphLoadError } from "../../domain/errors.js";

describe("parseGml", () => {
  it("parses nested lists with numbers and strings", () => {
    const doc = parseGml(`graph [ directed 1 node [ id 0 label "S" ] ]`);
    expect(doc).toEqual([
      {
        key: "graph",
        line: 1,
        value: [
          { key: "directed", value: 1, line: 1 },
          {
            key: "node",
            line: 1,
            value: [
              { key: "id", value: 0, line: 1 },
              { key: "label", value: "S", line: 1 },
            ],
          },
        ],
      },
    ]);
  });

  it("reads reals, signs and exponents", () => {
    const doc = parseGml("a 1.5 b -2 c 3e2 d .25");
    expect(doc.map((e) => e.value)).toEqual([1.5, -2, 300, 0.25]);
  });

  it("reads INF and NAN as special reals", () => {
    const doc = parseGml("a INF b -INF c NAN");
    expect(doc[0]?.value).toBe(Infinity);
    expect(doc[1]?.value).toBe(-Infinity);
    expect(Number.isNaN(doc[2]?.value)).toBe(true);
  });

  it("skips comment lines and tracks line numbers", () => {
    const doc = parseGml("# header\n\nx 1\n# note\ny 2\n");
    expect(doc).toEqual([
      { key: "x", value: 1, line: 3 },
      { key: "y", value: 2, line: 5 },
    ]);
  });

  it("decodes character entities in strings", () => {
    const doc = parseGml('label "A &amp; B &quot;C&quot; &#65;&#x42;"');
    expect(doc[0]?.value).toBe('A & B "C" AB');
  });

  it("keeps repeated keys in order", () => {
    const doc = parseGml("node [ id 1 ] node [ id 2 ]");
    expect(gmlLists(doc, "node").map((n) => gmlGet(n.value, "id"))).toEqual([1, 2]);
  });

  it("rejects an unclosed list with the line it was opened on", () => {
    expect(() => parseGml("graph [\n  directed 1\n")).toThrowError(
      new GraphLoadError("Unclosed '['", 1),
    );
  });

  it("rejects a stray closing bracket", () => {
    expect(() => parseGml("a 1\n]")).toThrow("Unexpected ']' (line 2)");
  });

  it("rejects a key without a value", () => {
    expect(() => parseGml("graph [ directed ]")).toThrow('Invalid value for key "directed"');
    expect(() => parseGml("directed")).toThrow('Missing value for key "directed"');
  });

  it("rejects unterminated strings and unknown characters", () => {
    expect(() => parseGml('label "open')).toThrow("Unterminated string (line 1)");
    expect(() => parseGml("a @")).toThrow("Unexpected character '@' (line 1)");
    expect(() => parseGml('a "&nope;"')).toThrow("Unknown character entity &nope;");
  });

  it("rejects numeric entities beyond the last code point", () => {
    let caught: unknown;
    try {
      parseGml('a 1\nlabel "&#99999999;"');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(GraphLoadError);
    expect(caught).toMatchObject({
      line: 2,
      message: "Character entity &#99999999; is outside the Unicode range (line 2)",
    });
    expect(() => parseGml('a "&#x110000;"')).toThrow(GraphLoadError);
    expect(parseGml('a "&#x10FFFF;"')).toEqual([{ key: "a", value: "\u{10FFFF}", line: 1 }]);
  });
});
