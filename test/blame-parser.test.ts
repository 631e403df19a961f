import { describe, it, expect, vi } from "vitest";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import {
  BlameParser,
  FIELD_SETTERS,
  parseBlameOutput,
  parseRecord,
  shortCommit,
} from "../src/blame-parser.js";
import { BlameParseError } from "../src/errors.js";

const fixture = readFileSync(
  fileURLToPath(new URL("./fixtures/line-porcelain.txt", import.meta.url)),
  "utf8"
);

const HASH = "aaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa";

describe("parseBlameOutput", () => {
  it("returns an empty list for empty input", () => {
    expect(parseBlameOutput("")).toEqual([]);
  });

  it("parses every blob of line-porcelain output in order", () => {
    const records = parseBlameOutput(fixture);
    expect(records).toHaveLength(4);
    expect(records.map(r => r.finalLineNo)).toEqual([1, 2, 3, 4]);
  });

  it("reads all fields of a full blob", () => {
    const [first] = parseBlameOutput(fixture);
    expect(first).toEqual({
      commit: "c9a79e91e05355fc42ec519593806466c2f66de0",
      originalLineNo: 1,
      finalLineNo: 1,
      filename: "README.md",
      summary: "Update README.md",
      content: '<div align="center">',
      previous: {
        commit: "5d31b11bd146562bb1b472e1334233a6a8ef66e5",
        filepath: "README.md",
      },
      boundary: false,
      author: "Dana Example",
      authorMail: "<dana@example.com>",
      authorTime: 1700000000,
      authorTz: "+0900",
      committer: "Git Host",
      committerMail: "<noreply@example.com>",
      committerTime: 1700000100,
      committerTz: "+0000",
    });
  });

  it("keeps whitespace around the content after the marker", () => {
    const records = parseBlameOutput(fixture);
    expect(records[1].content).toBe("  <h1>demo</h1>  ");
  });

  it("reads boundary blobs and empty content lines", () => {
    const records = parseBlameOutput(fixture);
    expect(records[2].boundary).toBe(true);
    expect(records[2].content).toBe("");
    expect(records[2].previous).toBeUndefined();
    expect(records[2].originalLineNo).toBe(1);
    expect(records[2].finalLineNo).toBe(3);
  });

  it("keeps uncommitted lines as reported", () => {
    const last = parseBlameOutput(fixture)[3];
    expect(last.commit).toBe("0000000000000000000000000000000000000000");
    expect(last.author).toBe("Not Committed Yet");
    expect(last.authorMail).toBe("<not.committed.yet>");
    expect(last.committer).toBe("Not Committed Yet");
    expect(last.committerMail).toBe("<not.committed.yet>");
    expect(last.content).toBe("local edit");
  });

  it("parses the short form with a colon after the key", () => {
    const records = parseBlameOutput("abc123 1 1\nsummary: Initial commit\nboundary\n\tHello\n");
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      commit: "abc123",
      originalLineNo: 1,
      finalLineNo: 1,
      summary: "Initial commit",
      boundary: true,
      content: "Hello",
    });
  });

  it("treats CRLF line endings like LF", () => {
    const records = parseBlameOutput(`${HASH} 7 9 1\r\nauthor Kim\r\n\tbody\r\n`);
    expect(records).toHaveLength(1);
    expect(records[0].author).toBe("Kim");
    expect(records[0].content).toBe("body");
    expect(records[0].finalLineNo).toBe(9);
  });

  it("drops an unterminated trailing blob and reports it", () => {
    const onDiscarded = vi.fn();
    const records = parseBlameOutput(`${HASH} 1 1 1\n\tone\n${HASH} 2 2 1\nauthor Kim`, { onDiscarded });
    expect(records).toHaveLength(1);
    expect(onDiscarded).toHaveBeenCalledWith([`${HASH} 2 2 1`, "author Kim"]);
  });

  it("does not report anything when every blob is terminated", () => {
    const onDiscarded = vi.fn();
    parseBlameOutput(`${HASH} 1 1 1\n\tone\n`, { onDiscarded });
    expect(onDiscarded).not.toHaveBeenCalled();
  });

  it("fails on a blob without a header", () => {
    expect(() => parseBlameOutput("\tHello\n")).toThrow(BlameParseError);
  });

  it("reports where the headerless blob starts", () => {
    let caught: unknown;
    try {
      parseBlameOutput(`${HASH} 1 1 1\n\tone\n\ttwo\n`);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(BlameParseError);
    if (caught instanceof BlameParseError) {
      expect(caught.reason).toBe("no header");
      expect(caught.lineNumber).toBe(3);
      expect(caught.message).toBe("Error parsing git blame output: no header at input line 3");
    }
  });
});

describe("parseRecord", () => {
  it("fails on an empty blob", () => {
    expect(() => parseRecord([])).toThrow("Error parsing git blame output: no header at input line 1");
  });

  it("fails on a header without tokens", () => {
    expect(() => parseRecord(["   ", "\tx"], 5)).toThrow("no header at input line 5");
  });

  it("defaults missing and non-numeric line numbers to zero", () => {
    expect(parseRecord([HASH, "\tx"]).originalLineNo).toBe(0);
    const record = parseRecord([`${HASH} one -2`, "\tx"]);
    expect(record.originalLineNo).toBe(0);
    expect(record.finalLineNo).toBe(0);
  });

  it("defaults malformed times to zero", () => {
    const record = parseRecord([`${HASH} 1 1`, "author-time soon", "committer-time 12abc", "\tx"]);
    expect(record.authorTime).toBe(0);
    expect(record.committerTime).toBe(0);
  });

  it("ignores unknown keys and keeps the rest", () => {
    const record = parseRecord([`${HASH} 3 4`, "author Kim", "x-custom something new", "summary Fix", "\tx"]);
    expect(record.author).toBe("Kim");
    expect(record.summary).toBe("Fix");
    expect(record.content).toBe("x");
  });

  it("ignores unknown keywords without a value", () => {
    const record = parseRecord([`${HASH} 3 4`, "unknown-flag", "\tx"]);
    expect(record.boundary).toBe(false);
  });

  it("sets both previous fields from a complete value", () => {
    const record = parseRecord([`${HASH} 1 1`, `previous ${HASH} docs/old name.md`, "\tx"]);
    expect(record.previous).toEqual({ commit: HASH, filepath: "docs/old name.md" });
  });

  it("leaves previous unset when its value has no path", () => {
    expect(parseRecord([`${HASH} 1 1`, `previous ${HASH}`, "\tx"]).previous).toBeUndefined();
    expect(parseRecord([`${HASH} 1 1`, "previous", "\tx"]).previous).toBeUndefined();
  });

  it("lets the last content line win", () => {
    expect(parseRecord([`${HASH} 1 1`, "\tfirst", "\tsecond"]).content).toBe("second");
  });

  it("returns a frozen record", () => {
    expect(Object.isFrozen(parseRecord([`${HASH} 1 1`, "\tx"]))).toBe(true);
  });

  it("is deterministic", () => {
    const blob = [`${HASH} 1 2`, "author Kim", "author-time 5", "\tx"];
    expect(parseRecord(blob)).toEqual(parseRecord(blob));
  });
});

describe("FIELD_SETTERS", () => {
  it("covers the porcelain metadata keys", () => {
    expect([...FIELD_SETTERS.keys()].sort()).toEqual([
      "author",
      "author-mail",
      "author-time",
      "author-tz",
      "committer",
      "committer-mail",
      "committer-time",
      "committer-tz",
      "filename",
      "previous",
      "summary",
    ]);
  });

  it("does not resolve object prototype names", () => {
    const record = parseRecord([`${HASH} 1 1`, "constructor value", "toString value", "\tx"]);
    expect(record.summary).toBe("");
  });
});

describe("shortCommit", () => {
  it("returns the first seven characters", () => {
    expect(shortCommit({ commit: "abcdefghijklmnopqrstuvwxyz1234567890abcd" })).toBe("abcdefg");
  });

  it("returns shorter hashes unchanged", () => {
    expect(shortCommit({ commit: "abc123" })).toBe("abc123");
  });
});

describe("BlameParser", () => {
  it("passes its options to every parse", () => {
    const onDiscarded = vi.fn();
    const parser = new BlameParser({ onDiscarded });
    expect(parser.parseBlameOutput(fixture)).toHaveLength(4);
    parser.parseBlameOutput(`${HASH} 1 1 1\n`);
    expect(onDiscarded).toHaveBeenCalledTimes(1);
  });
});
