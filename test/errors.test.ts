import { describe, expect, test } from "vitest";
import {
  ConsistencyError,
  FileError,
  formatError,
  ParseError,
  PromoterKitError,
  SequenceError,
  TabularParseError,
  ValidationError,
} from "../src/errors";

describe("PromoterKitError", () => {
  test("toString includes line and context", () => {
    const error = new ParseError("Unexpected token", "GFF3", 12, "ctg1\tsrc");
    expect(error.toString()).toBe("ParseError: Unexpected token (line 12)\nContext: ctg1\tsrc");
    expect(error.code).toBe("PARSE_ERROR");
    expect(error).toBeInstanceOf(PromoterKitError);
  });

  test("subclasses keep their place in the hierarchy", () => {
    const error = new SequenceError("is empty", "ctg9");
    expect(error.message).toBe("Sequence 'ctg9': is empty");
    expect(error).toBeInstanceOf(ValidationError);
  });
});

describe("TabularParseError", () => {
  test("appends the position to the message once", () => {
    const error = new TabularParseError("Empty path", "taxon list", 4, 2, "path");
    expect(error.message).toBe('Empty path (line 4, column 2, field "path")');
    expect(error.lineNumber).toBe(4);
    expect(error.toString()).toBe('TabularParseError: Empty path (line 4, column 2, field "path")');
  });

  test("leaves the message alone without a position", () => {
    expect(new TabularParseError("Empty table", "BLAST").message).toBe("Empty table");
  });
});

describe("FileError.fromSystemError", () => {
  test("adds a suggestion for missing files", () => {
    const error = FileError.fromSystemError("read", "Tx1.gff3", new Error("ENOENT: no such file"));
    expect(error.message).toBe(
      "read operation failed for 'Tx1.gff3': ENOENT: no such file. Check that the file path is correct and the file exists"
    );
    expect(error.filePath).toBe("Tx1.gff3");
  });
});

describe("formatError", () => {
  test("uses the promoterkit rendering when available", () => {
    const error = new ConsistencyError("Annotation and sequence lists name different taxa", ["Tx2"], []);
    expect(formatError(error)).toBe(
      "ConsistencyError: Annotation and sequence lists name different taxa\nOnly in annotation list: Tx2"
    );
  });

  test("falls back for foreign errors and values", () => {
    expect(formatError(new TypeError("boom"))).toBe("TypeError: boom");
    expect(formatError(42)).toBe("42");
  });
});
