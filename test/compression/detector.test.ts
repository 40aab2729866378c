/**
 * Tests for compression format detection
 */

import { describe, expect, test } from "vitest";
import { CompressionDetector } from "../../src/compression/detector";
import { CompressionError } from "../../src/errors";

const GZIP_HEADER = new Uint8Array([0x1f, 0x8b, 0x08, 0x00]);
const FASTA_HEADER = new TextEncoder().encode(">ctg1");

describe("CompressionDetector", () => {
  describe("fromExtension", () => {
    test("should detect gzip from .gz and .gzip", () => {
      expect(CompressionDetector.fromExtension("Tx1.fasta.gz")).toBe("gzip");
      expect(CompressionDetector.fromExtension("Tx1.gff3.gzip")).toBe("gzip");
    });

    test("should return none for uncompressed files", () => {
      expect(CompressionDetector.fromExtension("Tx1.gff3")).toBe("none");
      expect(CompressionDetector.fromExtension("archive.gz.txt")).toBe("none");
    });

    test("should ignore case and backslashes", () => {
      expect(CompressionDetector.fromExtension("C:\\data\\GENOME.FA.GZ")).toBe("gzip");
    });

    test("should throw for an empty path", () => {
      expect(() => CompressionDetector.fromExtension("")).toThrow(CompressionError);
    });
  });

  describe("fromMagicBytes", () => {
    test("should detect the gzip signature", () => {
      expect(CompressionDetector.fromMagicBytes(GZIP_HEADER)).toBe("gzip");
    });

    test("should return none for plain text and short headers", () => {
      expect(CompressionDetector.fromMagicBytes(FASTA_HEADER)).toBe("none");
      expect(CompressionDetector.fromMagicBytes(new Uint8Array([0x1f]))).toBe("none");
      expect(CompressionDetector.fromMagicBytes(new Uint8Array())).toBe("none");
    });
  });

  describe("detect", () => {
    test("should trust a compression extension", () => {
      expect(CompressionDetector.detect("Tx1.fa.gz", FASTA_HEADER)).toBe("gzip");
    });

    test("should fall back to magic bytes", () => {
      expect(CompressionDetector.detect("Tx1.fa", GZIP_HEADER)).toBe("gzip");
      expect(CompressionDetector.detect("Tx1.fa", FASTA_HEADER)).toBe("none");
    });
  });
});
