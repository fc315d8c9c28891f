import assert from "assert";
import {
  integerToOctetStringBE,
  octetStringToIntegerBE,
  nextPowerOf2Big,
  randomBytes,
  randomIntegerInRange,
  arr,
  TransportError,
  MalformedArtifactError,
} from "./index.js";

describe("common", () => {
  describe("integerToOctetStringBE", () => {
    it("does not like when the number would require more than the second argument", () => {
      assert.throws(() => integerToOctetStringBE(256n ** 10n, 10));
      assert.throws(() => integerToOctetStringBE(256n ** 10n + 1n, 10));
      assert.doesNotThrow(() => integerToOctetStringBE(256n ** 10n - 1n, 10));
    });

    it("refuses negative numbers", () => {
      assert.throws(() => integerToOctetStringBE(-1n, 4));
    });

    it("has some expected values", () => {
      assert.deepEqual(
        [...integerToOctetStringBE(BigInt(256), 5)],
        [0, 0, 0, 1, 0],
      );

      assert.deepEqual(
        [...integerToOctetStringBE(2n ** 30n, 16)],
        [0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 64, 0, 0, 0],
      );
    });

    it("round trips some large numbers", () => {
      const bytes = 15;

      for (const octetString of arr(
        10,
        () => new Uint8Array(arr(bytes, () => Math.floor(Math.random() * 255))),
      )) {
        assert.deepEqual(
          octetString,
          integerToOctetStringBE(octetStringToIntegerBE(octetString), bytes),
        );
      }
    });
  });

  describe("octetStringToIntegerBE", () => {
    it("has some expected values", () => {
      assert.equal(
        BigInt(256),
        octetStringToIntegerBE(new Uint8Array([0, 1, 0])),
      );
      assert.equal(
        BigInt(255),
        octetStringToIntegerBE(new Uint8Array([0, 0, 0, 255])),
      );
      assert.equal(
        2n ** 30n - 1n,
        octetStringToIntegerBE(new Uint8Array([63, 255, 255, 255])),
      );
    });
  });

  describe("nextPowerOf2Big", () => {
    it("has expected mappings", () => {
      assert.equal(nextPowerOf2Big(1n), 1n);
      assert.equal(nextPowerOf2Big(3n), 4n);
      assert.equal(nextPowerOf2Big(4n), 4n);
      assert.equal(nextPowerOf2Big(11n), 16n);
    });

    it("does not have an answer for negative numbers", () => {
      assert.throws(() => nextPowerOf2Big(-100n));
    });
  });

  describe("randomBytes", () => {
    it("generates different data", () => {
      // this is a weak test but it's probably fine because the code is simple
      const first = randomBytes(300);
      const second = randomBytes(300);
      assert(!Buffer.from(first).equals(Buffer.from(second)));
    });
  });

  describe("randomIntegerInRange", () => {
    it("stays within the inclusive bounds", () => {
      for (let i = 0; i < 200; i++) {
        const n = randomIntegerInRange(10n, 20n);
        assert(n >= 10n && n <= 20n, `${n} out of range`);
      }
    });

    it("returns the only value of a single-element range", () => {
      assert.equal(randomIntegerInRange(7n, 7n), 7n);
    });

    it("reaches both ends of a small range", () => {
      const seen = new Set(arr(200, () => randomIntegerInRange(0n, 1n)));
      assert.deepEqual([...seen].sort(), [0n, 1n]);
    });

    it("throws on an empty range", () => {
      assert.throws(() => randomIntegerInRange(5n, 4n), /empty range/);
    });
  });

  describe("errors", () => {
    it("includes the location in transport errors and keeps the cause", () => {
      const cause = new Error("disk full");
      const error = new TransportError("write failed", "alice/key.txt", {
        cause,
      });
      assert.equal(error.message, "write failed (alice/key.txt)");
      assert.equal(error.location, "alice/key.txt");
      assert.equal(error.cause, cause);
    });

    it("describes malformed artifacts", () => {
      const error = new MalformedArtifactError("bob/key.txt", "not an integer");
      assert.equal(
        error.message,
        "malformed artifact at bob/key.txt: not an integer",
      );
    });
  });
});
