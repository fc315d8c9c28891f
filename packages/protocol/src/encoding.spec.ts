import assert from "assert";
import { MalformedArtifactError } from "@ringsum/common";
import {
  decodeAggregate,
  decodeKey,
  decodeMasked,
  decodeRecord,
  encodeAggregate,
  encodeKey,
  encodeMasked,
  encodeRecord,
} from "./encoding.js";

const location = "alice/somewhere.json";

function assertMalformed(fn: () => unknown, detail: string) {
  assert.throws(fn, (error: Error) => {
    assert(error instanceof MalformedArtifactError);
    assert.equal(error.message, `malformed artifact at ${location}: ${detail}`);
    return true;
  });
}

describe("artifact encoding", () => {
  describe("keys", () => {
    it("are written as decimal text", () => {
      assert.equal(encodeKey(1073741824n), "1073741824");
    });

    it("tolerate surrounding whitespace", () => {
      assert.equal(decodeKey(" 8675309\n", location), 8675309n);
    });

    it("must be integers in range", () => {
      assertMalformed(() => decodeKey("12a", location), "key is not an integer");
      assertMalformed(() => decodeKey("-3", location), "key is not an integer");
      assertMalformed(
        () => decodeKey("0", location),
        "key is outside [1, 1073741824]",
      );
      assertMalformed(
        () => decodeKey("1073741825", location),
        "key is outside [1, 1073741824]",
      );
    });
  });

  describe("private records", () => {
    it("are written with sorted field names", () => {
      assert.equal(
        encodeRecord({ view_time: 14, num_movies_rated: 2 }),
        '{"num_movies_rated":2,"view_time":14}',
      );
    });

    it("decode when the fields match the schema", () => {
      assert.deepEqual(
        decodeRecord('{"view_time":14,"num_movies_rated":2}', location, [
          "view_time",
          "num_movies_rated",
        ]),
        { num_movies_rated: 2, view_time: 14 },
      );
    });

    it("reject missing, unexpected and non-integer fields", () => {
      assertMalformed(
        () => decodeRecord('{"view_time":14}', location, ["view_time", "x"]),
        "missing field x",
      );
      assertMalformed(
        () => decodeRecord('{"view_time":14,"y":1}', location, ["view_time"]),
        "unexpected field y",
      );
      assertMalformed(
        () => decodeRecord('{"view_time":1.5}', location, ["view_time"]),
        "field view_time is not a safe integer",
      );
      assertMalformed(
        () => decodeRecord("[1,2]", location, ["view_time"]),
        "not a JSON object",
      );
      assertMalformed(
        () => decodeRecord("{", location, ["view_time"]),
        "not valid JSON",
      );
    });
  });

  describe("masked records", () => {
    it("are written as decimal strings, negatives included", () => {
      assert.equal(
        encodeMasked({ view_time: -123n, average_views_per_day: 2n ** 40n }),
        '{"average_views_per_day":"1099511627776","view_time":"-123"}',
      );
    });

    it("decode decimal strings and safe integers", () => {
      assert.deepEqual(
        decodeMasked('{"a":"-123","b":45}', location, ["a", "b"]),
        { a: -123n, b: 45n },
      );
    });

    it("reject values that are not integers", () => {
      assertMalformed(
        () => decodeMasked('{"a":"1e3"}', location, ["a"]),
        "field a is not an integer",
      );
      assertMalformed(
        () => decodeMasked('{"a":true}', location, ["a"]),
        "field a is not an integer",
      );
    });
  });

  describe("aggregate results", () => {
    it("encode with sorted values and decode back", () => {
      const text = encodeAggregate({
        mode: "mean",
        participants: 4,
        values: { view_time: 12.5, num_movies_rated: 2 },
      });
      assert.equal(
        text,
        '{"mode":"mean","participants":4,"values":{"num_movies_rated":2,"view_time":12.5}}',
      );
      assert.deepEqual(decodeAggregate(text, location), {
        mode: "mean",
        participants: 4,
        values: { num_movies_rated: 2, view_time: 12.5 },
      });
    });

    it("reject an unknown mode", () => {
      assertMalformed(
        () =>
          decodeAggregate(
            '{"mode":"median","participants":3,"values":{}}',
            location,
          ),
        "mode is not sum or mean",
      );
    });
  });
});
