import assert from "assert";
import { arr } from "@ringsum/common";
import { encrypt } from "./masking.js";
import { mask, randomKey } from "./mask.js";
import { KeysNotReadyError } from "./errors.js";
import { sumMasked } from "./aggregator.js";
import type { PrivateRecord } from "./record.js";

const FIELDS = [
  "view_time",
  "average_views_per_day",
  "num_movies_watched",
  "num_movies_rated",
];

function randomRecord(): PrivateRecord {
  return Object.fromEntries(
    FIELDS.map((field) => [field, Math.floor(Math.random() * 1000) - 100]),
  );
}

describe("encrypt", () => {
  it("offsets each value by mask(first) - mask(second)", async () => {
    const masked = await encrypt({ view_time: 10 }, { first: 5n, second: 9n });
    assert.equal(
      masked.view_time,
      10n + (await mask(5n, "view_time")) - (await mask(9n, "view_time")),
    );
  });

  it("emits fields in sorted order regardless of input order", async () => {
    const keys = { first: 3n, second: 4n };
    const a = await encrypt({ b: 2, a: 1, c: 3 }, keys);
    const b = await encrypt({ c: 3, a: 1, b: 2 }, keys);
    assert.deepEqual(Object.keys(a), ["a", "b", "c"]);
    assert.deepEqual(a, b);
  });

  it("leaves values unchanged when both keys are equal", async () => {
    assert.deepEqual(
      await encrypt({ view_time: 10, num_movies_rated: 3 }, { first: 8n, second: 8n }),
      { num_movies_rated: 3n, view_time: 10n },
    );
  });

  it("refuses to run without both keys", async () => {
    await assert.rejects(
      encrypt({ view_time: 10 }, { second: 4n }),
      (error: Error) => {
        assert(error instanceof KeysNotReadyError);
        assert.deepEqual(error.missing, ["first"]);
        assert.equal(error.message, "masking needs both keys; missing first key");
        return true;
      },
    );
    await assert.rejects(encrypt({ view_time: 10 }, {}), /missing first and second key/);
  });

  describe("mask cancellation around a ring", () => {
    for (const size of [3, 4, 5, 7]) {
      it(`recovers the exact totals for a ring of ${size}`, async () => {
        // participant i generates keys[i] and hands it to participant i + 1
        const keys = arr(size, () => randomKey());
        const records = arr(size, () => randomRecord());

        const masked = await Promise.all(
          records.map((record, i) =>
            encrypt(record, {
              first: keys[(i - 1 + size) % size],
              second: keys[i],
            }),
          ),
        );

        const expected = Object.fromEntries(
          FIELDS.map((field) => [
            field,
            records.reduce((total, record) => total + BigInt(record[field]), 0n),
          ]),
        );
        assert.deepEqual(sumMasked(masked, FIELDS), expected);
      });
    }

    it("does not reveal values to someone summing only part of the ring", async () => {
      const keys = [11n, 22n, 33n];
      const records = [{ view_time: 10 }, { view_time: 15 }, { view_time: 12 }];
      const masked = await Promise.all(
        records.map((record, i) =>
          encrypt(record, { first: keys[(i + 2) % 3], second: keys[i] }),
        ),
      );
      const partial = sumMasked(masked.slice(0, 2), ["view_time"]).view_time;
      assert.notEqual(partial, 25n);
      assert.equal(sumMasked(masked, ["view_time"]).view_time, 37n);
    });
  });
});
