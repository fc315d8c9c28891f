import Benchmark from "benchmark";
import {
  ArtifactLayout,
  DEMO_FIELDS,
  aggregate,
  encodeMasked,
  encrypt,
  generateRecord,
  mask,
  randomKey,
} from "@ringsum/protocol";
import type { MaskedRecord } from "@ringsum/protocol";
import { MemoryMedium } from "@ringsum/storage";

const suite = new Benchmark.Suite("Ring secure sum");
const layout = new ArtifactLayout("bench");
const fieldNames = DEMO_FIELDS.map(({ name }) => name);

function deferred(run: () => Promise<unknown>): Benchmark.Options {
  return {
    defer: true,
    fn: (deferred: Benchmark.Deferred) => {
      run().then(
        () => deferred.resolve(),
        (error: unknown) => {
          console.error(error);
          deferred.resolve();
        },
      );
    },
  };
}

// a ring whose masked records are already published, for the aggregation case
async function publishedRing(size: number): Promise<{
  medium: MemoryMedium;
  ring: string[];
}> {
  const ring = Array.from({ length: size }, (_, i) => `member${i}`);
  const secondKeys = ring.map(() => randomKey());
  const medium = new MemoryMedium();
  for (const [i, member] of ring.entries()) {
    const masked: MaskedRecord = await encrypt(generateRecord(DEMO_FIELDS), {
      first: secondKeys[(i - 1 + size) % size],
      second: secondKeys[i],
    });
    const storage = medium.storageFor(member);
    await storage.setPermissions(layout.publicDir(member), {
      read: ring,
      write: [member],
    });
    await storage.writeText(layout.masked(member), encodeMasked(masked));
  }
  return { medium, ring };
}

async function main() {
  const keys = { first: randomKey(), second: randomKey() };
  const record = generateRecord(DEMO_FIELDS);
  const small = await publishedRing(3);
  const large = await publishedRing(50);

  suite.add("mask", deferred(() => mask(randomKey(), "view_time")));

  suite.add("encrypt record", deferred(() => encrypt(record, keys)));

  suite.add(
    "aggregate ring of 3",
    deferred(() =>
      aggregate(
        small.medium.storageFor(small.ring[0]),
        layout,
        small.ring,
        fieldNames,
        "mean",
      ),
    ),
  );

  suite.add(
    "aggregate ring of 50",
    deferred(() =>
      aggregate(
        large.medium.storageFor(large.ring[0]),
        layout,
        large.ring,
        fieldNames,
        "mean",
      ),
    ),
  );

  suite.on("cycle", (event: Benchmark.Event) => {
    console.log(String(event.target));
    console.log(event.target.stats);
  });

  suite.run({ async: true });
}

main().catch(console.error);
