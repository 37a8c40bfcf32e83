// Property-Based Tests for stream ordering and lookup

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { findByTag, resolutionHeight, sortProgressive } from "./stream-catalog.js";
import { StreamKind, type StreamDescriptor } from "./types.js";

const arbDescriptor: fc.Arbitrary<StreamDescriptor> = fc.record({
  resolutionTag: fc.constantFrom("2160p", "1080p", "720p", "480p", "360p", "144p", ""),
  fps: fc.option(fc.constantFrom(24, 25, 30, 60), { nil: null }),
  sizeBytes: fc.nat({ max: 200 * 1024 * 1024 }),
  kind: fc.constant(StreamKind.VIDEO_PROGRESSIVE),
  container: fc.constant("mp4"),
  sourceHandle: fc.string({ minLength: 1, maxLength: 4 }),
});

describe("sortProgressive (properties)", () => {
  it("returns a permutation with non-increasing height", () => {
    fc.assert(
      fc.property(fc.array(arbDescriptor, { maxLength: 20 }), (streams) => {
        const sorted = sortProgressive(streams);

        expect(sorted).toHaveLength(streams.length);
        expect(new Set(sorted)).toEqual(new Set(streams));
        for (let i = 1; i < sorted.length; i++) {
          expect(resolutionHeight(sorted[i - 1].resolutionTag)).toBeGreaterThanOrEqual(
            resolutionHeight(sorted[i].resolutionTag),
          );
        }
      }),
    );
  });

  it("is deterministic for identical provider data", () => {
    fc.assert(
      fc.property(fc.array(arbDescriptor, { maxLength: 20 }), (streams) => {
        expect(sortProgressive(streams)).toEqual(sortProgressive([...streams]));
      }),
    );
  });

  it("findByTag yields the highest-ranked entry with that tag", () => {
    fc.assert(
      fc.property(fc.array(arbDescriptor, { minLength: 1, maxLength: 20 }), (streams) => {
        const sorted = sortProgressive(streams);
        const tag = streams[0].resolutionTag;
        const found = findByTag(sorted, tag);

        expect(found.ok).toBe(true);
        if (!found.ok) return;
        expect(found.value).toBe(sorted.find((s) => s.resolutionTag === tag));
      }),
    );
  });
});
