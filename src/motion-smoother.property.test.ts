// Property-Based Test: smoothing converges on a constant input, and emits are
// never closer together than the configured rate allows.

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { MotionSmoother } from "./motion-smoother.js";
import type { ChannelKey, ChannelValues } from "./types.js";

// ─── Generators ─────────────────────────────────────────────────────────────────

const arbitraryChannel = (): fc.Arbitrary<ChannelKey> => fc.constantFrom<ChannelKey>("x", "y", "z", "h", "e");

const arbitraryAlpha = (): fc.Arbitrary<number> =>
  fc.double({ min: 0.1, max: 1, noNaN: true, noDefaultInfinity: true });

const arbitraryValue = (): fc.Arbitrary<number> =>
  fc.double({ min: -1000, max: 1000, noNaN: true, noDefaultInfinity: true });

/** Strictly increasing clock readings in ms. */
const arbitraryTicks = (): fc.Arbitrary<number[]> =>
  fc
    .array(fc.integer({ min: 1, max: 80 }), { minLength: 2, maxLength: 200 })
    .map((gaps) => {
      let t = 0;
      return gaps.map((gap) => (t += gap));
    });

// ─── Property Tests ─────────────────────────────────────────────────────────────

describe("Property: smoothing convergence", () => {
  it("distance to a constant input never grows and vanishes after enough steps", () => {
    fc.assert(
      fc.property(arbitraryChannel(), arbitraryAlpha(), arbitraryValue(), (channel, alpha, target) => {
        const alphas: Partial<ChannelValues> = {};
        alphas[channel] = alpha;
        const smoother = new MotionSmoother({ alpha: alphas });
        const start = Math.abs(smoother.value(channel) - target);
        let previous = start;
        for (let i = 0; i < 300; i++) {
          smoother.smooth(channel, target);
          const distance = Math.abs(smoother.value(channel) - target);
          expect(distance).toBeLessThanOrEqual(previous + 1e-9);
          previous = distance;
        }
        expect(previous).toBeLessThanOrEqual(1e-6 * (1 + start));
      }),
      { numRuns: 200 },
    );
  });
});

describe("Property: emit rate gate", () => {
  it("consecutive emits are at least 1000/rateHz ms apart", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 30 }),
        arbitraryTicks(),
        fc.array(arbitraryValue(), { minLength: 200, maxLength: 200 }),
        (rateHz, ticks, values) => {
          const clock = { now: 0 };
          const smoother = new MotionSmoother({
            alpha: { x: 1 },
            rateHz,
            threshold: 0,
            clock: () => clock.now,
          });
          const emittedAt: number[] = [];
          ticks.forEach((tick, i) => {
            clock.now = tick;
            smoother.smooth("x", values[i] ?? 0);
            if (smoother.shouldEmit(["x"]).shouldEmit) emittedAt.push(tick);
          });
          for (let i = 1; i < emittedAt.length; i++) {
            expect((emittedAt[i] ?? 0) - (emittedAt[i - 1] ?? 0)).toBeGreaterThanOrEqual(1000 / rateHz);
          }
        },
      ),
      { numRuns: 200 },
    );
  });

  it("an emitted transition duration always lies in [100, 400] ms", () => {
    fc.assert(
      fc.property(arbitraryValue(), (value) => {
        const smoother = new MotionSmoother({ alpha: { h: 1 }, clock: () => 0 });
        smoother.smooth("h", value);
        const decision = smoother.shouldEmit(["h"]);
        if (decision.shouldEmit) {
          expect(decision.transitionDurationMs).toBeGreaterThanOrEqual(100);
          expect(decision.transitionDurationMs).toBeLessThanOrEqual(400);
        } else {
          expect(decision.transitionDurationMs).toBeNull();
        }
      }),
      { numRuns: 200 },
    );
  });
});
