import { describe, expect, it } from "vitest";
import { GestureClassifier } from "../src";
import type { GestureResult } from "../src";
import { buildSnapshot } from "./handFixtures";

const RISING = [0.2, 0.2 + 0.7 / 3, 0.2 + 1.4 / 3, 0.9];

function confirmZoomIn(classifier: GestureClassifier): GestureResult[] {
  const results = RISING.map((openness, i) => classifier.update(buildSnapshot({ openness, timestamp: i * 25 })));
  for (const timestamp of [100, 125, 150]) {
    results.push(classifier.update(buildSnapshot({ openness: 0.9, timestamp })));
  }
  return results;
}

function confirmOrbit(classifier: GestureClassifier): GestureResult[] {
  return [0, 1, 2, 3].map((step) =>
    classifier.update(buildSnapshot({ openness: 0.8, timestamp: step * 33, offset: [step * 0.05, 0] }))
  );
}

describe("GestureClassifier", () => {
  it("starts idle with nothing measured", () => {
    const classifier = new GestureClassifier();
    expect(classifier.getDebugState()).toEqual({
      gesture: "IDLE",
      candidate: "IDLE",
      streak: 0,
      openness: null,
      speed: null,
      cooldownActive: false,
    });
  });

  it("confirms ZOOM_IN when the hand opens quickly", () => {
    const classifier = new GestureClassifier();
    const timestamps = [0, 33, 67, 100];
    RISING.forEach((openness, i) => {
      expect(classifier.update(buildSnapshot({ openness, timestamp: timestamps[i] }))).toEqual({ gesture: "IDLE" });
    });

    expect(classifier.update(buildSnapshot({ openness: 0.9, timestamp: 133 }))).toEqual({ gesture: "IDLE" });
    const debug = classifier.getDebugState();
    expect(debug.candidate).toBe("ZOOM_IN");
    expect(debug.speed).toBeCloseTo(7);

    expect(classifier.update(buildSnapshot({ openness: 0.9, timestamp: 167 }))).toEqual({ gesture: "IDLE" });
    expect(classifier.update(buildSnapshot({ openness: 0.9, timestamp: 200 }))).toEqual({ gesture: "ZOOM_IN" });
  });

  it("confirms ZOOM_OUT when the hand closes quickly", () => {
    const classifier = new GestureClassifier();
    const falling = [...RISING].reverse();
    falling.forEach((openness, i) => classifier.update(buildSnapshot({ openness, timestamp: i * 33 })));
    const results = [133, 166, 199].map((timestamp) =>
      classifier.update(buildSnapshot({ openness: 0.2, timestamp }))
    );
    expect(results.map((r) => r.gesture)).toEqual(["IDLE", "IDLE", "ZOOM_OUT"]);
    expect(classifier.getDebugState().speed).toBeLessThan(-0.8);
  });

  it("keeps a stationary open hand idle", () => {
    const classifier = new GestureClassifier();
    for (let i = 0; i < 30; i++) {
      const result = classifier.update(buildSnapshot({ openness: 0.8, timestamp: i * 33 }));
      expect(result).toEqual({ gesture: "IDLE" });
    }
    expect(classifier.getDebugState().speed).toBe(0);
  });

  it("orbits an open hand moving past the dead zone", () => {
    const classifier = new GestureClassifier();
    const results = confirmOrbit(classifier);

    expect(results.slice(0, 3)).toEqual([{ gesture: "IDLE" }, { gesture: "IDLE" }, { gesture: "IDLE" }]);
    const last = results[3];
    expect(last.gesture).toBe("ORBIT");
    // smoothed x: 0 -> 0.0225 -> 0.057375 -> 0.09905625
    expect(last.payload?.dx).toBeCloseTo(0.04168125, 6);
    expect(last.payload?.dy).toBeCloseTo(0, 9);
  });

  it("does not orbit a closed hand", () => {
    const classifier = new GestureClassifier();
    for (let step = 0; step < 6; step++) {
      const result = classifier.update(
        buildSnapshot({ openness: 0.4, timestamp: step * 33, offset: [step * 0.05, 0] })
      );
      expect(result.gesture).toBe("IDLE");
    }
  });

  it("emits the current tick's displacement with a single confidence frame", () => {
    const classifier = new GestureClassifier({ confidenceFrames: 1 });
    classifier.update(buildSnapshot({ openness: 0.8, timestamp: 0 }));
    const result = classifier.update(buildSnapshot({ openness: 0.8, timestamp: 33, offset: [0, 0.05] }));
    expect(result.gesture).toBe("ORBIT");
    expect(result.payload?.dx).toBeCloseTo(0, 9);
    expect(result.payload?.dy).toBeCloseTo(0.0225, 9);
  });

  it("drops the payload when the confirmed orbit stops moving", () => {
    const classifier = new GestureClassifier();
    confirmOrbit(classifier);

    // the hand stopped at 0.15 but the smoothed x still trails: 0.0991 -> 0.1220 -> 0.1346
    const trailing = classifier.update(buildSnapshot({ openness: 0.8, timestamp: 200, offset: [0.15, 0] }));
    expect(trailing.gesture).toBe("ORBIT");
    expect(trailing.payload?.dx).toBeCloseTo(0.0229246875, 6);

    const settled = classifier.update(buildSnapshot({ openness: 0.8, timestamp: 233, offset: [0.15, 0] }));
    expect(settled).toEqual({ gesture: "ORBIT" });
    expect(classifier.getDebugState().candidate).toBe("IDLE");
  });

  describe("when the hand disappears", () => {
    it("survives a single dropped frame", () => {
      const classifier = new GestureClassifier();
      confirmOrbit(classifier);
      expect(classifier.update(null)).toEqual({ gesture: "ORBIT" });
    });

    it("converges to IDLE after the confidence frames and never throws", () => {
      const classifier = new GestureClassifier();
      confirmOrbit(classifier);
      const results = Array.from({ length: 10 }, () => classifier.update(null));
      expect(results.map((r) => r.gesture)).toEqual([
        "ORBIT",
        "ORBIT",
        "IDLE",
        "IDLE",
        "IDLE",
        "IDLE",
        "IDLE",
        "IDLE",
        "IDLE",
        "IDLE",
      ]);
      expect(classifier.getDebugState().openness).toBeNull();
    });

    it("re-seeds the smoother when the hand comes back", () => {
      const classifier = new GestureClassifier({ confidenceFrames: 1 });
      classifier.update(buildSnapshot({ openness: 0.8, timestamp: 0 }));
      classifier.update(undefined);
      // far from the last position, but there is no previous position to diff against
      const result = classifier.update(buildSnapshot({ openness: 0.8, timestamp: 66, offset: [0.3, 0.3] }));
      expect(result).toEqual({ gesture: "IDLE" });
    });

    it("treats a malformed snapshot as no hand", () => {
      const classifier = new GestureClassifier();
      confirmOrbit(classifier);
      const broken = buildSnapshot({ openness: 0.8, timestamp: 500 });
      const truncated = { ...broken, landmarks: broken.landmarks.slice(0, 12) };
      const results = [0, 1, 2].map(() => classifier.update(truncated));
      expect(results.map((r) => r.gesture)).toEqual(["ORBIT", "ORBIT", "IDLE"]);
    });
  });

  describe("after a zoom", () => {
    it("keeps zooming while the hand stays open", () => {
      const classifier = new GestureClassifier();
      confirmZoomIn(classifier);
      expect(classifier.getGesture()).toBe("ZOOM_IN");

      classifier.update(buildSnapshot({ openness: 0.9, timestamp: 5000 }));
      const result = classifier.update(buildSnapshot({ openness: 0.9, timestamp: 5050 }));

      expect(result).toEqual({ gesture: "ZOOM_IN" });
      const debug = classifier.getDebugState();
      expect(debug.speed).toBeCloseTo(0.14);
      expect(debug.candidate).toBe("ZOOM_IN");
      expect(debug.cooldownActive).toBe(false);
    });

    it("holds orbit off for the cooldown window", () => {
      const classifier = new GestureClassifier();
      confirmZoomIn(classifier);

      // speed is still read from the opening motion on this tick
      expect(classifier.update(buildSnapshot({ openness: 0.6, timestamp: 1000 }))).toEqual({ gesture: "ZOOM_IN" });
      // speed decays below the threshold: zoom ends, anchor moves to each tick
      expect(classifier.update(buildSnapshot({ openness: 0.6, timestamp: 1050 }))).toEqual({ gesture: "ZOOM_IN" });
      expect(classifier.update(buildSnapshot({ openness: 0.6, timestamp: 1100 }))).toEqual({ gesture: "ZOOM_IN" });
      expect(classifier.update(buildSnapshot({ openness: 0.6, timestamp: 1150 }))).toEqual({ gesture: "IDLE" });

      const move = (step: number) =>
        classifier.update(
          buildSnapshot({ openness: 0.6, timestamp: 1150 + step * 50, offset: [step * 0.05, 0] })
        );

      for (let step = 1; step <= 5; step++) {
        expect(move(step)).toEqual({ gesture: "IDLE" });
        expect(classifier.getDebugState().cooldownActive).toBe(true);
      }

      // 300 ms after the anchor the moving hand qualifies again
      expect(move(6)).toEqual({ gesture: "IDLE" });
      expect(classifier.getDebugState().cooldownActive).toBe(false);
      expect(classifier.getDebugState().candidate).toBe("ORBIT");
      expect(move(7).gesture).toBe("IDLE");
      const result = move(8);
      expect(result.gesture).toBe("ORBIT");
      expect(result.payload?.dx).toBeGreaterThan(0.04);
    });
  });

  describe("after a zoom out", () => {
    function confirmZoomOut(classifier: GestureClassifier): void {
      [...RISING].reverse().forEach((openness, i) => classifier.update(buildSnapshot({ openness, timestamp: i * 25 })));
      for (const timestamp of [100, 125, 150]) {
        classifier.update(buildSnapshot({ openness: 0.1, timestamp }));
      }
    }

    it("keeps zooming out while the hand stays closed", () => {
      const classifier = new GestureClassifier();
      confirmZoomOut(classifier);
      expect(classifier.getGesture()).toBe("ZOOM_OUT");

      classifier.update(buildSnapshot({ openness: 0.1, timestamp: 5000 }));
      const result = classifier.update(buildSnapshot({ openness: 0.1, timestamp: 5050 }));

      expect(result).toEqual({ gesture: "ZOOM_OUT" });
      const debug = classifier.getDebugState();
      // (0.1 - 0.9) over 5 s
      expect(debug.speed).toBeCloseTo(-0.16);
      expect(debug.candidate).toBe("ZOOM_OUT");
    });

    it("holds orbit off once the hand opens again", () => {
      const classifier = new GestureClassifier();
      confirmZoomOut(classifier);
      classifier.update(buildSnapshot({ openness: 0.1, timestamp: 5000 }));
      classifier.update(buildSnapshot({ openness: 0.1, timestamp: 5050 }));

      const move = (step: number) =>
        classifier.update(
          buildSnapshot({ openness: 0.6, timestamp: 5050 + step * 50, offset: [step * 0.05, 0] })
        );

      // speed stays under the threshold: the zoom ends and the anchor follows each tick
      expect(move(1)).toEqual({ gesture: "ZOOM_OUT" });
      expect(classifier.getDebugState().cooldownActive).toBe(true);
      expect(move(2)).toEqual({ gesture: "ZOOM_OUT" });
      expect(move(3)).toEqual({ gesture: "IDLE" });

      // anchored at 5200: a moving open hand stays idle for 300 ms
      for (let step = 4; step <= 8; step++) {
        expect(move(step)).toEqual({ gesture: "IDLE" });
        expect(classifier.getDebugState().candidate).toBe("IDLE");
        expect(classifier.getDebugState().cooldownActive).toBe(true);
      }

      move(9);
      expect(classifier.getDebugState().cooldownActive).toBe(false);
      expect(classifier.getDebugState().candidate).toBe("ORBIT");
    });
  });

  it("rejects invalid options at construction", () => {
    expect(() => new GestureClassifier({ confidenceFrames: 0 })).toThrow();
  });
});
