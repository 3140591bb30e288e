import { describe, expect, it } from "vitest";
import {
  haversineKm,
  locationOf,
  rankByProximity,
  roundKm,
  toProximityResults,
  type Locatable,
} from "../proximity.js";

interface Pin extends Locatable {
  name: string;
}

const origin = { latitude: 0, longitude: 0 };

describe("haversineKm", () => {
  it("is zero from a point to itself", () => {
    const points = [
      origin,
      { latitude: 51.5072, longitude: -0.1276 },
      { latitude: -33.8688, longitude: 151.2093 },
      { latitude: 89.9, longitude: 179.9 },
    ];
    for (const point of points) {
      expect(haversineKm(point, point)).toBe(0);
    }
  });

  it("is symmetric", () => {
    const a = { latitude: 12.9716, longitude: 77.5946 };
    const b = { latitude: 19.076, longitude: 72.8777 };
    expect(haversineKm(a, b)).toBeCloseTo(haversineKm(b, a), 9);
  });

  it("puts one degree of longitude on the equator at about 111.19 km", () => {
    const km = haversineKm(origin, { latitude: 0, longitude: 1 });
    expect(Math.abs(km - 111.19)).toBeLessThan(0.5);
    expect(roundKm(km)).toBe(111.19);
  });
});

describe("locationOf", () => {
  it("needs both coordinates", () => {
    expect(locationOf({ latitude: 10, longitude: 20 })).toEqual({
      kind: "located",
      coordinates: { latitude: 10, longitude: 20 },
    });
    expect(locationOf({ latitude: 10 })).toEqual({ kind: "missing" });
    expect(locationOf({ latitude: null, longitude: 20 })).toEqual({ kind: "missing" });
    expect(locationOf({})).toEqual({ kind: "missing" });
  });

  it("flags coordinates that are not finite", () => {
    expect(locationOf({ latitude: Number.NaN, longitude: 0 })).toEqual({ kind: "malformed" });
    expect(locationOf({ latitude: 0, longitude: Number.POSITIVE_INFINITY })).toEqual({ kind: "malformed" });
  });
});

describe("rankByProximity", () => {
  const t1: Pin = { name: "T1", latitude: 0, longitude: 0 };
  const t2: Pin = { name: "T2", latitude: 0, longitude: 1 };
  const t3: Pin = { name: "T3" };

  it("keeps nearby and unlocated teams, dropping those out of range", () => {
    const ranked = rankByProximity([t1, t2, t3], { center: origin, radiusKm: 50 });

    expect(ranked).toEqual([
      { item: t1, distance: { kind: "known", km: 0 } },
      { item: t3, distance: { kind: "unknown", reason: "no-location" } },
    ]);
  });

  it("returns everything in input order without a center", () => {
    const ranked = rankByProximity([t2, t3, t1], { radiusKm: 1 });

    expect(ranked.map(r => r.item.name)).toEqual(["T2", "T3", "T1"]);
    expect(ranked.every(r => r.distance.kind === "not-requested")).toBe(true);
  });

  it("orders nearest first and puts unknown distances last", () => {
    const far: Pin = { name: "far", latitude: 0, longitude: 0.3 };
    const near: Pin = { name: "near", latitude: 0, longitude: 0.1 };
    const middle: Pin = { name: "middle", latitude: 0, longitude: 0.2 };
    const half: Pin = { name: "half", latitude: 0, longitude: null };

    const ranked = rankByProximity([half, far, t3, near, middle], { center: origin, radiusKm: 50 });

    expect(ranked.map(r => r.item.name)).toEqual(["near", "middle", "far", "half", "T3"]);
  });

  it("includes a team exactly on the radius", () => {
    const radiusKm = haversineKm(origin, { latitude: 0.05, longitude: 0.05 });
    const edge: Pin = { name: "edge", latitude: 0.05, longitude: 0.05 };

    expect(rankByProximity([edge], { center: origin, radiusKm })).toHaveLength(1);
  });

  it("keeps a team whose coordinates do not compute, without failing the rest", () => {
    const broken: Pin = { name: "broken", latitude: Number.NaN, longitude: 3 };

    const ranked = rankByProximity([broken, t2, t1], { center: origin, radiusKm: 200 });

    expect(ranked.map(r => r.item.name)).toEqual(["T1", "T2", "broken"]);
    expect(ranked[2].distance).toEqual({ kind: "unknown", reason: "anomaly" });
  });

  it("gives the same answer on repeated calls and leaves the input alone", () => {
    const input = [t2, t3, t1];
    const query = { center: origin, radiusKm: 150 };

    const first = rankByProximity(input, query);
    const second = rankByProximity(input, query);

    expect(second).toEqual(first);
    expect(input).toEqual([t2, t3, t1]);
  });
});

describe("toProximityResults", () => {
  it("annotates measured teams with the rounded distance only", () => {
    const results = toProximityResults(
      rankByProximity(
        [
          { name: "T2", latitude: 0, longitude: 1 },
          { name: "T3" },
        ],
        { center: origin, radiusKm: 200 },
      ),
    );

    expect(results).toEqual([
      { name: "T2", latitude: 0, longitude: 1, distanceKm: 111.19 },
      { name: "T3" },
    ]);
    expect("distanceKm" in results[1]).toBe(false);
  });

  it("adds no distance when none was requested", () => {
    const results = toProximityResults(rankByProximity([{ name: "T1", latitude: 0, longitude: 0 }], { radiusKm: 10 }));

    expect(results).toEqual([{ name: "T1", latitude: 0, longitude: 0 }]);
  });
});
