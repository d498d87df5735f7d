import { describe, it, expect } from "vitest";
import {
  buildCatalog,
  ConfigurationError,
  decluster,
  DEFAULT_FIELDS,
  ReasenbergEngine,
} from "../src/index";
import { generateCatalog, quake, type TestEvent } from "./test-utils";

function runEngine(events: TestEvent[]) {
  const { catalog } = buildCatalog(events, DEFAULT_FIELDS, {
    onInvalid: "throw",
  });
  return new ReasenbergEngine().classify(catalog);
}

describe("ReasenbergEngine", () => {
  const sequence = [
    quake("m6", 6.0, 0, 35, 139),
    quake("a1", 5.0, 0.5, 35, 139),
    quake("a2", 4.5, 0.8, 35, 139),
    quake("a3", 4.0, 1.0, 35, 139),
    quake("a4", 3.5, 1.1, 35, 139),
    quake("late", 4.0, 31.1, 35, 139),
  ];

  it("grows a cluster and closes it once tauMax has passed", () => {
    const { clusters } = runEngine(sequence);
    expect(clusters).toHaveLength(2);

    const [first, second] = clusters;
    expect(first.state).toBe("closed");
    expect(first.mainIndex).toBe(0);
    expect(first.maxMagnitude).toBe(6.0);
    expect(first.members).toEqual([0, 1, 2, 3, 4]);
    expect(first.closedBy).toBe(5);

    expect(second.members).toEqual([5]);
    expect(second.closedBy).toBeNull();
  });

  it("freezes closed clusters", () => {
    const { clusters } = runEngine(sequence);
    expect(Object.isFrozen(clusters[0])).toBe(true);
    expect(Object.isFrozen(clusters[0].members)).toBe(true);
  });

  it("keeps the largest event of each cluster independent", () => {
    const result = decluster(sequence, {
      model: { kind: "reasenberg" },
      attribution: true,
    });
    expect(result.independent.map((e) => e.event_id)).toEqual(["m6", "late"]);
    expect(result.dependent.map((e) => e.event_id)).toEqual([
      "a1",
      "a2",
      "a3",
      "a4",
    ]);
    expect(result.dependent.map((e) => e.parent_id)).toEqual([
      "m6",
      "m6",
      "m6",
      "m6",
    ]);
    expect(result.dependent[0].delta_t_seconds).toBe(43_200);
  });

  it("starts a new cluster outside the interaction radius", () => {
    // 0.5 degrees of longitude on the equator is 55.6 km; r_int(M6) is 48.3 km
    const { clusters } = runEngine([
      quake("a", 6.0, 0, 0, 0),
      quake("b", 3.0, 0.2, 0, 0.5),
    ]);
    expect(clusters.map((c) => c.members)).toEqual([[0], [1]]);
  });

  it("joins the cluster with the largest event when several qualify", () => {
    const events = [
      quake("Y", 6.0, 0, 0, 0.5),
      quake("X", 5.0, 0.2, 0, 0),
      quake("Z", 3.0, 0.3, 0, 0.2),
    ];
    const result = decluster(events, {
      model: { kind: "reasenberg" },
      attribution: true,
    });
    expect(result.independent.map((e) => e.event_id)).toEqual(["Y", "X"]);
    expect(result.dependent).toHaveLength(1);
    expect(result.dependent[0].parent_id).toBe("Y");
    expect(result.dependent[0].delta_t_seconds).toBe(25_920);
    expect(result.dependent[0].delta_distance_km).toBeCloseTo(33.3585, 3);
  });

  it("moves the parent to a larger later member", () => {
    const result = decluster(
      [
        quake("fore", 4.0, 0, 35, 139),
        quake("main", 6.5, 0.3, 35, 139),
        quake("after", 4.2, 0.6, 35, 139),
      ],
      { model: { kind: "reasenberg" }, attribution: true },
    );
    expect(result.independent.map((e) => e.event_id)).toEqual(["main"]);
    expect(result.dependent.map((e) => [e.event_id, e.parent_id])).toEqual([
      ["fore", "main"],
      ["after", "main"],
    ]);
    expect(result.dependent[0].delta_t_seconds).toBe(-25_920);
  });

  it("covers every event exactly once", () => {
    const events = generateCatalog(300);
    const result = decluster(events, { model: { kind: "reasenberg" } });
    const seen = new Set(
      [...result.independent, ...result.dependent].map((e) => e.event_id),
    );
    expect(seen.size).toBe(events.length);
    expect(result.independent.length + result.dependent.length).toBe(
      events.length,
    );
  });

  it("rejects settings it cannot honor", () => {
    const events = [quake("a", 5, 0, 0, 0)];
    expect(() =>
      decluster(events, { model: { kind: "reasenberg" }, scale: 2 }),
    ).toThrow(ConfigurationError);
    expect(() =>
      decluster(events, {
        model: { kind: "reasenberg" },
        mode: "nearest-in-time",
      }),
    ).toThrow(ConfigurationError);
    expect(() =>
      decluster(events, {
        model: { kind: "reasenberg", tauMin: 5, tauMax: 2 },
      }),
    ).toThrow("model.tauMin: must not exceed tauMax (5 > 2)");
    expect(() =>
      decluster(events, { model: { kind: "reasenberg", p: 1 } }),
    ).toThrow(ConfigurationError);
  });
});
