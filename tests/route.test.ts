import { describe, it, expect, vi } from "vitest";
import {
  RouteMap,
  RouteMapSealedError,
  anyValue,
  matchesConstraint,
  oneOf,
  toConstraint,
} from "../src/route.js";
import type { Logger } from "../src/logger.js";

function recordingLogger() {
  const debug = vi.fn();
  const logger: Logger = { debug, info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  return { logger, debug };
}

describe("constraints", () => {
  it("anyValue matches every value", () => {
    expect(matchesConstraint(anyValue, 0)).toBe(true);
    expect(matchesConstraint(anyValue, 65535)).toBe(true);
  });

  it("oneOf matches only its members", () => {
    const constraint = oneOf([1, 3]);
    expect(matchesConstraint(constraint, 1)).toBe(true);
    expect(matchesConstraint(constraint, 2)).toBe(false);
  });

  it("toConstraint treats null and undefined as any value", () => {
    expect(toConstraint(null)).toBe(anyValue);
    expect(toConstraint(undefined)).toBe(anyValue);
  });

  it("toConstraint copies constraints and wraps collections", () => {
    const constraint = oneOf([5]);
    expect(toConstraint(constraint)).toEqual(constraint);
    expect(toConstraint(constraint)).not.toBe(constraint);
    expect(toConstraint(anyValue)).toBe(anyValue);
    expect(toConstraint(new Set([7, 8]))).toEqual({ kind: "oneOf", values: new Set([7, 8]) });
  });

  it("an empty collection matches nothing", () => {
    expect(matchesConstraint(toConstraint([]), 0)).toBe(false);
  });
});

describe("RouteMap", () => {
  it("matches on slave id, function code and any address", () => {
    const routes = new RouteMap<string>();
    routes.addRule("A", [1], [3], null);

    expect(routes.match(1, 3, 42)).toBe("A");
    expect(routes.match(2, 3, 42)).toBeUndefined();
    expect(routes.match(1, 4, 42)).toBeUndefined();
  });

  it("matches on address sets", () => {
    const routes = new RouteMap<string>();
    const addresses = Array.from({ length: 10 }, (_, i) => 100 + i);
    routes.addRule("block", null, [1, 2], addresses);

    expect(routes.match(9, 1, 100)).toBe("block");
    expect(routes.match(9, 2, 109)).toBe("block");
    expect(routes.match(9, 1, 110)).toBeUndefined();
  });

  it("returns the first rule added when several match", () => {
    const routes = new RouteMap<string>();
    routes.addRule("first", null, [3], [0, 1, 2]);
    routes.addRule("second", null, [3], null);

    expect(routes.match(1, 3, 1)).toBe("first");
    expect(routes.match(1, 3, 5)).toBe("second");
  });

  it("returns undefined when no rules are registered", () => {
    expect(new RouteMap<string>().match(1, 3, 0)).toBeUndefined();
  });

  describe("slave id scope", () => {
    function twoSlaveRoutes(routes: RouteMap<string>): RouteMap<string> {
      routes.addRule("A", [1], [3], null);
      routes.addRule("B", [2], [4], null);
      return routes;
    }

    it("checks only the first rule's slave ids by default", () => {
      const routes = twoSlaveRoutes(new RouteMap<string>());
      expect(routes.slaveIdScope).toBe("first-rule");

      // Slave 2 is rejected by rule A even though rule B lists it
      expect(routes.match(2, 4, 0)).toBeUndefined();
      // Rule B's own slave ids are not consulted
      expect(routes.match(1, 4, 0)).toBe("B");
    });

    it("checks each rule's slave ids with per-rule scope", () => {
      const routes = twoSlaveRoutes(new RouteMap<string>({ slaveIdScope: "per-rule" }));
      expect(routes.match(2, 4, 0)).toBe("B");
      expect(routes.match(1, 4, 0)).toBeUndefined();
      expect(routes.match(1, 3, 0)).toBe("A");
    });
  });

  describe("sealing", () => {
    it("starts in the building state and seals once", () => {
      const routes = new RouteMap<string>();
      expect(routes.state).toBe("building");
      expect(routes.seal()).toBe(routes);
      expect(routes.state).toBe("sealed");
      routes.seal();
      expect(routes.state).toBe("sealed");
    });

    it("rejects rules after sealing", () => {
      const routes = new RouteMap<string>();
      routes.addRule("A", null, null, null);
      routes.seal();

      expect(() => routes.addRule("B", null, null, null)).toThrow(RouteMapSealedError);
      expect(routes.size).toBe(1);
    });

    it("ignores later changes to a set passed in a constraint", () => {
      const routes = new RouteMap<string>();
      const functionCodes = new Set([1]);
      routes.addRule("A", null, { kind: "oneOf", values: functionCodes }, null);
      routes.seal();

      functionCodes.add(2);
      expect(routes.match(1, 2, 0)).toBeUndefined();
      expect(routes.match(1, 1, 0)).toBe("A");
    });

    it("keeps matching after sealing", () => {
      const routes = new RouteMap<number>();
      routes.addRule(7, [1], [5, 15], null);
      routes.seal();
      expect(routes.match(1, 15, 3)).toBe(7);
    });
  });

  it("exposes frozen rules in match order", () => {
    const routes = new RouteMap<string>();
    routes.addRule("A", [1], null, null);
    routes.addRule("B", null, [6], null);

    const rules = routes.rules;
    expect(rules.map((rule) => rule.endpoint)).toEqual(["A", "B"]);
    expect(Object.isFrozen(rules[0])).toBe(true);
    expect(rules[1].functionCodes).toEqual({ kind: "oneOf", values: new Set([6]) });
    expect(rules[1].slaveIds).toBe(anyValue);
  });

  it("logs registration and unmatched requests", () => {
    const { logger, debug } = recordingLogger();
    const routes = new RouteMap<string>({ logger });
    routes.addRule("A", [1], [3], null);
    routes.match(1, 4, 42);
    routes.seal();

    expect(debug).toHaveBeenNthCalledWith(
      1,
      "Rule 0: slaves=[1] functions=[3] addresses=*"
    );
    expect(debug).toHaveBeenNthCalledWith(
      2,
      "No route for slave=1 function=4 address=42"
    );
    expect(debug).toHaveBeenNthCalledWith(3, "Route map sealed with 1 rule(s)");
  });

  it("logs a slave id rejected by the first rule", () => {
    const { logger, debug } = recordingLogger();
    const routes = new RouteMap<string>({ logger });
    routes.addRule("A", [1], null, null);
    routes.match(2, 3, 0);

    expect(debug).toHaveBeenLastCalledWith("Slave id 2 rejected by first rule");
  });
});
