/**
 * Request routing for Modbus servers.
 *
 * A `RouteMap` is an ordered list of rules, each tying an endpoint to the
 * slave ids, function codes and addresses it serves. Matching is
 * first-match-wins in insertion order, so register the most specific rules
 * first. The map is built during setup and sealed before serving; a sealed
 * map rejects new rules.
 */

import { type Logger, resolveLogger } from "./logger.js";

// ---------- Constraints ----------

export type Constraint =
  | { readonly kind: "any" }
  | { readonly kind: "oneOf"; readonly values: ReadonlySet<number> };

const ANY: Constraint = { kind: "any" };

export const anyValue: Constraint = Object.freeze(ANY);

export function oneOf(values: Iterable<number>): Constraint {
  const constraint: Constraint = { kind: "oneOf", values: new Set(values) };
  return Object.freeze(constraint);
}

/**
 * `null` and `undefined` mean "any value"; a collection is a set of accepted
 * values. A `oneOf` constraint is copied so the caller's set cannot change it.
 */
export function toConstraint(
  values: Constraint | Iterable<number> | null | undefined
): Constraint {
  if (values === null || values === undefined) {
    return anyValue;
  }
  if (isConstraint(values)) {
    return values.kind === "oneOf" ? oneOf(values.values) : anyValue;
  }
  return oneOf(values);
}

function isConstraint(value: Constraint | Iterable<number>): value is Constraint {
  return "kind" in value;
}

export function matchesConstraint(constraint: Constraint, value: number): boolean {
  switch (constraint.kind) {
    case "any":
      return true;
    case "oneOf":
      return constraint.values.has(value);
  }
}

function describeConstraint(constraint: Constraint): string {
  switch (constraint.kind) {
    case "any":
      return "*";
    case "oneOf":
      return `[${[...constraint.values].join(",")}]`;
  }
}

// ---------- Rules ----------

export interface Rule<E> {
  readonly endpoint: E;
  readonly slaveIds: Constraint;
  readonly functionCodes: Constraint;
  readonly addresses: Constraint;
}

export type ConstraintInput = Constraint | Iterable<number> | null | undefined;

// ---------- Errors ----------

export class RouteMapSealedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RouteMapSealedError";
  }
}

// ---------- Options ----------

/**
 * Which rules the slave id is checked against.
 *
 * `first-rule` checks only the first registered rule's slave ids and
 * rejects the request outright on a mismatch; `per-rule` checks each rule's
 * own slave ids alongside its function codes and addresses.
 */
export type SlaveIdScope = "first-rule" | "per-rule";

export interface RouteMapOptions {
  /** Default: "first-rule" */
  slaveIdScope?: SlaveIdScope;
  /** Enable verbose/debug logging. Default: false */
  verbose?: boolean;
  /** Custom logger instance */
  logger?: Logger;
}

export type RouteMapState = "building" | "sealed";

// ---------- Route map ----------

export class RouteMap<E> {
  public readonly slaveIdScope: SlaveIdScope;

  private log: Logger;
  private readonly ruleList: Rule<E>[] = [];
  private currentState: RouteMapState = "building";

  constructor(options: RouteMapOptions = {}) {
    this.slaveIdScope = options.slaveIdScope ?? "first-rule";
    this.log = resolveLogger(options);
  }

  get state(): RouteMapState {
    return this.currentState;
  }

  get size(): number {
    return this.ruleList.length;
  }

  /** Snapshot of the registered rules in match order. */
  get rules(): readonly Rule<E>[] {
    return [...this.ruleList];
  }

  /**
   * Append a rule. Overlaps with earlier rules are not checked; an earlier
   * rule that matches the same request wins.
   *
   * @throws RouteMapSealedError once the map has been sealed
   */
  addRule(
    endpoint: E,
    slaveIds: ConstraintInput,
    functionCodes: ConstraintInput,
    addresses: ConstraintInput
  ): Rule<E> {
    if (this.currentState === "sealed") {
      throw new RouteMapSealedError("Cannot add a rule to a sealed route map");
    }

    const rule: Rule<E> = Object.freeze({
      endpoint,
      slaveIds: toConstraint(slaveIds),
      functionCodes: toConstraint(functionCodes),
      addresses: toConstraint(addresses),
    });
    this.ruleList.push(rule);
    this.log.debug(
      `Rule ${this.ruleList.length - 1}: slaves=${describeConstraint(rule.slaveIds)} ` +
        `functions=${describeConstraint(rule.functionCodes)} ` +
        `addresses=${describeConstraint(rule.addresses)}`
    );
    return rule;
  }

  /** Stop accepting rules. Calling it again has no effect. */
  seal(): this {
    if (this.currentState === "building") {
      this.currentState = "sealed";
      this.log.debug(`Route map sealed with ${this.ruleList.length} rule(s)`);
    }
    return this;
  }

  /**
   * Find the endpoint for a request.
   *
   * @returns The endpoint of the first matching rule, or `undefined`
   */
  match(slaveId: number, functionCode: number, address: number): E | undefined {
    const first = this.ruleList[0];
    if (first === undefined) {
      this.log.debug("No rules registered");
      return undefined;
    }

    if (
      this.slaveIdScope === "first-rule" &&
      !matchesConstraint(first.slaveIds, slaveId)
    ) {
      this.log.debug(`Slave id ${slaveId} rejected by first rule`);
      return undefined;
    }

    for (const rule of this.ruleList) {
      if (
        this.slaveIdScope === "per-rule" &&
        !matchesConstraint(rule.slaveIds, slaveId)
      ) {
        continue;
      }
      if (
        matchesConstraint(rule.functionCodes, functionCode) &&
        matchesConstraint(rule.addresses, address)
      ) {
        return rule.endpoint;
      }
    }

    this.log.debug(
      `No route for slave=${slaveId} function=${functionCode} address=${address}`
    );
    return undefined;
  }
}
