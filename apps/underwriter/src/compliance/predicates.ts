import type { AttributeValue, Condition } from "@embedded-uw/shared";

type Attributes = Readonly<Record<string, AttributeValue | undefined>>;

/**
 * Evaluate one condition. An absent attribute, or a value of the wrong type
 * for the operator, is a non-match; this never throws.
 */
export function matchCondition(condition: Condition, attrs: Attributes): boolean {
  const actual = attrs[condition.attr];
  if (actual === undefined) return false;

  switch (condition.op) {
    case "eq":
      return actual === condition.value;
    case "neq":
      return actual !== condition.value;
    case "in":
      return condition.values.includes(actual);
    case "not_in":
      return !condition.values.includes(actual);
    case "lt":
    case "lte":
    case "gt":
    case "gte": {
      if (typeof actual !== "number" || !Number.isFinite(actual)) return false;
      if (condition.op === "lt") return actual < condition.value;
      if (condition.op === "lte") return actual <= condition.value;
      if (condition.op === "gt") return actual > condition.value;
      return actual >= condition.value;
    }
  }
}

/** AND over all conditions; an empty list always matches. */
export function matchAll(conditions: readonly Condition[], attrs: Attributes): boolean {
  return conditions.every((c) => matchCondition(c, attrs));
}
