/**
 * Grain data model
 *
 * Values flow through here on every operation; none of them outlive it.
 */

// =============================================================================
// Values
// =============================================================================

export interface ScalarGrainValue {
  kind: "scalar";
  value: string;
}

/**
 * A list grain. Semantically a set: duplicates are meaningless and order
 * carries no weight when diffing against the host.
 */
export interface ListGrainValue {
  kind: "list";
  values: string[];
}

export type GrainValue = ScalarGrainValue | ListGrainValue;

export type GrainKind = GrainValue["kind"];

export function scalar(value: string): ScalarGrainValue {
  return { kind: "scalar", value };
}

export function list(values: readonly string[]): ListGrainValue {
  return { kind: "list", values: [...values] };
}

// =============================================================================
// State
// =============================================================================

/**
 * What the caller wants a grain to look like on one host.
 */
export interface GrainState<V extends GrainValue = GrainValue> {
  host: string;
  key: string;
  value: V;
  /** Run state.apply after a successful mutation */
  apply: boolean;
}

export type DesiredState<V extends GrainValue = GrainValue> = GrainState<V>;

/**
 * A state whose value kind is known to the type system; lets a check on
 * `value.kind` narrow the whole state.
 */
export type AnyGrainState = GrainState<ScalarGrainValue> | GrainState<ListGrainValue>;

export function isScalarState(state: AnyGrainState): state is GrainState<ScalarGrainValue> {
  return state.value.kind === "scalar";
}

/**
 * Same shape as the desired state, with the value read back from the host.
 */
export type LiveState<V extends GrainValue = GrainValue> = GrainState<V>;

/**
 * Correlation label returned to the caller, e.g. `web01.example.com-roles`.
 */
export function grainId(host: string, key: string): string {
  return `${host}-${key}`;
}

/**
 * Drops repeated elements, keeping the first occurrence's position.
 */
export function uniqueValues(values: readonly string[]): string[] {
  return [...new Set(values)];
}

// =============================================================================
// Operation Results
// =============================================================================

export type GrainOperation = "create" | "read" | "update" | "delete";

export interface GrainOperationResult<V extends GrainValue = GrainValue> {
  id: string;
  operation: GrainOperation;
  /** Desired state after a mutation, live state after a read */
  state: GrainState<V>;
  /** Non-fatal diagnostics, e.g. the state.apply outcome */
  warnings: string[];
  /** Log excerpt from state.apply when it ran */
  convergenceLog?: string;
}
