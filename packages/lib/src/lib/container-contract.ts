/**
 * Semantics shared by every list implementation: an ordered sequence with
 * 0-based indices. Reads, writes and deletes accept `[0, size)`, inserts accept
 * `[0, size]` (inserting at `size` appends). Any other index is a bounds fault.
 */
export interface ListContainer<T> {
  size(): number;
  append(value: T): void;
  get(index: number): T;
  set(index: number, value: T): void;
  insert(index: number, value: T): void;
  delete(index: number): void;
}

export type ListOperationKind =
  | "create"
  | "size"
  | "append"
  | "get"
  | "set"
  | "insert"
  | "delete";

export interface ListOperation {
  kind: ListOperationKind;
  /** Method name in Keel source, e.g. `xs.add(1)`. Absent for construction. */
  method?: string;
  /** Suffix appended to the instantiation name in emitted code. */
  suffix: string;
  /** Arguments taken at the source level, excluding the receiver. */
  arity: number;
  structural: boolean;
}

export const LIST_OPERATIONS: readonly ListOperation[] = [
  { kind: "create", suffix: "constructor", arity: 0, structural: false },
  { kind: "size", method: "size", suffix: "size", arity: 0, structural: false },
  { kind: "append", method: "add", suffix: "add", arity: 1, structural: true },
  { kind: "get", method: "get", suffix: "get", arity: 1, structural: false },
  { kind: "set", method: "set", suffix: "set", arity: 2, structural: false },
  { kind: "delete", method: "del", suffix: "del", arity: 1, structural: true },
  {
    kind: "insert",
    method: "insert",
    suffix: "insert",
    arity: 2,
    structural: true,
  },
];

export const getListOperation = (kind: ListOperationKind): ListOperation => {
  const operation = LIST_OPERATIONS.find((op) => op.kind === kind);
  if (!operation) {
    throw new Error(`unknown list operation ${kind}`);
  }
  return operation;
};

export const findListMethod = (method: string): ListOperation | undefined =>
  LIST_OPERATIONS.find((op) => op.method === method);

export const listOperationName = (
  instanceName: string,
  kind: ListOperationKind
): string => `${instanceName}_${getListOperation(kind).suffix}`;
