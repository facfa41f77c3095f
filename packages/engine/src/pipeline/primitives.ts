import type { PrimitiveDescriptor, PrimitiveKind } from "../types";

/**
 * Built-in primitives of the dispatch contract runtime. Callers extend or
 * override the table through `AuditPolicy.primitives`.
 */
export const BUILTIN_PRIMITIVES: Readonly<Record<string, PrimitiveDescriptor>> = {
  // authorization
  is_owner: { kind: "authorization-check", returns: "bool" },
  is_admin: { kind: "authorization-check", returns: "bool" },
  is_authorized: { kind: "authorization-check", returns: "bool" },
  check_owner: { kind: "authorization-check", returns: "bool" },
  verify_signature: { kind: "authorization-check", returns: "bool" },
  require_owner: { kind: "authorization-check", asserting: true },
  require_admin: { kind: "authorization-check", asserting: true },
  assert_owner: { kind: "authorization-check", asserting: true },
  only_owner: { kind: "authorization-check", asserting: true },

  // state
  load_bool_state: { kind: "state-read", returns: "bool", keyArg: 0 },
  load_int_state: { kind: "state-read", returns: "int", keyArg: 0 },
  load_long_long_state: { kind: "state-read", returns: "int", keyArg: 0 },
  load_string_state: { kind: "state-read", returns: "string", keyArg: 0 },
  save_bool_state: { kind: "state-write", keyArg: 0 },
  save_int_state: { kind: "state-write", keyArg: 0 },
  save_long_long_state: { kind: "state-write", keyArg: 0 },
  save_string_state: { kind: "state-write", keyArg: 0 },
  delete_state: { kind: "state-write", keyArg: 0 },

  // funds
  get_contract_balance: { kind: "balance-query", returns: "int" },
  get_balance: { kind: "balance-query", returns: "int" },
  send_funds: { kind: "fund-transfer", recipientArg: 0, amountArg: 1 },
  transfer_funds: { kind: "fund-transfer", recipientArg: 0, amountArg: 1 },
  burn_funds: { kind: "fund-transfer", amountArg: 0 },

  // cross-contract
  call_contract: { kind: "external-call", returns: "unknown" },
  invoke_procedure: { kind: "external-call", returns: "unknown" },

  // arithmetic
  safe_add: { kind: "checked-arithmetic", returns: "int", operator: "add" },
  safe_sub: { kind: "checked-arithmetic", returns: "int", operator: "sub" },
  safe_mul: { kind: "checked-arithmetic", returns: "int", operator: "mul" },

  // parameters and return values
  get_bool_from_params: { kind: "param-accessor", returns: "bool" },
  get_int_from_params: { kind: "param-accessor", returns: "int" },
  get_long_long_from_params: { kind: "param-accessor", returns: "int" },
  get_string_from_params: { kind: "param-accessor", returns: "string" },
  set_bool_return: { kind: "return-setter" },
  set_int_return: { kind: "return-setter" },
  set_long_long_return: { kind: "return-setter" },
  set_string_return: { kind: "return-setter" },
};

export type PrimitiveCatalog = ReadonlyMap<string, PrimitiveDescriptor>;

export function createPrimitiveCatalog(
  extra: Record<string, PrimitiveDescriptor> = {}
): PrimitiveCatalog {
  return new Map(Object.entries({ ...BUILTIN_PRIMITIVES, ...extra }));
}

export const DEFAULT_CATALOG: PrimitiveCatalog = createPrimitiveCatalog();

export function classifyCallee(catalog: PrimitiveCatalog, callee: string): PrimitiveKind {
  return catalog.get(callee)?.kind ?? "unknown";
}
