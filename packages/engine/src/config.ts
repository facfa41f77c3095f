/**
 * Audit Policy
 *
 * Detector severities, risk weights and sensitive state keys. Read from the
 * environment or passed as overrides; unknown keys are rejected.
 */

import { z } from "zod";
import { PolicyError } from "./errors";
import type { AuditPolicy, PrimitiveDescriptor, RuleId, Severity } from "./types";
import { RULE_IDS, SEVERITIES } from "./types";

export const DEFAULT_SEVERITIES: Record<RuleId, Severity> = {
  ACCESS_CONTROL: "critical",
  INTEGER_OVERFLOW: "high",
  REENTRANCY: "high",
  OVERLAPPING_DISPATCH: "low",
  UNREACHABLE_DISPATCH: "low",
};

export const DEFAULT_WEIGHTS: Record<Severity, number> = {
  critical: 10,
  high: 5,
  medium: 2,
  low: 1,
};

export const DEFAULT_SENSITIVE_KEYS = [
  "owner",
  "admin",
  "authority",
  "balance",
  "fund",
  "treasury",
  "reserve",
  "supply",
  "fee",
  "paused",
];

const SeveritySchema = z.enum(["critical", "high", "medium", "low"]);

const PrimitiveSchema = z
  .object({
    kind: z.enum([
      "authorization-check",
      "state-read",
      "state-write",
      "fund-transfer",
      "balance-query",
      "external-call",
      "checked-arithmetic",
      "param-accessor",
      "return-setter",
      "unknown",
    ]),
    returns: z.enum(["bool", "int", "string", "unknown"]).optional(),
    keyArg: z.number().int().nonnegative().optional(),
    amountArg: z.number().int().nonnegative().optional(),
    recipientArg: z.number().int().nonnegative().optional(),
    asserting: z.boolean().optional(),
    operator: z.enum(["add", "sub", "mul"]).optional(),
  })
  .strict();

export const PolicyOverridesSchema = z
  .object({
    severities: z
      .object({
        ACCESS_CONTROL: SeveritySchema,
        INTEGER_OVERFLOW: SeveritySchema,
        REENTRANCY: SeveritySchema,
        OVERLAPPING_DISPATCH: SeveritySchema,
        UNREACHABLE_DISPATCH: SeveritySchema,
      })
      .partial()
      .strict(),
    weights: z
      .object({
        critical: z.number().int().nonnegative(),
        high: z.number().int().nonnegative(),
        medium: z.number().int().nonnegative(),
        low: z.number().int().nonnegative(),
      })
      .partial()
      .strict(),
    sensitiveKeys: z.array(z.string().min(1)),
    primitives: z.record(z.string().regex(/^[A-Za-z_][A-Za-z0-9_.]*$/), PrimitiveSchema),
  })
  .partial()
  .strict();

export type PolicyOverrides = z.infer<typeof PolicyOverridesSchema>;

/** Merge validated overrides onto the defaults. Throws `PolicyError`. */
export function resolvePolicy(overrides: unknown = {}): AuditPolicy {
  const parsed = PolicyOverridesSchema.safeParse(overrides);
  if (!parsed.success) {
    throw new PolicyError(
      parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    );
  }
  const o = parsed.data;
  const primitives: Record<string, PrimitiveDescriptor> = { ...o.primitives };
  return {
    severities: { ...DEFAULT_SEVERITIES, ...o.severities },
    weights: { ...DEFAULT_WEIGHTS, ...o.weights },
    sensitiveKeys: o.sensitiveKeys ?? [...DEFAULT_SENSITIVE_KEYS],
    primitives,
  };
}

export const DEFAULT_POLICY: AuditPolicy = resolvePolicy();

type Env = Record<string, string | undefined>;

/**
 * Policy from environment variables:
 * `AUDIT_SEVERITY_<RULE>`, `AUDIT_WEIGHT_<SEVERITY>`, `AUDIT_SENSITIVE_KEYS`
 * (comma separated).
 */
export function loadAuditPolicy(env: Env = process.env): AuditPolicy {
  const severities: Record<string, string> = {};
  for (const rule of RULE_IDS) {
    const v = env[`AUDIT_SEVERITY_${rule}`];
    if (v) severities[rule] = v.trim().toLowerCase();
  }

  const weights: Record<string, number> = {};
  for (const severity of SEVERITIES) {
    const v = env[`AUDIT_WEIGHT_${severity.toUpperCase()}`];
    if (v) weights[severity] = Number(v);
  }

  const overrides: Record<string, unknown> = { severities, weights };
  const keys = env.AUDIT_SENSITIVE_KEYS;
  if (keys) {
    overrides.sensitiveKeys = keys.split(",").map((k) => k.trim()).filter(Boolean);
  }
  return resolvePolicy(overrides);
}
