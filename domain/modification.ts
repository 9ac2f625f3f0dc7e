/**
 * Star modifications: immutable requests to change a star, one variant per type.
 * Wire input is untrusted; parse it here before it reaches the engine.
 */

import { z } from "zod";
import type { EmpireId, Identifier } from "./core.js";
import { DESIGN_TYPES, type DesignType } from "./designs.js";
import { FLEET_STANCES, type ColonyFocus, type FleetStance } from "./star.js";
import { ValidationError } from "./errors.js";

export const MODIFICATION_TYPES = [
  "COLONIZE",
  "CREATE_FLEET",
  "CREATE_BUILDING",
  "ADJUST_FOCUS",
  "ADD_BUILD_REQUEST",
  "DELETE_BUILD_REQUEST",
  "SPLIT_FLEET",
  "MERGE_FLEET",
  "MOVE_FLEET",
  "EMPTY_NATIVE",
] as const;

export type ModificationType = (typeof MODIFICATION_TYPES)[number];

/** Fleet supplied by the caller to CREATE_FLEET instead of design + count. */
export interface FleetTemplate {
  readonly empireId: EmpireId;
  readonly designType: DesignType;
  readonly numShips: number;
  readonly stance: FleetStance;
}

export interface Colonize {
  readonly type: "COLONIZE";
  /** `null` colonizes for the natives (game events), without a colony ship. */
  readonly empireId: EmpireId;
  readonly planetIndex: number;
}

export interface CreateFleet {
  readonly type: "CREATE_FLEET";
  readonly empireId: EmpireId;
  readonly designType: DesignType;
  readonly count: number;
  readonly fleet?: FleetTemplate;
}

export interface CreateBuilding {
  readonly type: "CREATE_BUILDING";
  readonly empireId: EmpireId;
  readonly colonyId: Identifier;
  readonly designType: DesignType;
}

export interface AdjustFocus {
  readonly type: "ADJUST_FOCUS";
  readonly empireId: EmpireId;
  readonly colonyId: Identifier;
  readonly focus: Readonly<ColonyFocus>;
}

export interface AddBuildRequest {
  readonly type: "ADD_BUILD_REQUEST";
  readonly empireId: EmpireId;
  readonly colonyId: Identifier;
  readonly designType: DesignType;
  readonly count: number;
}

export interface DeleteBuildRequest {
  readonly type: "DELETE_BUILD_REQUEST";
  readonly empireId: EmpireId;
  readonly buildRequestId: Identifier;
}

export interface SplitFleet {
  readonly type: "SPLIT_FLEET";
  readonly empireId: EmpireId;
  readonly fleetId: Identifier;
  readonly count: number;
}

export interface MergeFleet {
  readonly type: "MERGE_FLEET";
  readonly empireId: EmpireId;
  readonly fleetId: Identifier;
  readonly additionalFleetIds: readonly Identifier[];
}

export interface MoveFleet {
  readonly type: "MOVE_FLEET";
  readonly empireId: EmpireId;
  readonly fleetId: Identifier;
  /** Destination star. */
  readonly starId: Identifier;
}

export interface EmptyNative {
  readonly type: "EMPTY_NATIVE";
}

export type Modification =
  | Colonize
  | CreateFleet
  | CreateBuilding
  | AdjustFocus
  | AddBuildRequest
  | DeleteBuildRequest
  | SplitFleet
  | MergeFleet
  | MoveFleet
  | EmptyNative;

/** The variant of Modification carrying the given type tag. */
export type ModificationOf<T extends ModificationType> = Extract<Modification, { type: T }>;

// --- Wire schemas ---

const identifierSchema = z.number().int().nonnegative();
const empireIdSchema = identifierSchema.nullable().default(null);
const designTypeSchema = z.enum(DESIGN_TYPES);
const countSchema = z.number().finite().positive();

const focusSchema = z.object({
  construction: z.number().finite(),
  energy: z.number().finite(),
  farming: z.number().finite(),
  mining: z.number().finite(),
});

const fleetTemplateSchema = z.object({
  empireId: empireIdSchema,
  designType: designTypeSchema,
  numShips: countSchema,
  stance: z.enum(FLEET_STANCES),
});

export const modificationSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("COLONIZE"),
    empireId: empireIdSchema,
    planetIndex: z.number().int().nonnegative(),
  }),
  z.object({
    type: z.literal("CREATE_FLEET"),
    empireId: empireIdSchema,
    designType: designTypeSchema,
    count: countSchema,
    fleet: fleetTemplateSchema.optional(),
  }),
  z.object({
    type: z.literal("CREATE_BUILDING"),
    empireId: empireIdSchema,
    colonyId: identifierSchema,
    designType: designTypeSchema,
  }),
  z.object({
    type: z.literal("ADJUST_FOCUS"),
    empireId: empireIdSchema,
    colonyId: identifierSchema,
    focus: focusSchema,
  }),
  z.object({
    type: z.literal("ADD_BUILD_REQUEST"),
    empireId: empireIdSchema,
    colonyId: identifierSchema,
    designType: designTypeSchema,
    count: z.number().int().positive(),
  }),
  z.object({
    type: z.literal("DELETE_BUILD_REQUEST"),
    empireId: empireIdSchema,
    buildRequestId: identifierSchema,
  }),
  z.object({
    type: z.literal("SPLIT_FLEET"),
    empireId: empireIdSchema,
    fleetId: identifierSchema,
    count: z.number().int().positive(),
  }),
  z.object({
    type: z.literal("MERGE_FLEET"),
    empireId: empireIdSchema,
    fleetId: identifierSchema,
    additionalFleetIds: z.array(identifierSchema),
  }),
  z.object({
    type: z.literal("MOVE_FLEET"),
    empireId: empireIdSchema,
    fleetId: identifierSchema,
    starId: identifierSchema,
  }),
  z.object({
    type: z.literal("EMPTY_NATIVE"),
  }),
]);

function toValidationError(error: z.ZodError, prefix: readonly (string | number)[] = []): ValidationError {
  const first = error.issues[0];
  const path = [...prefix, ...(first?.path ?? [])];
  const where = path.length > 0 ? ` at ${path.join(".")}` : "";
  return new ValidationError(`Invalid modification${where}: ${first?.message ?? "unknown error"}`, {
    issues: error.issues,
  });
}

const KNOWN_TYPES: ReadonlySet<string> = new Set(MODIFICATION_TYPES);
const taggedSchema = z.object({ type: z.string() });

/** Parse one untrusted modification. Throws ValidationError, unknown types included. */
export function parseModification(input: unknown): Modification {
  const result = modificationSchema.safeParse(input);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Parse an untrusted ordered list of modifications, entry by entry.
 * Entries whose `type` is a string this engine does not know are left out and
 * reported through `onUnknownType`; any other malformed entry throws ValidationError.
 */
export function parseModifications(
  input: unknown,
  onUnknownType?: (type: string, index: number) => void
): Modification[] {
  const list = z.array(z.unknown()).safeParse(input);
  if (!list.success) {
    throw toValidationError(list.error);
  }
  const modifications: Modification[] = [];
  list.data.forEach((entry, index) => {
    const tagged = taggedSchema.safeParse(entry);
    if (tagged.success && !KNOWN_TYPES.has(tagged.data.type)) {
      onUnknownType?.(tagged.data.type, index);
      return;
    }
    const result = modificationSchema.safeParse(entry);
    if (!result.success) {
      throw toValidationError(result.error, [index]);
    }
    modifications.push(result.data);
  });
  return modifications;
}
