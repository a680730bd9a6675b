import { z } from "zod";

// Schemas for command model documents (YAML or JSON). Types use
// z.output<typeof Schema> so defaults are applied.

// ============================================================================
// Types
// ============================================================================

export const PrimitiveTypeSchema = z.enum(["string", "boolean", "integer", "number", "bigint", "char"]);

export const WellKnownTypeSchema = z.enum(["url", "date", "duration", "uuid", "file", "directory", "ip"]);

export const EnumTypeSchema = z.object({
  enum: z.string().min(1),
  // A list is numbered 0, 1, 2... (or 1, 2, 4... for flags)
  members: z.union([z.array(z.string().min(1)).min(1), z.record(z.string(), z.number().int())]),
  flags: z.boolean().default(false),
});
export type EnumTypeDocument = z.output<typeof EnumTypeSchema>;

export const CustomTypeSchema = z.object({
  custom: z.string().min(1),
});

export const ScalarTypeSchema = z.union([PrimitiveTypeSchema, WellKnownTypeSchema, EnumTypeSchema, CustomTypeSchema]);
export type ScalarTypeDocument = z.output<typeof ScalarTypeSchema>;

export const TypeSchema = z.union([ScalarTypeSchema, z.object({ list: ScalarTypeSchema })]);
export type TypeDocument = z.output<typeof TypeSchema>;

// ============================================================================
// Parameters
// ============================================================================

export const ValidationRuleSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("range"), min: z.number(), max: z.number() }),
  z.object({
    kind: z.literal("pattern"),
    pattern: z.string(),
    flags: z.string().optional(),
    message: z.string().optional(),
  }),
  z.object({ kind: z.literal("file-exists") }),
  z.object({ kind: z.literal("directory-exists") }),
]);

export const ParameterSchema = z.object({
  name: z.string().min(1),
  kind: z.enum(["option", "argument"]).default("option"),
  shortName: z.string().length(1).optional(),
  description: z.string().optional(),
  required: z.boolean().optional(),
  default: z.unknown().optional(),
  env: z.string().min(1).optional(),
  prompt: z.string().optional(),
  secure: z.boolean().default(false),
  type: TypeSchema.default("string"),
  exclusive: z.string().optional(),
  validate: z.array(ValidationRuleSchema).default([]),
});
export type ParameterDocument = z.output<typeof ParameterSchema>;

// ============================================================================
// Hooks & Exit Codes
// ============================================================================

export const HookSchema = z.object({
  phase: z.enum(["before", "after", "error"]),
  handler: z.string().min(1),
  order: z.number().int().default(0),
});
export type HookDocument = z.output<typeof HookSchema>;

export const ExitCodeSchema = z.object({
  // Error class name or system error code, e.g. ENOENT
  error: z.string().min(1),
  code: z.number().int().min(0).max(255),
});

// ============================================================================
// Commands & Actions
// ============================================================================

export const ActionSchema = z.object({
  name: z.string().min(1),
  aliases: z.array(z.string().min(1)).default([]),
  description: z.string().optional(),
  hidden: z.boolean().default(false),
  primary: z.boolean().default(false),
  handler: z.string().min(1),
  returnsExitCode: z.boolean().default(false),
  parameters: z.array(ParameterSchema).default([]),
  hooks: z.array(HookSchema).default([]),
  exitCodes: z.array(ExitCodeSchema).default([]),
});
export type ActionDocument = z.output<typeof ActionSchema>;

const CommandBaseSchema = z.object({
  name: z.string().min(1),
  aliases: z.array(z.string().min(1)).default([]),
  description: z.string().optional(),
  hidden: z.boolean().default(false),
  actions: z.array(ActionSchema).default([]),
  hooks: z.array(HookSchema).default([]),
  exitCodes: z.array(ExitCodeSchema).default([]),
});

export type CommandDocument = z.output<typeof CommandBaseSchema> & {
  commands: CommandDocument[];
};

type CommandDocumentInput = z.input<typeof CommandBaseSchema> & {
  commands?: CommandDocumentInput[];
};

export const CommandSchema: z.ZodType<CommandDocument, z.ZodTypeDef, CommandDocumentInput> =
  CommandBaseSchema.extend({
    commands: z.lazy(() => z.array(CommandSchema)).default([]),
  });

export const ModelDocumentSchema = CommandBaseSchema.extend({
  version: z.string().optional(),
  globalOptions: z.array(ParameterSchema).default([]),
  commands: z.array(CommandSchema).default([]),
});
export type ModelDocument = z.output<typeof ModelDocumentSchema>;
