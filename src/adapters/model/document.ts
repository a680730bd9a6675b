/**
 * Model Documents
 *
 * Validates a YAML/JSON command model document and links it into a
 * CommandModel. Handler ids in the document must already be registered.
 */

import {
  action,
  afterHook,
  argument,
  beforeHook,
  command,
  customType,
  defineModel,
  enumOf,
  errorHook,
  mapExitCode,
  option,
  type ActionDraft,
  type CommandDraft,
  type CommandModel,
  type HookDefinition,
} from "../../core/model.js";
import { createConverterRegistry, type TypeConverterRegistry } from "../../core/conversion.js";
import type { HandlerRegistry } from "../../core/handlers.js";
import {
  ModelDocumentSchema,
  PrimitiveTypeSchema,
  WellKnownTypeSchema,
  type ActionDocument,
  type CommandDocument,
  type HookDocument,
  type ModelDocument,
  type ParameterDocument,
  type ScalarTypeDocument,
  type TypeDocument,
} from "../../core/schemas.js";
import type { ParameterSpec, ScalarType, TypeDescriptor } from "../../core/types.js";
import { errorMessage, ModelError } from "../../core/utils.js";

export interface LoadedModel {
  model: CommandModel;
  /** The document's `version`, if it has one */
  version?: string;
}

// ============================================================================
// Validation
// ============================================================================

export function parseModelDocument(data: unknown, origin = "model"): ModelDocument {
  const result = ModelDocumentSchema.safeParse(data);
  if (!result.success) {
    throw new ModelError(
      result.error.issues.map((issue) => {
        const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
        return `${origin}: ${where}: ${issue.message}`;
      })
    );
  }
  return result.data;
}

// ============================================================================
// Linking
// ============================================================================

function toScalarType(doc: ScalarTypeDocument): ScalarType {
  if (typeof doc === "string") {
    const primitive = PrimitiveTypeSchema.safeParse(doc);
    if (primitive.success) return { kind: "primitive", name: primitive.data };
    return { kind: "well-known", name: WellKnownTypeSchema.parse(doc) };
  }

  if ("custom" in doc) return customType(doc.custom);

  const flags = doc.flags;
  const members = Array.isArray(doc.members)
    ? Object.fromEntries(doc.members.map((name, i) => [name, flags ? 2 ** i : i]))
    : doc.members;
  return enumOf(doc.enum, members, { flags });
}

function toType(doc: TypeDocument): TypeDescriptor {
  if (typeof doc === "object" && "list" in doc) {
    return { kind: "collection", element: toScalarType(doc.list) };
  }
  return toScalarType(doc);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/**
 * Turns validated documents into drafts. Text defaults go through the
 * converter of the parameter's type.
 */
class DocumentLinker {
  readonly issues: string[] = [];

  constructor(
    private converters: TypeConverterRegistry,
    private origin: string
  ) {}

  parameter(doc: ParameterDocument): ParameterSpec {
    const build = doc.kind === "argument" ? argument : option;
    const type = toType(doc.type);
    return build(doc.name, {
      type,
      shortName: doc.shortName,
      description: doc.description,
      required: doc.required,
      default: this.defaultValue(doc, type),
      envVar: doc.env,
      prompt: doc.prompt,
      securePrompt: doc.secure,
      exclusive: doc.exclusive,
      validate: doc.validate,
    });
  }

  action(doc: ActionDocument): ActionDraft {
    return action(doc.name, {
      aliases: doc.aliases,
      description: doc.description,
      hidden: doc.hidden,
      primary: doc.primary,
      handler: doc.handler,
      returnsExitCode: doc.returnsExitCode,
      parameters: doc.parameters.map((p) => this.parameter(p)),
      hooks: doc.hooks.map(toHook),
      exitCodes: doc.exitCodes.map((e) => mapExitCode(e.error, e.code)),
    });
  }

  command(doc: CommandDocument): CommandDraft {
    return command(doc.name, {
      aliases: doc.aliases,
      description: doc.description,
      hidden: doc.hidden,
      commands: doc.commands.map((c) => this.command(c)),
      actions: doc.actions.map((a) => this.action(a)),
      hooks: doc.hooks.map(toHook),
      exitCodes: doc.exitCodes.map((e) => mapExitCode(e.error, e.code)),
    });
  }

  private defaultValue(doc: ParameterDocument, type: TypeDescriptor): unknown {
    const value = doc.default;
    let raw: string[];
    if (typeof value === "string") {
      raw = this.converters.splitFor(type, value);
    } else if (type.kind === "collection" && isStringList(value)) {
      raw = value;
    } else {
      return value;
    }

    try {
      return this.converters.convert(type, raw);
    } catch (error) {
      this.issues.push(`${this.origin}: default of '${doc.name}': ${errorMessage(error)}`);
      return undefined;
    }
  }
}

/**
 * Validate `data` as a model document and link it against `handlers`.
 * Custom-typed defaults need their converter registered in `converters`.
 * Throws ModelError for schema or structural problems.
 */
export function linkModelDocument(
  data: unknown,
  handlers: HandlerRegistry,
  origin = "model",
  converters: TypeConverterRegistry = createConverterRegistry()
): LoadedModel {
  const doc = parseModelDocument(data, origin);
  const linker = new DocumentLinker(converters, origin);
  const root = linker.command(doc);
  const globalOptions = doc.globalOptions.map((p) => linker.parameter(p));
  if (linker.issues.length > 0) throw new ModelError(linker.issues);

  const model = defineModel(
    {
      name: doc.name,
      ...root.definition,
      globalOptions,
    },
    handlers
  );

  return { model, version: doc.version };
}
