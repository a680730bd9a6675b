/**
 * Filesystem Model Source
 *
 * Reads a command model document from a .yaml, .yml or .json file.
 */

import * as fs from "fs/promises";
import * as path from "path";
import * as YAML from "yaml";
import type { TypeConverterRegistry } from "../../core/conversion.js";
import type { HandlerRegistry } from "../../core/handlers.js";
import { ArborError } from "../../core/utils.js";
import { linkModelDocument, type LoadedModel } from "./document.js";
import type { ModelFormat, ModelSource } from "./types.js";

export function formatFromPath(filePath: string): ModelFormat {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".json") return "json";
  if (ext === ".yaml" || ext === ".yml") return "yaml";
  throw new ArborError(`Unsupported model file type '${ext || filePath}'`, "UNSUPPORTED_MODEL_FORMAT", {
    path: filePath,
  });
}

export function parseModelText(text: string, format: ModelFormat): unknown {
  try {
    return format === "json" ? JSON.parse(text) : YAML.parse(text);
  } catch (error) {
    throw new ArborError(
      `Model document is not valid ${format.toUpperCase()}: ${error instanceof Error ? error.message : String(error)}`,
      "INVALID_MODEL_DOCUMENT",
      { format },
      { cause: error }
    );
  }
}

/**
 * Model document stored in a file.
 */
export class FileModelSource implements ModelSource {
  private filePath: string;
  private format: ModelFormat;

  constructor(filePath: string, format?: ModelFormat) {
    this.filePath = path.resolve(filePath);
    this.format = format ?? formatFromPath(filePath);
  }

  describe(): string {
    return this.filePath;
  }

  async read(): Promise<unknown> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        throw new ArborError(`Model file not found: ${this.filePath}`, "MODEL_NOT_FOUND", {
          path: this.filePath,
        });
      }
      throw error;
    }
    return parseModelText(content, this.format);
  }
}

/**
 * Model document held in memory.
 */
export class TextModelSource implements ModelSource {
  constructor(
    private text: string,
    private format: ModelFormat,
    private origin = "inline model"
  ) {}

  describe(): string {
    return this.origin;
  }

  async read(): Promise<unknown> {
    return parseModelText(this.text, this.format);
  }
}

/**
 * Read, validate and link a model from `source`.
 */
export async function loadModel(
  source: ModelSource,
  handlers: HandlerRegistry,
  converters?: TypeConverterRegistry
): Promise<LoadedModel> {
  const data = await source.read();
  return linkModelDocument(data, handlers, source.describe(), converters);
}

export function loadModelFile(
  filePath: string,
  handlers: HandlerRegistry,
  converters?: TypeConverterRegistry
): Promise<LoadedModel> {
  return loadModel(new FileModelSource(filePath), handlers, converters);
}
