import * as fs from "fs/promises";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { HandlerRegistry } from "../../../core/handlers.js";
import { ArborError, ModelError } from "../../../core/utils.js";
import { createTempDir, removeTempDir } from "../../../core/__tests__/test-helpers.js";
import {
  FileModelSource,
  TextModelSource,
  formatFromPath,
  loadModel,
  loadModelFile,
  parseModelText,
} from "../filesystem.js";

const YAML_MODEL = `name: notes
version: "0.3.0"
actions:
  - name: add
    primary: true
    handler: add
    parameters:
      - { name: text, kind: argument }
`;

const JSON_MODEL = JSON.stringify({
  name: "notes",
  actions: [{ name: "add", primary: true, handler: "add" }],
});

function createHandlers(): HandlerRegistry {
  return new HandlerRegistry().registerAction("add", () => undefined);
}

async function arborError(run: Promise<unknown>): Promise<ArborError> {
  try {
    await run;
  } catch (error) {
    if (error instanceof ArborError) return error;
    throw error;
  }
  throw new Error("expected an ArborError");
}

describe("formatFromPath", () => {
  it("should detect the format from the extension", () => {
    expect(formatFromPath("cli.json")).toBe("json");
    expect(formatFromPath("cli.yaml")).toBe("yaml");
    expect(formatFromPath("CLI.YML")).toBe("yaml");
  });

  it("should reject other extensions", () => {
    expect(() => formatFromPath("cli.toml")).toThrow("Unsupported model file type '.toml'");
  });
});

describe("parseModelText", () => {
  it("should parse YAML and JSON", () => {
    expect(parseModelText("name: notes", "yaml")).toEqual({ name: "notes" });
    expect(parseModelText('{"name":"notes"}', "json")).toEqual({ name: "notes" });
  });

  it("should wrap syntax errors", () => {
    try {
      parseModelText("{ name: ", "json");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ArborError);
      if (error instanceof ArborError) {
        expect(error.code).toBe("INVALID_MODEL_DOCUMENT");
        expect(error.message).toMatch(/^Model document is not valid JSON: /);
      }
    }
  });
});

describe("FileModelSource", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  it("should load a YAML model", async () => {
    const file = path.join(tempDir, "notes.yaml");
    await fs.writeFile(file, YAML_MODEL);

    const { model, version } = await loadModelFile(file, createHandlers());

    expect(model.root.name).toBe("notes");
    expect(version).toBe("0.3.0");
    expect(model.root.actions[0].parameters[0].name).toBe("text");
  });

  it("should load a JSON model", async () => {
    const file = path.join(tempDir, "notes.json");
    await fs.writeFile(file, JSON_MODEL);

    const { model } = await loadModelFile(file, createHandlers());
    expect(model.root.actions[0].name).toBe("add");
  });

  it("should report a missing file", async () => {
    const file = path.join(tempDir, "missing.yaml");

    const error = await arborError(loadModelFile(file, createHandlers()));

    expect(error.code).toBe("MODEL_NOT_FOUND");
    expect(error.message).toBe(`Model file not found: ${file}`);
  });

  it("should name the file in schema problems", async () => {
    const file = path.join(tempDir, "broken.yaml");
    await fs.writeFile(file, "actions: []\n");

    const error = await arborError(loadModelFile(file, createHandlers()));

    expect(error).toBeInstanceOf(ModelError);
    expect(error.message).toBe(`Invalid command model: ${file}: name: Required`);
  });

  it("should describe itself by its absolute path", () => {
    expect(new FileModelSource(path.join(tempDir, "a.yml")).describe()).toBe(path.join(tempDir, "a.yml"));
  });
});

describe("TextModelSource", () => {
  it("should load a model held in memory", async () => {
    const { model } = await loadModel(new TextModelSource(YAML_MODEL, "yaml"), createHandlers());
    expect(model.root.name).toBe("notes");
  });

  it("should use its origin in messages", async () => {
    const source = new TextModelSource("{}", "json", "built-in model");

    const error = await arborError(loadModel(source, createHandlers()));

    expect(source.describe()).toBe("built-in model");
    expect(error.message).toBe("Invalid command model: built-in model: name: Required");
  });
});
