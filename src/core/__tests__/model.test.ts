import { describe, it, expect } from "vitest";
import { TypeConverterRegistry } from "../conversion.js";
import { HandlerRegistry } from "../handlers.js";
import {
  action,
  argument,
  beforeHook,
  command,
  customType,
  defineModel,
  enumOf,
  errorHook,
  listOf,
  mapExitCode,
  option,
  pattern,
  range,
  validateModel,
} from "../model.js";
import { ModelError } from "../utils.js";

const noop = (): void => undefined;

function modelIssues(build: () => unknown): string[] {
  try {
    build();
  } catch (error) {
    if (error instanceof ModelError) return error.issues;
    throw error;
  }
  throw new Error("expected a ModelError");
}

// ============================================================================
// Builders
// ============================================================================

describe("parameter builders", () => {
  it("should default boolean options to false", () => {
    const amend = option("amend", { type: "boolean" });
    expect(amend.defaultValue).toBe(false);
    expect(amend.required).toBe(false);
  });

  it("should make arguments required unless they have a default or collect", () => {
    expect(argument("source").required).toBe(true);
    expect(argument("target", { default: "." }).required).toBe(false);
    expect(argument("files", { type: listOf("file") }).required).toBe(false);
  });

  it("should carry every option setting", () => {
    const token = option("token", {
      envVar: "API_TOKEN",
      prompt: "API token",
      securePrompt: true,
      exclusive: "auth",
      description: "Access token",
    });
    expect(token).toMatchObject({
      kind: "option",
      name: "token",
      envVar: "API_TOKEN",
      prompt: "API token",
      securePrompt: true,
      mutuallyExclusiveSet: "auth",
      type: { kind: "primitive", name: "string" },
      validations: [],
    });
  });
});

describe("defineModel", () => {
  it("should link commands, actions and inline handlers", () => {
    const handlers = new HandlerRegistry();
    const commit = (): string => "committed";
    const model = defineModel(
      {
        name: "app",
        commands: [
          command("git", {
            aliases: ["g"],
            actions: [
              action("commit", {
                parameters: [option("message", { shortName: "m", required: true })],
                handler: commit,
                hooks: [beforeHook(noop, 5)],
              }),
            ],
          }),
        ],
      },
      handlers
    );

    const git = model.root.children[0];
    expect(model.root.name).toBe("app");
    expect(git.aliases).toEqual(["g"]);

    const commitAction = git.actions[0];
    expect(commitAction.handlerId).toBe("action-commit-1");
    expect(handlers.action("action-commit-1")).toBe(commit);
    expect(commitAction.hooks).toEqual([{ phase: "before", handlerId: "hook-before-2", order: 5 }]);
    expect(handlers.hasHookPhase("hook-before-2", "before")).toBe(true);
  });

  it("should number arguments by declaration order", () => {
    const model = defineModel({
      name: "app",
      actions: [
        action("copy", {
          primary: true,
          parameters: [argument("source"), option("force", { type: "boolean" }), argument("target")],
          handler: noop,
        }),
      ],
    });

    const positions = model.root.actions[0].parameters.map((p) => [p.name, p.position]);
    expect(positions).toEqual([
      ["source", 0],
      ["force", undefined],
      ["target", 1],
    ]);
  });

  it("should link handlers registered by id", () => {
    const handlers = new HandlerRegistry().registerAction("deploy", noop).registerHook("audit", { before: noop });
    const model = defineModel(
      { name: "app", actions: [action("deploy", { handler: "deploy", hooks: [beforeHook("audit")] })] },
      handlers
    );
    expect(model.root.actions[0].handlerId).toBe("deploy");
    expect(model.root.actions[0].hooks[0].handlerId).toBe("audit");
  });
});

// ============================================================================
// Structural Checks
// ============================================================================

describe("validateModel", () => {
  it("should reject sibling names that differ only in case", () => {
    const issues = modelIssues(() =>
      defineModel({ name: "app", commands: [command("deploy"), command("Deploy")] })
    );
    expect(issues).toEqual(["'app': name 'Deploy' of command 'Deploy' clashes with command 'deploy'"]);
  });

  it("should share one namespace between child commands and actions", () => {
    const issues = modelIssues(() =>
      defineModel({
        name: "app",
        commands: [command("status")],
        actions: [action("status", { handler: noop })],
      })
    );
    expect(issues).toEqual(["'app': name 'status' of action 'status' clashes with command 'status'"]);
  });

  it("should reject a command alias used twice anywhere in the tree", () => {
    const issues = modelIssues(() =>
      defineModel({
        name: "app",
        commands: [
          command("a", { commands: [command("x", { aliases: ["ls"] })] }),
          command("b", { commands: [command("y", { aliases: ["ls"] })] }),
        ],
      })
    );
    expect(issues).toEqual(["alias 'ls' is used by both 'app a x' and 'app b y'"]);
  });

  it("should allow one primary action per command", () => {
    const issues = modelIssues(() =>
      defineModel({
        name: "app",
        actions: [
          action("run", { primary: true, handler: noop }),
          action("start", { primary: true, handler: noop }),
        ],
      })
    );
    expect(issues).toEqual(["'app' has 2 primary actions: run, start"]);
  });

  it("should require registered handlers", () => {
    const issues = modelIssues(() => defineModel({ name: "app", actions: [action("run", { handler: "missing" })] }));
    expect(issues).toEqual(["'app run': no action handler registered as 'missing'"]);
  });

  it("should require hooks to handle the phase they are attached to", () => {
    const handlers = new HandlerRegistry().registerHook("audit", { after: noop });
    const issues = modelIssues(() =>
      defineModel(
        { name: "app", actions: [action("run", { handler: noop, hooks: [beforeHook("audit"), errorHook("gone")] })] },
        handlers
      )
    );
    expect(issues).toEqual([
      "'app run': hook 'audit' does not handle the before phase",
      "'app run': no hook handler registered as 'gone'",
    ]);
  });

  it("should check parameter declarations", () => {
    const issues = modelIssues(() =>
      defineModel({
        name: "app",
        globalOptions: [option("verbose", { type: "boolean" })],
        actions: [
          action("run", {
            handler: noop,
            parameters: [
              option("Verbose"),
              option("level", { required: true, default: "info" }),
              option("force", { type: "boolean", required: true }),
              option("name", { validate: [range(1, 2)] }),
              option("a", { shortName: "x" }),
              option("b", { shortName: "x" }),
            ],
          }),
        ],
      })
    );
    expect(issues).toEqual([
      "'app run': parameter 'Verbose' is declared more than once or shadows a global option",
      "'app run': required parameter 'level' cannot have a default value",
      "'app run': boolean option 'force' cannot be required",
      "'app run': range rule on 'name' needs a numeric type",
      "'app run': short name '-x' is used more than once",
    ]);
  });

  it("should reject pattern rules that do not compile", () => {
    const issues = modelIssues(() =>
      defineModel({
        name: "app",
        actions: [
          action("run", {
            handler: noop,
            parameters: [
              option("id", { validate: [pattern("(")] }),
              option("code", { validate: [{ kind: "pattern", pattern: "^[a-z]+$", flags: "zz" }] }),
              option("name", { validate: [pattern("^[a-z]+$")] }),
            ],
          }),
        ],
      })
    );
    expect(issues).toEqual([
      "'app run': pattern '(' on 'id' is not a valid regular expression",
      "'app run': pattern '^[a-z]+$' on 'code' is not a valid regular expression",
    ]);
  });

  it("should keep flag enum members within 31 bits", () => {
    const issues = modelIssues(() =>
      defineModel({
        name: "app",
        actions: [
          action("run", {
            handler: noop,
            parameters: [
              option("mode", {
                type: enumOf("Mode", { None: 0, Top: 2 ** 30, Over: 2 ** 31, Minus: -1 }, { flags: true }),
              }),
              option("level", { type: enumOf("Level", { Huge: 2 ** 31 }) }),
            ],
          }),
        ],
      })
    );
    expect(issues).toEqual([
      "'app run': flag 'Over' of enum 'Mode' must be an integer from 0 to 2147483647",
      "'app run': flag 'Minus' of enum 'Mode' must be an integer from 0 to 2147483647",
    ]);
  });

  it("should require a collection argument to come last", () => {
    const issues = modelIssues(() =>
      defineModel({
        name: "app",
        actions: [
          action("copy", {
            handler: noop,
            parameters: [argument("files", { type: listOf("file") }), argument("dest")],
          }),
        ],
      })
    );
    expect(issues).toEqual(["'app copy': collection argument 'files' must be the last argument"]);
  });

  it("should reserve help and version for the engine", () => {
    const issues = modelIssues(() =>
      defineModel({ name: "app", globalOptions: [option("help", { type: "boolean" }), option("host", { shortName: "h" })] })
    );
    expect(issues).toEqual(["global option '--help' is reserved", "global option '-h' is reserved"]);
  });

  it("should check exit code mappings", () => {
    const issues = modelIssues(() =>
      defineModel({ name: "app", exitCodes: [mapExitCode(Error, 300), mapExitCode("ENOENT", 3), mapExitCode("ENOENT", 4)] })
    );
    expect(issues).toEqual(["'app': exit code 300 is outside 0-255", "'app': 'ENOENT' is mapped more than once"]);
  });

  it("should check custom converters when a registry is given", () => {
    const model = defineModel({
      name: "app",
      actions: [action("release", { handler: noop, parameters: [option("version", { type: customType("semver") })] })],
    });

    expect(modelIssues(() => validateModel(model, new TypeConverterRegistry()))).toEqual([
      "'app release': no converter registered as 'semver' for 'version'",
    ]);

    const converters = new TypeConverterRegistry().register("semver", { typeName: "semver", convert: (raw) => raw });
    expect(() => validateModel(model, converters)).not.toThrow();
  });

  it("should report every problem at once", () => {
    const error = (() => {
      try {
        defineModel({
          name: "app",
          actions: [action("a", { handler: "one" }), action("b", { handler: "two" })],
        });
      } catch (e) {
        return e;
      }
      return undefined;
    })();
    expect(error).toBeInstanceOf(ModelError);
    if (error instanceof ModelError) {
      expect(error.issues).toHaveLength(2);
      expect(error.message).toBe(
        "Invalid command model (2 problems): 'app a': no action handler registered as 'one'; 'app b': no action handler registered as 'two'"
      );
    }
  });
});
