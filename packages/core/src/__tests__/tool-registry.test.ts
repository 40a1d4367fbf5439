import { describe, test, expect } from "vitest";
import { z } from "zod";
import { EMPTY_PARAMETERS, ToolBuilder, ToolSet, deriveParameters } from "../tool-registry";
import { Args, Context, Id, instanceOf } from "../extract";
import { BuildError, RegistrationError, ok } from "../types";
import { AddArgs, addTool, buildTool, clientTool } from "../__fixtures__/tools";

const signal = new AbortController().signal;

describe("ToolBuilder", () => {
  describe("build validation", () => {
    test("rejects names outside the function-name alphabet", () => {
      const result = new ToolBuilder("bad name").executor([], () => "x").build();
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(BuildError);
        expect(result.error.message).toBe('Invalid tool name "bad name" (expected 1-64 of [a-zA-Z0-9_-])');
        expect(result.error.toolName).toBe("bad name");
      }
    });

    test("rejects names longer than 64 characters", () => {
      const result = new ToolBuilder("a".repeat(65)).executor([], () => "x").build();
      expect(result.ok).toBe(false);
    });

    test("requires an executor unless the tool is a client tool", () => {
      const result = new ToolBuilder("noop").build();
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Tool "noop" has no executor and is not a client tool');
      }
    });

    test("rejects a client tool with an executor", () => {
      const result = new ToolBuilder("both").client().executor([], () => 1).build();
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Tool "both" is marked as a client tool but has an executor');
      }
    });

    test("rejects Args without declared parameters", () => {
      const result = new ToolBuilder("add").executor([Args(AddArgs)], ({ a, b }) => a + b).build();
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Tool "add" extracts Args but declares no parameters');
      }
    });

    test("rejects Args with a schema other than the declared one", () => {
      const Other = z.object({ a: z.number(), b: z.number() });
      const result = new ToolBuilder("add")
        .parameters(AddArgs)
        .executor([Args(Other)], ({ a, b }) => a + b)
        .build();
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Tool "add" extracts Args with a schema other than its parameters');
      }
    });

    test("rejects parameter types whose schema root is not an object", () => {
      const result = new ToolBuilder("echo").parameters(z.string()).executor([], () => "x").build();
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe(
          'Tool "echo" has an unusable parameter schema: parameters must describe a JSON object',
        );
      }
    });
  });

  describe("parameters", () => {
    test("derives an object schema from the declared type", () => {
      const tool = addTool();
      expect(tool.definition()).toEqual({
        name: "add",
        description: "Add two integers",
        parameters: {
          type: "object",
          properties: { a: { type: "integer" }, b: { type: "integer" } },
          required: ["a", "b"],
          additionalProperties: false,
        },
      });
    });

    test("schema-less tools advertise an empty object schema", () => {
      const tool = buildTool(new ToolBuilder("ping").executor([], () => "pong"));
      expect(tool.parameters).toBeUndefined();
      expect(tool.definition().parameters).toEqual({
        type: "object",
        properties: {},
        additionalProperties: false,
        required: [],
      });
      expect(tool.definition().parameters).toBe(EMPTY_PARAMETERS);
    });
  });

  describe("execute", () => {
    test("runs the executor with extracted arguments", async () => {
      const tool = addTool();
      const result = await tool.execute({ id: "call_1", args: ok({ a: 2, b: 3 }), signal });
      expect(result).toBe(5);
    });

    test("hands the captured context and call id to the executor", async () => {
      class Counter {
        hits = 0;
      }
      const counter = new Counter();
      const tool = buildTool(
        new ToolBuilder("hit")
          .context(counter)
          .executor([Id, Context(instanceOf(Counter))], (id, ctx) => {
            ctx.hits++;
            return `${id}:${ctx.hits}`;
          }),
      );

      expect(await tool.execute({ id: "c1", args: ok({}), signal })).toBe("c1:1");
      expect(await tool.execute({ id: "c2", args: ok({}), signal })).toBe("c2:2");
      expect(counter.hits).toBe(2);
    });

    test("serializes undefined results as null", async () => {
      const tool = buildTool(new ToolBuilder("void").executor([], () => undefined));
      expect(await tool.execute({ id: "c1", args: ok({}), signal })).toBeNull();
    });

    test("rejects with ExtractionError for non-conforming arguments", async () => {
      const tool = addTool();
      await expect(tool.execute({ id: "c1", args: ok({ a: 2 }), signal })).rejects.toThrow(
        'Parameter 0 (args): arguments do not match the declared parameters: Required at "b"',
      );
    });

    test("client tools are not executed", () => {
      const tool = clientTool();
      expect(tool.isClient).toBe(true);
      expect(tool.execute({ id: "c1", args: ok({}), signal })).toBeUndefined();
    });
  });
});

describe("deriveParameters", () => {
  test("strips $schema, title and format next to type", () => {
    const schema = z.object({ email: z.string().email().describe("Where to send it") });
    expect(deriveParameters(schema)).toEqual({
      type: "object",
      properties: { email: { type: "string", description: "Where to send it" } },
      required: ["email"],
      additionalProperties: false,
    });
  });

  test("keeps properties that are named like schema keywords", () => {
    const schema = z.object({ title: z.string(), format: z.string() });
    expect(deriveParameters(schema)).toEqual({
      type: "object",
      properties: { title: { type: "string" }, format: { type: "string" } },
      required: ["title", "format"],
      additionalProperties: false,
    });
  });
});

describe("ToolSet", () => {
  test("registers tools and reports them", () => {
    const set = new ToolSet([addTool()]);
    expect(set.has("add")).toBe(true);
    expect(set.has("sub")).toBe(false);
    expect(set.get("sub")).toBeUndefined();
    expect(set.size).toBe(1);
  });

  test("throws on duplicate registration and keeps the first tool", () => {
    const first = addTool();
    const set = new ToolSet([first]);
    expect(() => set.add(addTool())).toThrow(RegistrationError);
    expect(() => set.add(addTool())).toThrow('Tool "add" is already registered');
    expect(set.size).toBe(1);
    expect(set.get("add")).toBe(first);
  });

  test("lists definitions in registration order", () => {
    const set = new ToolSet([clientTool("zeta"), addTool()]);
    expect(set.names()).toEqual(["zeta", "add"]);
    expect(set.definitions().map((d) => d.name)).toEqual(["zeta", "add"]);
  });
});
