// Test fixture: ready-made tools

import { z } from "zod";
import { Args } from "../extract";
import { type Tool, ToolBuilder } from "../tool-registry";

export const AddArgs = z.object({
  a: z.number().int(),
  b: z.number().int(),
});

/** Unwrap build(), failing the test on a BuildError. */
export function buildTool(builder: ToolBuilder): Tool {
  const result = builder.build();
  if (!result.ok) throw result.error;
  return result.value;
}

export function addTool(): Tool {
  return buildTool(
    new ToolBuilder("add")
      .description("Add two integers")
      .parameters(AddArgs)
      .executor([Args(AddArgs)], ({ a, b }) => a + b),
  );
}

export function failingTool(name = "say_hello", message = "boom"): Tool {
  return buildTool(
    new ToolBuilder(name).executor([], () => {
      throw new Error(message);
    }),
  );
}

export function clientTool(name = "pick_color"): Tool {
  return buildTool(new ToolBuilder(name).description("Ask the user to pick a color").client());
}
