/**
 * Tests for the macro registry
 */

import { describe, it, expect, beforeEach } from "vitest";
import type * as ts from "typescript";
import {
  createRegistry,
  defineExpressionMacro,
  defineAttributeMacro,
  registerMacros,
} from "@pickler/core";
import type { MacroRegistry, MacroContext } from "@pickler/core";

describe("MacroRegistry", () => {
  let registry: MacroRegistry;

  beforeEach(() => {
    registry = createRegistry();
  });

  describe("expression macros", () => {
    it("should register expression macros", () => {
      const macro = defineExpressionMacro({
        name: "testMacro",
        description: "A test macro",
        expand: (_ctx, callExpr) => callExpr,
      });

      registry.register(macro);

      expect(registry.getAll()).toEqual([macro]);
    });

    it("should allow idempotent registration of the same macro", () => {
      const macro = defineExpressionMacro({
        name: "duplicate",
        module: "@pickler/runtime",
        expand: (_ctx, callExpr) => callExpr,
      });

      registry.register(macro);
      expect(() => registry.register(macro)).not.toThrow();
      expect(() => registry.register({ ...macro })).not.toThrow();
    });

    it("should throw for a different macro under the same name", () => {
      registry.register(
        defineExpressionMacro({
          name: "conflicting",
          module: "module-a",
          expand: (_ctx, callExpr) => callExpr,
        }),
      );
      expect(() =>
        registry.register(
          defineExpressionMacro({
            name: "conflicting",
            module: "module-b",
            expand: (_ctx, callExpr) => callExpr,
          }),
        ),
      ).toThrow("Expression macro 'conflicting' is already registered");
    });
  });

  describe("attribute macros", () => {
    it("should register attribute macros", () => {
      registry.register(
        defineAttributeMacro({
          name: "testAttr",
          module: "@pickler/runtime",
          validTargets: ["class", "parameter"],
          expand: (_ctx, _decorator, target) => target,
        }),
      );

      const retrieved = registry.getByModuleExport("@pickler/runtime", "testAttr");
      expect(retrieved?.kind).toBe("attribute");
      expect(retrieved?.kind === "attribute" && retrieved.validTargets).toEqual(["class", "parameter"]);
    });
  });

  describe("module scoping", () => {
    it("should index macros by module and export name", () => {
      const macro = defineExpressionMacro({
        name: "deriveReadWriter",
        module: "@pickler/runtime",
        expand: (_ctx, callExpr) => callExpr,
      });
      registry.register(macro);

      expect(registry.getByModuleExport("@pickler/runtime", "deriveReadWriter")).toBe(macro);
      expect(registry.getByModuleExport("other", "deriveReadWriter")).toBeUndefined();
    });

    it("should honour a custom export name", () => {
      const macro = defineAttributeMacro({
        name: "pickleKey",
        module: "@pickler/runtime",
        exportName: "key",
        validTargets: ["parameter"],
        expand: (_ctx, _decorator, target) => target,
      });
      registry.register(macro);

      expect(registry.getByModuleExport("@pickler/runtime", "key")).toBe(macro);
      expect(registry.getByModuleExport("@pickler/runtime", "pickleKey")).toBeUndefined();
    });

    it("should not index macros without a module", () => {
      registry.register(defineExpressionMacro({ name: "global", expand: (_ctx, call) => call }));
      expect(registry.getByModuleExport("", "global")).toBeUndefined();
      expect(registry.getAll().map((m) => m.name)).toEqual(["global"]);
    });
  });

  describe("getAll", () => {
    it("should return all registered macros", () => {
      registerMacros(
        registry,
        defineExpressionMacro({ name: "expr1", expand: (_ctx, callExpr) => callExpr }),
        defineAttributeMacro({
          name: "attr1",
          validTargets: ["class"],
          expand: (_ctx, _decorator, target) => target,
        }),
      );

      expect(registry.getAll().map((m) => m.name)).toEqual(["expr1", "attr1"]);
    });

    it("should return empty array when no macros registered", () => {
      expect(registry.getAll()).toHaveLength(0);
    });
  });
});

describe("defineExpressionMacro", () => {
  it("should create a properly typed expression macro", () => {
    const macro = defineExpressionMacro({
      name: "myMacro",
      description: "My macro",
      expand(ctx: MacroContext, _callExpr: ts.CallExpression, args: readonly ts.Expression[]) {
        return ctx.factory.createStringLiteral(args.length > 0 ? "args" : "no args");
      },
    });

    expect(macro.kind).toBe("expression");
    expect(macro.name).toBe("myMacro");
    expect(macro.description).toBe("My macro");
  });
});
