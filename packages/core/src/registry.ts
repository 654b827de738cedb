/**
 * Macro Registry - Stores and retrieves macro definitions
 *
 * Macros that declare a `module` are additionally indexed by
 * `module::exportName`, which is how the transformer activates a macro only
 * for call sites that import its placeholder.
 */

import type { AttributeMacro, ExpressionMacro, MacroDefinition, MacroRegistry } from "./types.js";

/**
 * Key for module-scoped macro lookup: "module::exportName"
 */
function moduleKey(mod: string, exportName: string): string {
  return `${mod}::${exportName}`;
}

class MacroRegistryImpl implements MacroRegistry {
  private expressionMacros = new Map<string, ExpressionMacro>();
  private attributeMacros = new Map<string, AttributeMacro>();

  /**
   * Secondary index for macros that declare a `module`.
   * Key is "module::exportName", value is the macro definition.
   */
  private moduleScopedMacros = new Map<string, MacroDefinition>();

  /**
   * Two definitions with the same name and module are the same macro. ESM
   * re-imports can produce a fresh object for an already registered macro.
   */
  private isSameMacro(existing: MacroDefinition, incoming: MacroDefinition): boolean {
    if (existing === incoming) return true;
    return existing.name === incoming.name && existing.module === incoming.module;
  }

  register(macro: MacroDefinition): void {
    switch (macro.kind) {
      case "expression": {
        const existing = this.expressionMacros.get(macro.name);
        if (existing) {
          if (this.isSameMacro(existing, macro)) return;
          throw new Error(`Expression macro '${macro.name}' is already registered`);
        }
        this.expressionMacros.set(macro.name, macro);
        break;
      }

      case "attribute": {
        const existing = this.attributeMacros.get(macro.name);
        if (existing) {
          if (this.isSameMacro(existing, macro)) return;
          throw new Error(`Attribute macro '${macro.name}' is already registered`);
        }
        this.attributeMacros.set(macro.name, macro);
        break;
      }
    }

    if (macro.module) {
      const exportName = macro.exportName ?? macro.name;
      this.moduleScopedMacros.set(moduleKey(macro.module, exportName), macro);
    }
  }

  /**
   * Look up a macro by its source module and export name.
   */
  getByModuleExport(mod: string, exportName: string): MacroDefinition | undefined {
    return this.moduleScopedMacros.get(moduleKey(mod, exportName));
  }

  getAll(): MacroDefinition[] {
    return [...this.expressionMacros.values(), ...this.attributeMacros.values()];
  }
}

/** Global macro registry singleton */
export const globalRegistry = new MacroRegistryImpl();

/** Create a new isolated registry (for testing or scoped usage) */
export function createRegistry(): MacroRegistry {
  return new MacroRegistryImpl();
}

// ============================================================================
// Macro Definition Helpers
// ============================================================================

/**
 * Define an expression macro with type inference
 */
export function defineExpressionMacro(definition: Omit<ExpressionMacro, "kind">): ExpressionMacro {
  return {
    ...definition,
    kind: "expression",
  };
}

/**
 * Define an attribute macro with type inference
 */
export function defineAttributeMacro(definition: Omit<AttributeMacro, "kind">): AttributeMacro {
  return {
    ...definition,
    kind: "attribute",
  };
}

/**
 * Register multiple macros at once
 */
export function registerMacros(registry: MacroRegistry, ...macros: MacroDefinition[]): void {
  for (const macro of macros) {
    registry.register(macro);
  }
}
