/**
 * Compile-time graph walker
 *
 * Collects one shape per type key reachable from the root. A type whose
 * classification is still in progress is referred to by key only, which
 * is what lets self- and mutually-referential types terminate; the
 * runtime session ties the same knot when it builds the converters.
 */

import * as ts from "typescript";
import type { DiagnosticDescriptor, Logger } from "@pickler/core";
import { classify } from "./classify.js";
import type { PlanModel, ShapeModel } from "./model.js";

export interface DeriveEnv {
  readonly program: ts.Program;
  readonly checker: ts.TypeChecker;
  /** Node the generated plan is evaluated at */
  readonly site: ts.Node;
  readonly tagKey: string;
  readonly omitDefaults: boolean;
  readonly log: Logger;
  warn(descriptor: DiagnosticDescriptor, args: Readonly<Record<string, string>>): void;
}

/** Follow an import binding to the symbol it names. */
export function resolveAlias(checker: ts.TypeChecker, symbol: ts.Symbol): ts.Symbol {
  return symbol.flags & ts.SymbolFlags.Alias ? checker.getAliasedSymbol(symbol) : symbol;
}

/** The declaration of a non-generic type alias whose body is a union. */
export function unionAliasDeclaration(
  checker: ts.TypeChecker,
  symbol: ts.Symbol | undefined,
): ts.TypeAliasDeclaration | undefined {
  if (!symbol) return undefined;
  const resolved = resolveAlias(checker, symbol);
  if (!(resolved.flags & ts.SymbolFlags.TypeAlias)) return undefined;
  const decl = resolved.declarations?.find(ts.isTypeAliasDeclaration);
  if (!decl) return undefined;
  let body = decl.type;
  while (ts.isParenthesizedTypeNode(body)) body = body.type;
  return ts.isUnionTypeNode(body) ? decl : undefined;
}

/** Alias symbol a type reference node names, if it names one. */
export function referencedAlias(checker: ts.TypeChecker, node: ts.TypeNode | undefined): ts.Symbol | undefined {
  if (!node || !ts.isTypeReferenceNode(node)) return undefined;
  const symbol = checker.getSymbolAtLocation(node.typeName);
  if (!symbol) return undefined;
  const resolved = resolveAlias(checker, symbol);
  return resolved.flags & ts.SymbolFlags.TypeAlias ? resolved : undefined;
}

export class PlanWalker {
  private readonly shapes = new Map<string, ShapeModel>();
  private readonly types = new Map<string, ts.Type>();
  private readonly inFlight = new Set<string>();
  /** Keys in the order their classification started */
  private readonly order: string[] = [];
  /** Key given to each distinct type, so same-named types stay apart */
  private readonly keys = new Map<ts.Type | ts.Symbol | string, string>();
  private readonly taken = new Set<string>();
  private scope: Map<ts.Symbol, string> | undefined;

  constructor(readonly env: DeriveEnv) {}

  get checker(): ts.TypeChecker {
    return this.env.checker;
  }

  /**
   * Key of the shape for `type`. A second, distinct type whose name is
   * already taken gets a numbered suffix (`Item`, `Item$1`).
   */
  keyOf(type: ts.Type, node?: ts.TypeNode): string {
    const [identity, name] = this.identify(type, node);
    const known = this.keys.get(identity);
    if (known !== undefined) return known;

    let key = name;
    for (let n = 1; this.taken.has(key); n++) key = `${name}$${n}`;
    this.keys.set(identity, key);
    this.taken.add(key);
    return key;
  }

  private identify(type: ts.Type, node?: ts.TypeNode): [ts.Type | ts.Symbol | string, string] {
    const alias = referencedAlias(this.checker, node);
    if (alias && node && ts.isTypeReferenceNode(node) && !node.typeArguments) return [alias, alias.name];
    if (type.flags & ts.TypeFlags.Never) {
      const text = node ? node.getText() : "never";
      return [text, text];
    }
    const name = this.checker.typeToString(type);
    const aliasSymbol = type.aliasSymbol;
    if (aliasSymbol && !type.aliasTypeArguments) return [resolveAlias(this.checker, aliasSymbol), name];
    return [type, name];
  }

  /**
   * Plan `type` unless it already is, and return its key. A type reached
   * again while it is being classified is returned by key straight away.
   */
  request(type: ts.Type, node?: ts.TypeNode): string {
    const key = this.keyOf(type, node);
    if (this.shapes.has(key)) return key;
    if (this.inFlight.has(key)) {
      this.env.log.debug(`cycle through \`${key}\`; referring to it by name`);
      return key;
    }

    this.inFlight.add(key);
    this.order.push(key);
    this.types.set(key, type);
    try {
      this.shapes.set(key, classify(this, type, node, key));
    } finally {
      this.inFlight.delete(key);
    }
    return key;
  }

  /** The type planned under `key`. */
  typeOf(key: string): ts.Type | undefined {
    return this.types.get(key);
  }

  /** The finished shape for `key`; undefined while it is in flight. */
  shape(key: string): ShapeModel | undefined {
    return this.shapes.get(key);
  }

  plan(type: ts.Type, node?: ts.TypeNode): PlanModel {
    const root = this.request(type, node);
    const shapes = this.order.flatMap((key) => {
      const shape = this.shapes.get(key);
      return shape ? [shape] : [];
    });
    this.env.log.debug(`planned \`${root}\` with ${shapes.length} shape(s)`);
    return {
      root,
      shapes,
      options: { tagKey: this.env.tagKey, omitDefaults: this.env.omitDefaults },
    };
  }

  private canonical(symbol: ts.Symbol): ts.Symbol {
    return this.checker.getExportSymbolOfSymbol(resolveAlias(this.checker, symbol));
  }

  /** Name `symbol` is reachable under at the derivation site, if any. */
  localName(symbol: ts.Symbol): string | undefined {
    if (!this.scope) {
      this.scope = new Map();
      for (const local of this.checker.getSymbolsInScope(this.env.site, ts.SymbolFlags.Value | ts.SymbolFlags.Alias)) {
        // `import type` bindings do not exist at run time
        if (local.declarations?.some(ts.isTypeOnlyImportOrExportDeclaration)) continue;
        const target = this.canonical(local);
        if (!this.scope.has(target)) this.scope.set(target, local.name);
      }
    }
    return this.scope.get(this.canonical(symbol));
  }

  /**
   * Expression naming a class at the derivation site: its local name, or
   * a path through an enclosing namespace that is in scope.
   */
  accessPath(symbol: ts.Symbol): string | undefined {
    const local = this.localName(symbol);
    if (local) return local;

    const decl = symbol.declarations?.[0];
    const block = decl?.parent;
    if (!block || !ts.isModuleBlock(block)) return undefined;
    const namespace = this.checker.getSymbolAtLocation(block.parent.name);
    if (!namespace) return undefined;
    const outer = this.accessPath(namespace);
    return outer ? `${outer}.${symbol.name}` : undefined;
  }

  /** Whether every declaration of `symbol` comes from a library. */
  isLibrarySymbol(symbol: ts.Symbol): boolean {
    const decls = symbol.declarations ?? [];
    return (
      decls.length > 0 &&
      decls.every((d) => {
        const file = d.getSourceFile();
        return (
          this.env.program.isSourceFileDefaultLibrary(file) ||
          this.env.program.isSourceFileFromExternalLibrary(file)
        );
      })
    );
  }
}
