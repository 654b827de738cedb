/**
 * In-memory programs for walking `deriveReadWriter<T>()` call sites.
 */

import * as path from "node:path";
import * as ts from "typescript";
import { createLogger } from "@pickler/core";
import { DerivationError } from "@pickler/runtime";
import { PlanWalker, type PlanModel, type ShapeModel } from "../src/index.js";

const FILE = path.resolve("fixture.ts");

const PRELUDE = `export {};
declare function deriveReadWriter<T>(): unknown;
declare function key(name: string): any;
`;

const OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.ESNext,
  moduleResolution: ts.ModuleResolutionKind.Bundler,
  lib: ["lib.es2022.d.ts"],
  strict: true,
  experimentalDecorators: true,
  skipLibCheck: true,
  noEmit: true,
};

export function compile(source: string): ts.Program {
  const host = ts.createCompilerHost(OPTIONS, true);
  const getSourceFile = host.getSourceFile.bind(host);
  const fileExists = host.fileExists.bind(host);
  const readFile = host.readFile.bind(host);

  host.getSourceFile = (fileName, languageVersion, onError, shouldCreate) =>
    path.resolve(fileName) === FILE
      ? ts.createSourceFile(fileName, source, languageVersion, true)
      : getSourceFile(fileName, languageVersion, onError, shouldCreate);
  host.fileExists = (fileName) => path.resolve(fileName) === FILE || fileExists(fileName);
  host.readFile = (fileName) => (path.resolve(fileName) === FILE ? source : readFile(fileName));

  return ts.createProgram([FILE], OPTIONS, host);
}

function findCall(node: ts.Node): ts.CallExpression | undefined {
  if (
    ts.isCallExpression(node) &&
    ts.isIdentifier(node.expression) &&
    node.expression.text === "deriveReadWriter"
  ) {
    return node;
  }
  return ts.forEachChild(node, findCall);
}

export interface Warning {
  code: number;
  args: Readonly<Record<string, string>>;
}

export interface Derived {
  plan: PlanModel;
  warnings: Warning[];
  debug: string[];
}

export interface FixtureOptions {
  tagKey?: string;
  omitDefaults?: boolean;
}

/** Plan the type argument of the first `deriveReadWriter` call in `body`. */
export function derive(body: string, options: FixtureOptions = {}): Derived {
  const program = compile(PRELUDE + body);
  const sourceFile = program.getSourceFile(FILE);
  const call = sourceFile && findCall(sourceFile);
  const typeArg = call?.typeArguments?.[0];
  if (!call || !typeArg) throw new Error("fixture has no deriveReadWriter<T>() call");

  const checker = program.getTypeChecker();
  const warnings: Warning[] = [];
  const debug: string[] = [];
  const walker = new PlanWalker({
    program,
    checker,
    site: call,
    tagKey: options.tagKey ?? "$type",
    omitDefaults: options.omitDefaults ?? true,
    log: createLogger("derive", { verbose: true, sink: (_level, line) => debug.push(line) }),
    warn: (descriptor, args) => warnings.push({ code: descriptor.code, args }),
  });

  return { plan: walker.plan(checker.getTypeFromTypeNode(typeArg), typeArg), warnings, debug };
}

export function deriveError(body: string, options?: FixtureOptions): DerivationError {
  try {
    derive(body, options);
  } catch (error) {
    if (error instanceof DerivationError) return error;
    throw error;
  }
  throw new Error("expected the derivation to fail");
}

export function shapeNamed(plan: PlanModel, name: string): ShapeModel {
  const shape = plan.shapes.find((s) => s.name === name);
  if (!shape) throw new Error(`no shape named ${name}`);
  return shape;
}
