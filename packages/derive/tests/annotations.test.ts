/**
 * Tests for @key and @default resolution
 */

import { describe, it, expect } from "vitest";
import * as ts from "typescript";
import { MalformedAnnotationError, UnsupportedTypeError } from "@pickler/runtime";
import { resolveDefault, resolveKey } from "../src/index.js";

function findNode(node: ts.Node, name: string): ts.Node | undefined {
  if (
    (ts.isClassDeclaration(node) ||
      ts.isInterfaceDeclaration(node) ||
      ts.isPropertySignature(node) ||
      ts.isParameter(node)) &&
    node.name !== undefined &&
    ts.isIdentifier(node.name) &&
    node.name.text === name
  ) {
    return node;
  }
  return ts.forEachChild(node, (child) => findNode(child, name));
}

function declaration(source: string, name: string): ts.Node {
  const sourceFile = ts.createSourceFile("annotations.ts", source, ts.ScriptTarget.ES2022, true);
  const node = findNode(sourceFile, name);
  if (!node) throw new Error(`no declaration named ${name}`);
  return node;
}

function keyError(source: string, name: string): MalformedAnnotationError {
  try {
    resolveKey(declaration(source, name), name, name);
  } catch (error) {
    if (error instanceof MalformedAnnotationError) return error;
    throw error;
  }
  throw new Error("expected a malformed annotation");
}

describe("resolveKey", () => {
  it("should fall back when there is no annotation", () => {
    expect(resolveKey(declaration("class Plain {}", "Plain"), "Plain", "Plain")).toBe("Plain");
  });

  it("should read a decorator argument", () => {
    const node = declaration(`@key("wire") class Point {}`, "Point");
    expect(resolveKey(node, "Point", "Point")).toBe("wire");
  });

  it("should read a template literal without substitutions", () => {
    const node = declaration("class A { constructor(@key(`first_name`) readonly first: string) {} }", "first");
    expect(resolveKey(node, "first", "A")).toBe("first_name");
  });

  it("should read a JSDoc tag on an interface", () => {
    const node = declaration(`/** @key "settings" */\ninterface Settings {}`, "Settings");
    expect(resolveKey(node, "Settings", "Settings")).toBe("settings");
  });

  it("should accept single quotes in JSDoc", () => {
    const node = declaration(`interface S {\n  /** @key 'n' */\n  name: string;\n}`, "name");
    expect(resolveKey(node, "name", "S")).toBe("n");
  });

  it("should reject a decorator without arguments", () => {
    const error = keyError(`@key() class A {}`, "A");
    expect(error.message).toBe("Malformed @key annotation on `A`: expected one string argument, found 0");
  });

  it("should reject a decorator argument that is not a literal", () => {
    const error = keyError(`@key(NAME) class A {}`, "A");
    expect(error.detail).toBe("expected a string literal, found `NAME`");
  });

  it("should reject two key annotations on one declaration", () => {
    const error = keyError(`@key("a") @key("b") class A {}`, "A");
    expect(error.detail).toBe("a declaration may carry only one key annotation");
  });

  it("should reject an empty key", () => {
    const error = keyError(`@key("") class A {}`, "A");
    expect(error.detail).toBe("the key must not be empty");
  });

  it("should reject an unquoted JSDoc key", () => {
    const error = keyError(`/** @key settings */\ninterface Settings {}`, "Settings");
    expect(error.detail).toBe("expected one quoted string after @key, found `settings`");
  });
});

describe("resolveDefault", () => {
  const member = (doc: string): ts.Node =>
    declaration(`interface Options {\n  /** ${doc} */\n  value: unknown;\n}`, "value");

  it("should return undefined without a @default tag", () => {
    expect(resolveDefault(member("The value."), "Options", "value")).toBeUndefined();
  });

  it("should return the text of a literal default", () => {
    expect(resolveDefault(member(`@default "none"`), "Options", "value")).toBe(`"none"`);
    expect(resolveDefault(member("@default false"), "Options", "value")).toBe("false");
    expect(resolveDefault(member("@default [1, 2]"), "Options", "value")).toBe("[1, 2]");
    expect(resolveDefault(member("@default null"), "Options", "value")).toBe("null");
  });

  it("should reject a default that is not a literal", () => {
    let error: unknown;
    try {
      resolveDefault(member("@default Date.now()"), "Options", "value");
    } catch (caught) {
      error = caught;
    }
    expect(error).toBeInstanceOf(UnsupportedTypeError);
    expect(error).toHaveProperty(
      "message",
      "Cannot derive a converter for `Options`: the @default of `value` must be a literal, found `Date.now()`",
    );
  });
});
