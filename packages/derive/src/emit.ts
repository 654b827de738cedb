/**
 * Plan emission
 *
 * Prints a plan model as the object literal passed to the runtime's
 * `deriveReadWriter`. Data is printed as JSON; constructors, guards and
 * defaults become arrow functions evaluated at the call site.
 */

import type { FieldModel, PlanModel, ProductModel, ShapeModel } from "./model.js";

const str = (value: string): string => JSON.stringify(value);

function emitField(field: FieldModel): string {
  const parts = [`name: ${str(field.name)}`, `key: ${str(field.key)}`, `type: ${JSON.stringify(field.type)}`];
  if (field.defaultText !== undefined) parts.push(`default: () => (${field.defaultText})`);
  if (field.optional) parts.push("optional: true");
  if (field.variadic) parts.push("variadic: true");
  return `{ ${parts.join(", ")} }`;
}

function emitProduct(shape: ProductModel): string[] {
  const fields = shape.fields.map((f) => `        ${emitField(f)},`);
  const parts = [
    `kind: "product"`,
    `name: ${str(shape.name)}`,
    `tag: ${str(shape.tag)}`,
    fields.length > 0 ? `fields: [\n${fields.join("\n")}\n      ]` : "fields: []",
  ];

  const { construction } = shape;
  switch (construction.kind) {
    case "new":
      parts.push(`construct: (...args: any[]) => new ${construction.target}(...args)`);
      break;
    case "factory":
      parts.push(`construct: (...args: any[]) => ${construction.target}.of(...args)`);
      break;
    case "record":
      break;
  }
  if (construction.kind !== "record") {
    if (shape.unapply) parts.push(`deconstruct: (value: any) => ${construction.target}.unapply(value)`);
    parts.push(`is: (value: unknown) => value instanceof ${construction.target}`);
  }
  return parts;
}

function shapeParts(shape: ShapeModel): string[] {
  switch (shape.kind) {
    case "sum":
      return [`kind: "sum"`, `name: ${str(shape.name)}`, `variants: [${shape.variants.map(str).join(", ")}]`];
    case "singleton": {
      const instance = `${shape.target}.${shape.member}`;
      return [
        `kind: "singleton"`,
        `name: ${str(shape.name)}`,
        `tag: ${str(shape.tag)}`,
        `instance: () => ${instance}`,
        `is: (value: unknown) => value === ${instance}`,
      ];
    }
    case "product":
      return emitProduct(shape);
  }
}

function emitShape(shape: ShapeModel): string {
  const parts = shapeParts(shape);
  return `    ${str(shape.name)}: {\n${parts.map((p) => `      ${p},`).join("\n")}\n    },`;
}

/** Source text of the plan object literal. */
export function emitPlan(plan: PlanModel): string {
  return [
    "{",
    `  root: ${str(plan.root)},`,
    "  shapes: {",
    ...plan.shapes.map(emitShape),
    "  },",
    `  options: { tagKey: ${str(plan.options.tagKey)}, omitDefaults: ${plan.options.omitDefaults} },`,
    "}",
  ].join("\n");
}
