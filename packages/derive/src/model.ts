/**
 * Compile-time plan model
 *
 * What the walker learns about each type, before it is printed as the
 * plan object literal the runtime consumes. Type references are already in
 * their runtime form; code the runtime calls (constructors, defaults) is
 * kept as source text.
 */

import type { TypeRef } from "@pickler/runtime";

export interface FieldModel {
  readonly name: string;
  readonly key: string;
  readonly type: TypeRef;
  /** Source text of the default initializer, evaluated at the call site */
  readonly defaultText?: string;
  readonly optional?: boolean;
  readonly variadic?: boolean;
}

/**
 * How a product value is built from its fields. `target` is the expression
 * naming the class at the call site.
 */
export type Construction =
  | { readonly kind: "new"; readonly target: string }
  | { readonly kind: "factory"; readonly target: string }
  | { readonly kind: "record" };

export interface SumModel {
  readonly kind: "sum";
  readonly name: string;
  readonly variants: readonly string[];
}

export interface SingletonModel {
  readonly kind: "singleton";
  readonly name: string;
  readonly tag: string;
  readonly target: string;
  /** Static property holding the instance */
  readonly member: string;
}

export interface ProductModel {
  readonly kind: "product";
  readonly name: string;
  readonly tag: string;
  readonly fields: readonly FieldModel[];
  readonly construction: Construction;
  /** Read fields through a static `unapply` instead of properties */
  readonly unapply: boolean;
}

export type ShapeModel = SumModel | SingletonModel | ProductModel;

export interface PlanModel {
  readonly root: string;
  readonly shapes: readonly ShapeModel[];
  readonly options: {
    readonly tagKey: string;
    readonly omitDefaults: boolean;
  };
}
