export type ElementType = "f16" | "f32" | "f64" | "i1" | "i32" | "i64" | "resource";

/** A dimension size; `null` marks a dynamic dimension (`?`). */
export type Dim = number | null;

export type TensorType = {
  kind: "tensor";
  elementType: ElementType;
  /** `null` for unranked tensors (`tensor<*x...>`) */
  shape: Dim[] | null;
};

/** Control token produced by executor islands. */
export type ControlType = { kind: "control" };

export type FunctionType = {
  kind: "function";
  inputs: Type[];
  results: Type[];
};

export type Type = TensorType | ControlType | FunctionType;

export function tensorType(
  elementType: ElementType,
  shape: Dim[] | null = null,
): TensorType {
  return { kind: "tensor", elementType, shape: shape ? shape.slice() : null };
}

export function resourceType(): TensorType {
  return tensorType("resource");
}

export function controlType(): ControlType {
  return { kind: "control" };
}

export function functionType(inputs: Type[], results: Type[]): FunctionType {
  return { kind: "function", inputs: inputs.slice(), results: results.slice() };
}

export function isResourceType(type: Type): boolean {
  return type.kind === "tensor" && type.elementType === "resource";
}

export function typesEqual(a: Type, b: Type): boolean {
  if (a.kind === "control" || b.kind === "control") {
    return a.kind === b.kind;
  }
  if (a.kind === "function" || b.kind === "function") {
    if (a.kind !== "function" || b.kind !== "function") return false;
    return (
      typeListsEqual(a.inputs, b.inputs) && typeListsEqual(a.results, b.results)
    );
  }
  if (a.elementType !== b.elementType) return false;
  if (a.shape === null || b.shape === null) return a.shape === b.shape;
  if (a.shape.length !== b.shape.length) return false;
  return a.shape.every((dim, i) => dim === b.shape?.[i]);
}

function typeListsEqual(a: Type[], b: Type[]): boolean {
  return a.length === b.length && a.every((t, i) => typesEqual(t, b[i]));
}

function formatElementType(elementType: ElementType): string {
  return elementType === "resource" ? "!tf.resource" : elementType;
}

export function formatType(type: Type): string {
  switch (type.kind) {
    case "control":
      return "!tf_executor.control";
    case "function":
      return `(${type.inputs.map(formatType).join(", ")}) -> ${formatResultTypes(type.results)}`;
    case "tensor": {
      const element = formatElementType(type.elementType);
      if (type.shape === null) return `tensor<*x${element}>`;
      if (type.shape.length === 0) return `tensor<${element}>`;
      const dims = type.shape.map((d) => (d === null ? "?" : String(d)));
      return `tensor<${dims.join("x")}x${element}>`;
    }
  }
}

/** Result list formatting: `()` for none, bare for one, parenthesized otherwise. */
export function formatResultTypes(types: Type[]): string {
  if (types.length === 1) return formatType(types[0]);
  return `(${types.map(formatType).join(", ")})`;
}
