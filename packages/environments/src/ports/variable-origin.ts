/**
 * Where a variable of a resolved environment was declared.
 */
export type VariableOrigin =
  | { readonly kind: "local" }
  | { readonly kind: "inherited"; readonly from: string }
  | { readonly kind: "common" }
