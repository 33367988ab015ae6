import type { IResolvedVariables } from "../../ports/resolved-variables"
import type { ReadonlyVariableMap } from "../../ports/variables"

export class ResolvedVariables implements IResolvedVariables {
  constructor(
    private readonly data: ReadonlyVariableMap,
    private readonly provenance: ReadonlyMap<string, string>,
  ) {}

  get variables(): ReadonlyVariableMap {
    return this.data
  }

  get(key: string): string | undefined {
    return this.data.get(key)
  }

  keys(): string[] {
    return [...this.data.keys()]
  }

  toObject(): Record<string, string> {
    return Object.fromEntries(this.data)
  }

  explain(key: string): string | undefined {
    return this.provenance.get(key)
  }

  sourcesUsed(): string[] {
    return [...new Set(this.provenance.values())]
  }
}
