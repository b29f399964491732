import type { CatalogConfig, FieldDeclaration } from "../catalog.js";
import type { SemanticType } from "./semantic-types.js";

export type TypeLookup =
  | { known: true; type: SemanticType }
  /** `tag` is null when the field is not declared at all. */
  | { known: false; tag: string | null };

/**
 * Field name → semantic type, per entity. Built once from the catalog and
 * never mutated.
 */
export class TypeRegistry {
  private readonly types = new Map<string, ReadonlyMap<string, FieldDeclaration>>();

  constructor(private readonly catalog: CatalogConfig) {
    for (const [entity, declaration] of catalog.entities) {
      this.types.set(entity, new Map(declaration.fields.map((field) => [field.name, field])));
    }
  }

  typeOf(entity: string, field: string): TypeLookup {
    const declaration = this.types.get(entity)?.get(field);
    if (!declaration) return { known: false, tag: null };
    if (declaration.type === null) return { known: false, tag: declaration.tag };
    return { known: true, type: declaration.type };
  }

  /** Declared field names in schema order; empty for an unknown entity. */
  fieldsOf(entity: string): string[] {
    return this.catalog.entities.get(entity)?.fields.map((field) => field.name) ?? [];
  }
}
